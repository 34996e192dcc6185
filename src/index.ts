/**
 * Circuit Compiler
 * =================
 *
 * Compiles validated relational query plans into incremental dataflow
 * circuits over Z-sets (weighted multisets).
 *
 * ## Quick Start
 *
 * ```ts
 * import { compile, CircuitExecutor, ZSet } from 'circuit-compiler';
 *
 * const { circuit, messages } = compile(program);
 * if (!circuit) throw new Error(messages.toString());
 *
 * const executor = new CircuitExecutor(circuit);
 * const changes = executor.step({ orders: ZSet.fromValues([[1, 'pending']]) });
 * ```
 *
 * ## Core Concepts
 *
 * - **ZSet**: A set with integer weights (multiset representation)
 * - **Circuit**: An arena of operators addressed by integer handles
 * - **Lowering**: Plan nodes → operators, bottom-up
 * - **Passes**: Clone-and-replace rewrites of a whole circuit
 *
 * @module
 */

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILER
// ═══════════════════════════════════════════════════════════════════════════════

export { CircuitCompiler, compile, programSchema } from './compiler';
export type { CompileResult, InputRelation, OutputRelation, ProgramSchema, SchemaField } from './compiler';

export { CompilerMessages } from './common/diagnostics';
export type { Diagnostic, DiagnosticCode, DiagnosticReporter, Severity } from './common/diagnostics';
export {
  CompilationError,
  CompilerError,
  EvaluationError,
  InvariantViolationError,
  UnsupportedError,
  formatRange,
} from './common/errors';
export type { SourceRange } from './common/errors';
export { DEFAULT_COMPILER_OPTIONS, DEFAULT_PIPELINE, resolveOptions } from './common/options';
export type { CompilerOptions, PassName } from './common/options';

// ═══════════════════════════════════════════════════════════════════════════════
// INTERMEDIATE REPRESENTATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from './ir/types';
export * from './ir/expression';
export { evaluate, applyClosure, compareValues } from './ir/evaluate';
export * from './ir/operators';
export { Circuit, circuitsEqual, operatorCounts } from './ir/circuit';

// ═══════════════════════════════════════════════════════════════════════════════
// PLANS & LOWERING
// ═══════════════════════════════════════════════════════════════════════════════

export * from './plan/plan-types';
export { PlanLowering, lowerProgram } from './plan/lowering';
export type { LoweringOptions } from './plan/lowering';

// ═══════════════════════════════════════════════════════════════════════════════
// REWRITING
// ═══════════════════════════════════════════════════════════════════════════════

export { ExpressionRewriter, Substitution, freeVariables } from './visitors/inner';
export { CircuitRewriter, RewriteContext, runPasses } from './visitors/outer';
export type { CircuitPass } from './visitors/outer';
export { createPass, optimize } from './passes/pipeline';
export { RemoveDeindex } from './passes/remove-deindex';
export { ConstantFold, ExpressionFolder } from './passes/constant-fold';
export { FuseOperators } from './passes/fuse-operators';
export { DeadCode, liveOperators } from './passes/dead-code';

// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCE EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

export * from './internals';
