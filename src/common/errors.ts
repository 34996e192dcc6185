/**
 * Compiler Errors
 * ================
 *
 * Error classes thrown inside the compiler. Lowering converts them into
 * diagnostics at the view or compilation-unit boundary; they never escape
 * `CircuitCompiler.compile` unless `throwOnError` is set.
 *
 * @module
 */

/** A position range in the original query text */
export interface SourceRange {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

export function formatRange(range: SourceRange | undefined): string {
  if (!range) return '';
  return `${range.startLine}:${range.startColumn}`;
}

/**
 * Base class for all compiler errors
 */
export class CompilerError extends Error {
  constructor(message: string, public readonly range?: SourceRange) {
    super(message);
    this.name = 'CompilerError';
  }
}

/**
 * A construct the grammar accepts but lowering cannot express yet.
 * Reported as "Not yet implemented: ...".
 */
export class UnsupportedError extends CompilerError {
  constructor(what: string, range?: SourceRange) {
    super(`Not yet implemented: ${what}`, range);
    this.name = 'UnsupportedError';
  }
}

/**
 * Internal consistency failure: the validated-plan contract was broken
 * upstream, or the compiler itself has a bug.
 */
export class InvariantViolationError extends CompilerError {
  constructor(message: string, range?: SourceRange) {
    super(message, range);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Aborts the current view after its cause has already been reported,
 * so the view boundary adds no second diagnostic.
 */
export class ReportedError extends CompilerError {
  constructor(message: string, range?: SourceRange) {
    super(message, range);
    this.name = 'ReportedError';
  }
}

/**
 * Thrown by the diagnostics collaborator when `throwOnError` is set.
 */
export class CompilationError extends CompilerError {
  constructor(message: string, range?: SourceRange) {
    super(message, range);
    this.name = 'CompilationError';
  }
}

/**
 * A value that cannot be computed at run time, such as a string that does
 * not parse as the number a CAST asks for.
 */
export class EvaluationError extends CompilerError {
  constructor(message: string, range?: SourceRange) {
    super(message, range);
    this.name = 'EvaluationError';
  }
}

/** Fails fast when a condition the validated plan guarantees does not hold */
export function invariant(condition: boolean, message: string, range?: SourceRange): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message, range);
  }
}

/** Exhaustiveness check for tagged unions */
export function assertNever(value: never, what: string): never {
  throw new InvariantViolationError(`Unexpected ${what}: ${JSON.stringify(value)}`);
}
