/**
 * Circuit Rewriting
 * ==================
 *
 * Clone-and-replace traversal over circuits. A rewriter visits the source
 * circuit in topological order and writes a fresh circuit:
 *
 * - every input of the visited operator already has a replacement, which
 *   `ctx.inputs(op)` resolves through the old→new handle map
 * - the per-kind hook registers the replacement with `ctx.map`, reuses an
 *   already placed operator with `ctx.alias`, drops the operator with
 *   `ctx.drop`, or falls back to `ctx.copy`
 *
 * Per-kind hooks are dispatched by an exhaustive switch, so a new operator
 * kind cannot be added without every rewriter getting a default for it.
 *
 * @module
 */

import { assertNever, invariant } from '../common/errors';
import { createLogger } from '../common/logger';
import { Circuit } from '../ir/circuit';
import type {
  AggregateOperator,
  ConstantOperator,
  DeindexOperator,
  DelayOperator,
  DifferentiateOperator,
  DistinctOperator,
  FilterOperator,
  IndexOperator,
  IntegrateOperator,
  JoinOperator,
  MapOperator,
  Operator,
  OperatorDraft,
  OperatorId,
  SetOpOperator,
  SinkOperator,
  SourceOperator,
  WindowOperator,
} from '../ir/operators';

const log = createLogger('rewrite');

/** A circuit-to-circuit transformation */
export interface CircuitPass {
  readonly name: string;
  apply(circuit: Circuit): Circuit;
}

/**
 * Handle bookkeeping for one rewrite: the source circuit, the circuit being
 * built and the old→new handle map.
 */
export class RewriteContext {
  private readonly mapping = new Map<OperatorId, OperatorId>();
  private readonly dropped = new Set<OperatorId>();
  /** Delays whose feedback input had not been placed yet */
  private readonly pendingFeedback: Array<{ delay: OperatorId; oldInput: OperatorId }> = [];
  changes = 0;

  constructor(readonly source: Circuit, readonly target: Circuit) {}

  isMapped(id: OperatorId): boolean {
    return this.mapping.has(id);
  }

  isDropped(id: OperatorId): boolean {
    return this.dropped.has(id);
  }

  /** Handle of the replacement of source operator `id` */
  mapped(id: OperatorId): OperatorId {
    const next = this.mapping.get(id);
    invariant(next !== undefined, `Operator #${id} has no replacement yet`);
    return next;
  }

  /** The replacement operator itself */
  mappedOperator(id: OperatorId): Operator {
    return this.target.get(this.mapped(id));
  }

  inputs(op: Operator): OperatorId[] {
    return op.inputs.map(i => this.mapped(i));
  }

  /** Places `draft` in the new circuit as the replacement of `old` */
  map(old: Operator, draft: OperatorDraft): Operator {
    invariant(!this.mapping.has(old.id), `Operator #${old.id} mapped twice`);
    const placed = this.target.add(draft);
    this.mapping.set(old.id, placed.id);
    return placed;
  }

  /** Like `map`, but counted as a change */
  rewrite(old: Operator, draft: OperatorDraft): Operator {
    this.changes++;
    return this.map(old, draft);
  }

  /** Declares that `old` is replaced by an operator already in the new circuit */
  alias(old: Operator, replacement: OperatorId): void {
    invariant(!this.mapping.has(old.id), `Operator #${old.id} mapped twice`);
    this.target.get(replacement);
    this.mapping.set(old.id, replacement);
    this.changes++;
  }

  /** Omits `old` from the new circuit */
  drop(old: Operator): void {
    this.dropped.add(old.id);
    this.changes++;
  }

  /** Copies `old` unchanged apart from its resolved inputs */
  copy(old: Operator): Operator {
    if (old.kind === 'delay') {
      const [input] = old.inputs;
      if (!this.mapping.has(input)) {
        const placed = this.map(old, { ...old, inputs: [] });
        this.pendingFeedback.push({ delay: placed.id, oldInput: input });
        return placed;
      }
    }
    return this.map(old, { ...old, inputs: this.inputs(old) });
  }

  /** Connects delay feedback edges once every operator has been placed */
  finish(): void {
    for (const { delay, oldInput } of this.pendingFeedback) {
      this.target.connectFeedback(delay, this.mapped(oldInput));
    }
  }
}

/**
 * Base class of every circuit rewrite. Subclasses override the hooks of the
 * operator kinds they transform; everything else is copied.
 */
export abstract class CircuitRewriter implements CircuitPass {
  abstract readonly name: string;

  apply(circuit: Circuit): Circuit {
    const ctx = new RewriteContext(circuit, new Circuit());
    this.prepare(circuit);
    for (const op of circuit.topologicalOrder()) {
      this.postorder(op, ctx);
      invariant(
        ctx.isMapped(op.id) || ctx.isDropped(op.id),
        `${this.name} left operator #${op.id} without a replacement`
      );
    }
    ctx.finish();
    log('%s: %d -> %d operators, %d change(s)', this.name, circuit.size, ctx.target.size, ctx.changes);
    return ctx.target;
  }

  /** Whole-circuit analysis before the traversal starts */
  protected prepare(_circuit: Circuit): void {}

  protected postorder(op: Operator, ctx: RewriteContext): void {
    switch (op.kind) {
      case 'source':
        return this.postorderSource(op, ctx);
      case 'constant':
        return this.postorderConstant(op, ctx);
      case 'map':
        return this.postorderMap(op, ctx);
      case 'filter':
        return this.postorderFilter(op, ctx);
      case 'index':
        return this.postorderIndex(op, ctx);
      case 'deindex':
        return this.postorderDeindex(op, ctx);
      case 'join':
        return this.postorderJoin(op, ctx);
      case 'aggregate':
        return this.postorderAggregate(op, ctx);
      case 'distinct':
        return this.postorderDistinct(op, ctx);
      case 'window':
        return this.postorderWindow(op, ctx);
      case 'setop':
        return this.postorderSetOp(op, ctx);
      case 'delay':
        return this.postorderDelay(op, ctx);
      case 'integrate':
        return this.postorderIntegrate(op, ctx);
      case 'differentiate':
        return this.postorderDifferentiate(op, ctx);
      case 'sink':
        return this.postorderSink(op, ctx);
      default:
        return assertNever(op, 'operator');
    }
  }

  /** Fallback for every kind a subclass does not override */
  protected postorderDefault(op: Operator, ctx: RewriteContext): void {
    ctx.copy(op);
  }

  protected postorderSource(op: SourceOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderConstant(op: ConstantOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderMap(op: MapOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderFilter(op: FilterOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderIndex(op: IndexOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderDeindex(op: DeindexOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderJoin(op: JoinOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderAggregate(op: AggregateOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderDistinct(op: DistinctOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderWindow(op: WindowOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderSetOp(op: SetOpOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderDelay(op: DelayOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderIntegrate(op: IntegrateOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderDifferentiate(op: DifferentiateOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
  protected postorderSink(op: SinkOperator, ctx: RewriteContext): void { this.postorderDefault(op, ctx); }
}

/** Runs passes in order, validating the circuit after each one */
export function runPasses(circuit: Circuit, passes: readonly CircuitPass[]): Circuit {
  let current = circuit;
  for (const pass of passes) {
    current = pass.apply(current);
    current.validate();
  }
  return current;
}
