/**
 * Operator Fusion
 * ================
 *
 * Collapses chains of consecutive Maps into one Map and chains of
 * consecutive Filters into one Filter. An operator is absorbed into its
 * consumer only when that consumer is its single reader; a chain feeding
 * a view sink therefore keeps its last operator.
 *
 * @module
 */

import { call, closure, variable, type ClosureExpression } from '../ir/expression';
import type { Circuit } from '../ir/circuit';
import type { FilterOperator, MapOperator, OperatorId } from '../ir/operators';
import { Substitution } from '../visitors/inner';
import { CircuitRewriter, type RewriteContext } from '../visitors/outer';

/** `|p| g(f(p))` */
export function composeMaps(f: ClosureExpression, g: ClosureExpression): ClosureExpression {
  const [q] = g.params;
  const body = new Substitution(new Map([[q.name, f.body]])).rewrite(g.body);
  return closure(f.params, body);
}

/** `|p| f(p) AND g(p)` */
export function conjoinPredicates(f: ClosureExpression, g: ClosureExpression): ClosureExpression {
  const [p] = f.params;
  const [q] = g.params;
  const second = q.name === p.name
    ? g.body
    : new Substitution(new Map([[q.name, variable(p.name, p.type)]])).rewrite(g.body);
  return closure(f.params, call('and', [f.body, second]));
}

/** An absorbed operator waiting for its consumer */
interface PendingStage {
  readonly input: OperatorId;
  readonly fn: ClosureExpression;
}

export class FuseOperators extends CircuitRewriter {
  readonly name = 'fuse-operators';
  private absorbed = new Set<OperatorId>();
  private pending = new Map<OperatorId, PendingStage>();

  protected prepare(circuit: Circuit): void {
    this.absorbed = new Set();
    this.pending = new Map();
    for (const op of circuit.all()) {
      if (op.kind !== 'map' && op.kind !== 'filter') continue;
      const readers = circuit.consumers(op.id);
      if (readers.length === 1 && readers[0].kind === op.kind && readers[0].inputs.length === 1) {
        this.absorbed.add(op.id);
      }
    }
  }

  /** Folds a pending upstream stage into `fn` */
  private resolve(
    op: MapOperator | FilterOperator,
    fn: ClosureExpression,
    ctx: RewriteContext,
    combine: (f: ClosureExpression, g: ClosureExpression) => ClosureExpression
  ): PendingStage {
    const upstream = this.pending.get(op.inputs[0]);
    if (!upstream) return { input: ctx.mapped(op.inputs[0]), fn };
    return { input: upstream.input, fn: combine(upstream.fn, fn) };
  }

  protected postorderMap(op: MapOperator, ctx: RewriteContext): void {
    const stage = this.resolve(op, op.fn, ctx, composeMaps);
    if (this.absorbed.has(op.id)) {
      this.pending.set(op.id, stage);
      ctx.drop(op);
      return;
    }
    if (stage.fn === op.fn) {
      ctx.copy(op);
      return;
    }
    ctx.rewrite(op, { ...op, inputs: [stage.input], fn: stage.fn });
  }

  protected postorderFilter(op: FilterOperator, ctx: RewriteContext): void {
    const stage = this.resolve(op, op.predicate, ctx, conjoinPredicates);
    if (this.absorbed.has(op.id)) {
      this.pending.set(op.id, stage);
      ctx.drop(op);
      return;
    }
    if (stage.fn === op.predicate) {
      ctx.copy(op);
      return;
    }
    ctx.rewrite(op, { ...op, inputs: [stage.input], predicate: stage.fn });
  }
}
