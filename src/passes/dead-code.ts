/**
 * Dead-code elimination: keeps operators a view sink reads from, directly
 * or transitively (feedback edges included), plus every source.
 *
 * @module
 */

import type { Circuit } from '../ir/circuit';
import type { Operator, OperatorId } from '../ir/operators';
import { CircuitRewriter, type RewriteContext } from '../visitors/outer';

/** Handles reachable backwards from the view sinks */
export function liveOperators(circuit: Circuit): Set<OperatorId> {
  const live = new Set<OperatorId>();
  const stack: OperatorId[] = circuit.sinks().map(s => s.id);
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || live.has(id)) continue;
    live.add(id);
    stack.push(...circuit.get(id).inputs);
  }
  for (const source of circuit.sources()) {
    live.add(source.id);
  }
  return live;
}

export class DeadCode extends CircuitRewriter {
  readonly name = 'dead-code';
  private live = new Set<OperatorId>();

  protected prepare(circuit: Circuit): void {
    this.live = liveOperators(circuit);
  }

  protected postorderDefault(op: Operator, ctx: RewriteContext): void {
    if (this.live.has(op.id)) {
      ctx.copy(op);
    } else {
      ctx.drop(op);
    }
  }
}
