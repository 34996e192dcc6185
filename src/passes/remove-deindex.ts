/**
 * Deindex canonicalization: every Deindex becomes a Map that keeps the
 * value half of each `(key, value)` pair. Later passes never see Deindex.
 *
 * @module
 */

import { closure, field, variable } from '../ir/expression';
import { elementType, type DeindexOperator } from '../ir/operators';
import { invariant } from '../common/errors';
import { CircuitRewriter, type RewriteContext } from '../visitors/outer';

export class RemoveDeindex extends CircuitRewriter {
  readonly name = 'remove-deindex';

  protected postorderDeindex(op: DeindexOperator, ctx: RewriteContext): void {
    const input = ctx.mappedOperator(op.inputs[0]);
    invariant(input.outputType.kind === 'indexed', `Deindex #${op.id} reads a non-indexed stream`, op.range);
    const pair = elementType(input.outputType);
    const fn = closure([{ name: 'p', type: pair }], field(variable('p', pair), 1));
    ctx.rewrite(op, { kind: 'map', inputs: [input.id], outputType: op.outputType, range: op.range, fn });
  }
}
