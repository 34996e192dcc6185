/**
 * Join Lowering
 * ==============
 *
 * Equi-joins become a Join over two Index operators keyed on the join
 * columns. Outer joins add, per preserved side, an anti-join branch padded
 * with nulls:
 *
 *   matched = Distinct(side part of the inner join)
 *   anti    = side EXCEPT Join(side, matched)
 *
 * Semi and anti correlations join against a Distinct of the right side's
 * keys instead.
 *
 * @module
 */

import { cast, field, nullLiteral, type Expression } from '../ir/expression';
import {
  commonType,
  concatRows,
  fieldAt,
  nullableFields,
  typeEquals,
  withNullability,
  type RowType,
  type Type,
} from '../ir/types';
import { ReportedError, type SourceRange } from '../common/errors';
import type { CorrelateType, JoinType } from './plan-types';
import type { IndexedStream, Stream, StreamBuilder } from './streams';

export interface EquiJoinOptions {
  /** Residual condition over the concatenated row */
  condition?: Expression;
  /** Null keys match each other (grouping semantics) instead of never matching */
  nullsMatch?: boolean;
  range?: SourceRange;
}

function keyTypes(
  b: StreamBuilder,
  left: RowType,
  right: RowType,
  leftKeys: readonly number[],
  rightKeys: readonly number[],
  nullsMatch: boolean,
  range?: SourceRange
): Type[] {
  return leftKeys.map((l, i) => {
    const common = commonType(fieldAt(left, l).type, fieldAt(right, rightKeys[i]).type, b.reporter, range);
    if (common.kind === 'error') {
      throw new ReportedError('Join key types are incompatible', range);
    }
    return nullsMatch ? common : withNullability(common, false);
  });
}

/** Indexes `input` by `keys` cast to `types`, keeping the whole row as value */
function keyed(
  b: StreamBuilder,
  input: Stream,
  keys: readonly number[],
  types: readonly Type[],
  nullsMatch: boolean,
  range?: SourceRange
): IndexedStream {
  const filtered = nullsMatch ? input : b.dropNullKeys(input, keys, range);
  return b.index(
    filtered,
    r => keys.map((c, i) => {
      const value = field(r, c);
      return typeEquals(value.type, types[i]) ? value : cast(value, types[i]);
    }),
    r => filtered.type.fields.map((_, i) => field(r, i)),
    filtered.type.fields.map(f => f.name),
    range
  );
}

/** Inner equi-join emitting left columns then right columns */
export function innerJoin(
  b: StreamBuilder,
  left: Stream,
  right: Stream,
  leftKeys: readonly number[],
  rightKeys: readonly number[],
  options: EquiJoinOptions = {}
): Stream {
  const nullsMatch = options.nullsMatch ?? false;
  const types = keyTypes(b, left.type, right.type, leftKeys, rightKeys, nullsMatch, options.range);
  const joined = b.joinConcat(
    keyed(b, left, leftKeys, types, nullsMatch, options.range),
    keyed(b, right, rightKeys, types, nullsMatch, options.range),
    options.range
  );
  return options.condition ? b.filter(joined, options.condition, options.range) : joined;
}

/**
 * Rows of `side` with no partner in `inner`; `offset` is where the side's
 * columns start in the inner join's rows.
 */
function unmatched(b: StreamBuilder, side: Stream, inner: Stream, offset: number, range?: SourceRange): Stream {
  const columns = side.type.fields.map((_, i) => offset + i);
  const matched = b.distinct(b.conform(b.select(inner, columns, range), side.type, range), range);
  const all = side.type.fields.map((_, i) => i);
  const semi = b.join(
    b.indexColumns(side, all, range),
    b.indexColumns(matched, all, range),
    (_k, l) => side.type.fields.map((_, i) => field(l, i)),
    side.type.fields.map(f => f.name),
    range
  );
  return b.setop('except', side, semi, range);
}

/** Inner, left, right or full equi-join */
export function equiJoin(
  b: StreamBuilder,
  joinType: JoinType,
  left: Stream,
  right: Stream,
  leftKeys: readonly number[],
  rightKeys: readonly number[],
  options: EquiJoinOptions = {}
): Stream {
  const inner = innerJoin(b, left, right, leftKeys, rightKeys, options);
  if (joinType === 'inner') return inner;

  const padLeft = joinType === 'right' || joinType === 'full';
  const padRight = joinType === 'left' || joinType === 'full';
  const output = concatRows(
    padLeft ? nullableFields(left.type) : left.type,
    padRight ? nullableFields(right.type) : right.type
  );

  let result = b.conform(inner, output, options.range);
  if (padRight) {
    const anti = unmatched(b, left, inner, 0, options.range);
    const padded = b.map(
      anti,
      r => [
        ...left.type.fields.map((_, i) => field(r, i)),
        ...right.type.fields.map(f => nullLiteral(f.type)),
      ],
      output.fields.map(f => f.name),
      options.range
    );
    result = b.setop('union', result, b.conform(padded, output, options.range), options.range);
  }
  if (padLeft) {
    const anti = unmatched(b, right, inner, left.type.fields.length, options.range);
    const padded = b.map(
      anti,
      r => [
        ...left.type.fields.map(f => nullLiteral(f.type)),
        ...right.type.fields.map((_, i) => field(r, i)),
      ],
      output.fields.map(f => f.name),
      options.range
    );
    result = b.setop('union', result, b.conform(padded, output, options.range), options.range);
  }
  return result;
}

/** Lowers a de-correlated sub-query joined on its correlation columns */
export function correlate(
  b: StreamBuilder,
  correlateType: CorrelateType,
  left: Stream,
  right: Stream,
  leftKeys: readonly number[],
  rightKeys: readonly number[],
  range?: SourceRange
): Stream {
  if (correlateType === 'inner' || correlateType === 'left') {
    return equiJoin(b, correlateType, left, right, leftKeys, rightKeys, { range });
  }
  const types = keyTypes(b, left.type, right.type, leftKeys, rightKeys, false, range);
  const rightKeyRows = b.distinct(b.select(b.dropNullKeys(right, rightKeys, range), rightKeys, range), range);
  const semi = b.join(
    keyed(b, left, leftKeys, types, false, range),
    keyed(b, rightKeyRows, rightKeys.map((_, i) => i), types, false, range),
    (_k, l) => left.type.fields.map((_, i) => field(l, i)),
    left.type.fields.map(f => f.name),
    range
  );
  return correlateType === 'semi' ? semi : b.setop('except', left, semi, range);
}
