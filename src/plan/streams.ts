/**
 * Stream Builder
 * ===============
 *
 * Typed helpers the lowering uses to place operators. Each helper computes
 * the output stream type from its inputs and payload, so lowering code
 * deals in streams rather than raw operator drafts.
 *
 * @module
 */

import type { DiagnosticReporter } from '../common/diagnostics';
import { ReportedError, invariant, type SourceRange } from '../common/errors';
import type { Circuit } from '../ir/circuit';
import {
  call,
  cast,
  closure,
  closureRowType,
  field,
  tuple,
  variable,
  type ClosureExpression,
  type Expression,
  type LiteralExpression,
  type VariableExpression,
} from '../ir/expression';
import {
  elementType,
  indexedOf,
  zsetOf,
  type AggregateCall,
  type ColumnMetadata,
  type OperatorDraft,
  type OperatorId,
  type OrderKey,
  type SetOperation,
  type WindowCall,
} from '../ir/operators';
import {
  asRowType,
  commonType,
  concatRows,
  fieldAt,
  rowType,
  typeEquals,
  typeToString,
  type RowType,
} from '../ir/types';
import { ROW } from './plan-types';

/** A Z-set of rows */
export interface Stream {
  readonly id: OperatorId;
  readonly type: RowType;
}

/** A Z-set of `(key, value)` pairs */
export interface IndexedStream {
  readonly id: OperatorId;
  readonly key: RowType;
  readonly value: RowType;
}

export class StreamBuilder {
  constructor(readonly circuit: Circuit, readonly reporter: DiagnosticReporter) {}

  private add(draft: OperatorDraft): OperatorId {
    return this.circuit.add(draft).id;
  }

  private rowFunction(type: RowType, body: (row: VariableExpression) => Expression): ClosureExpression {
    return closure([{ name: ROW, type }], body(variable(ROW, type)));
  }

  // ============ LINEAR ============

  source(name: string, columns: readonly ColumnMetadata[], range?: SourceRange): Stream {
    const type = rowType(columns.map(c => ({ name: c.name, type: c.type })));
    const id = this.add({ kind: 'source', inputs: [], outputType: zsetOf(type), name, columns, range });
    return { id, type };
  }

  constant(type: RowType, rows: readonly LiteralExpression[], range?: SourceRange): Stream {
    return { id: this.add({ kind: 'constant', inputs: [], outputType: zsetOf(type), rows, range }), type };
  }

  mapWith(input: Stream | IndexedStream, fn: ClosureExpression, range?: SourceRange): Stream {
    const type = closureRowType(fn);
    return { id: this.add({ kind: 'map', inputs: [input.id], outputType: zsetOf(type), fn, range }), type };
  }

  /** Map with `|r| (build(r)...)` */
  map(
    input: Stream,
    build: (row: VariableExpression) => Expression[],
    names?: readonly string[],
    range?: SourceRange
  ): Stream {
    return this.mapWith(input, this.rowFunction(input.type, r => tuple(build(r), names)), range);
  }

  /** Keeps the given columns, in the given order */
  select(input: Stream, columns: readonly number[], range?: SourceRange): Stream {
    return this.map(
      input,
      r => columns.map(i => field(r, i)),
      columns.map(i => fieldAt(input.type, i).name),
      range
    );
  }

  /** Renames and widens columns so the stream has exactly `type` */
  conform(input: Stream, type: RowType, range?: SourceRange): Stream {
    if (typeEquals(input.type, type)) return input;
    invariant(
      input.type.fields.length === type.fields.length,
      `Cannot conform ${typeToString(input.type)} to ${typeToString(type)}`,
      range
    );
    return this.map(
      input,
      r => type.fields.map((f, i) => {
        const value = field(r, i);
        return typeEquals(value.type, f.type) ? value : cast(value, f.type);
      }),
      type.fields.map(f => f.name),
      range
    );
  }

  /** Keeps rows for which `condition` (over `ROW`) is true */
  filter(input: Stream, condition: Expression, range?: SourceRange): Stream {
    const predicate = closure([{ name: ROW, type: input.type }], condition);
    return { id: this.add({ kind: 'filter', inputs: [input.id], outputType: zsetOf(input.type), predicate, range }), type: input.type };
  }

  /** Drops rows with a null in any of `columns` */
  dropNullKeys(input: Stream, columns: readonly number[], range?: SourceRange): Stream {
    const nullableColumns = columns.filter(i => fieldAt(input.type, i).type.nullable);
    if (nullableColumns.length === 0) return input;
    const row = variable(ROW, input.type);
    const tests = nullableColumns.map(i => call('is_not_null', [field(row, i)], this.reporter, range));
    const condition = tests.slice(1).reduce<Expression>((acc, t) => call('and', [acc, t], this.reporter, range), tests[0]);
    return this.filter(input, condition, range);
  }

  index(
    input: Stream,
    keys: (row: VariableExpression) => Expression[],
    values: (row: VariableExpression) => Expression[],
    valueNames?: readonly string[],
    range?: SourceRange
  ): IndexedStream {
    const fn = this.rowFunction(input.type, r => {
      const key = tuple(keys(r));
      const value = tuple(values(r), valueNames);
      return tuple([key, value], ['key', 'value']);
    });
    const pair = closureRowType(fn);
    const key = asRowType(fieldAt(pair, 0).type);
    const value = asRowType(fieldAt(pair, 1).type);
    return { id: this.add({ kind: 'index', inputs: [input.id], outputType: indexedOf(key, value), fn, range }), key, value };
  }

  /** Indexes by the given columns, keeping the whole row as value */
  indexColumns(input: Stream, keys: readonly number[], range?: SourceRange): IndexedStream {
    return this.index(
      input,
      r => keys.map(i => field(r, i)),
      r => input.type.fields.map((_, i) => field(r, i)),
      input.type.fields.map(f => f.name),
      range
    );
  }

  deindex(input: IndexedStream, range?: SourceRange): Stream {
    return { id: this.add({ kind: 'deindex', inputs: [input.id], outputType: zsetOf(input.value), range }), type: input.value };
  }

  /** `(key, value)` → key fields followed by value fields */
  flatten(input: IndexedStream, names?: readonly string[], range?: SourceRange): Stream {
    const pair = elementType(indexedOf(input.key, input.value));
    const p = variable('p', pair);
    const key = field(p, 0);
    const value = field(p, 1);
    const fields = [
      ...input.key.fields.map((_, i) => field(key, i)),
      ...input.value.fields.map((_, i) => field(value, i)),
    ];
    const fieldNames = names ?? [...input.key.fields, ...input.value.fields].map(f => f.name);
    return this.mapWith(input, closure([{ name: 'p', type: pair }], tuple(fields, fieldNames)), range);
  }

  sink(input: Stream, viewName: string, range?: SourceRange): Stream {
    return { id: this.add({ kind: 'sink', inputs: [input.id], outputType: zsetOf(input.type), viewName, range }), type: input.type };
  }

  // ============ NON-LINEAR ============

  /** Inner join of two inputs indexed by equal key types */
  join(
    left: IndexedStream,
    right: IndexedStream,
    combine: (key: VariableExpression, l: VariableExpression, r: VariableExpression) => Expression[],
    names?: readonly string[],
    range?: SourceRange
  ): Stream {
    invariant(
      typeEquals(left.key, right.key),
      `Join key types differ: ${typeToString(left.key)} and ${typeToString(right.key)}`,
      range
    );
    const k = variable('k', left.key);
    const l = variable('l', left.value);
    const r = variable('r', right.value);
    const fn = closure(
      [{ name: 'k', type: left.key }, { name: 'l', type: left.value }, { name: 'r', type: right.value }],
      tuple(combine(k, l, r), names)
    );
    const type = closureRowType(fn);
    return { id: this.add({ kind: 'join', inputs: [left.id, right.id], outputType: zsetOf(type), fn, range }), type };
  }

  /** Join emitting left columns then right columns */
  joinConcat(left: IndexedStream, right: IndexedStream, range?: SourceRange): Stream {
    return this.join(
      left,
      right,
      (_k, l, r) => [
        ...left.value.fields.map((_, i) => field(l, i)),
        ...right.value.fields.map((_, i) => field(r, i)),
      ],
      [...left.value.fields, ...right.value.fields].map(f => f.name),
      range
    );
  }

  aggregate(input: IndexedStream, aggregates: readonly AggregateCall[], names: readonly string[], range?: SourceRange): IndexedStream {
    const value = rowType(aggregates.map((a, i) => ({ name: names[i], type: a.type })));
    const id = this.add({ kind: 'aggregate', inputs: [input.id], outputType: indexedOf(input.key, value), aggregates, range });
    return { id, key: input.key, value };
  }

  distinct(input: Stream, range?: SourceRange): Stream {
    return { id: this.add({ kind: 'distinct', inputs: [input.id], outputType: zsetOf(input.type), range }), type: input.type };
  }

  window(
    input: IndexedStream,
    orderBy: readonly OrderKey[],
    functions: readonly WindowCall[],
    names: readonly string[],
    range?: SourceRange
  ): IndexedStream {
    const appended = rowType(functions.map((f, i) => ({ name: names[i], type: f.type })));
    const value = concatRows(input.value, appended);
    const id = this.add({ kind: 'window', inputs: [input.id], outputType: indexedOf(input.key, value), orderBy, functions, range });
    return { id, key: input.key, value };
  }

  /** Weighted set operation; both inputs are widened to their common type */
  setop(op: SetOperation, left: Stream, right: Stream, range?: SourceRange): Stream {
    const common = commonType(left.type, right.type, this.reporter, range);
    if (common.kind !== 'row') {
      throw new ReportedError(`No common row type for ${op}`, range);
    }
    const type = rowType(common.fields, false);
    const a = this.conform(left, type, range);
    const b = this.conform(right, type, range);
    return { id: this.add({ kind: 'setop', inputs: [a.id, b.id], outputType: zsetOf(type), op, range }), type };
  }

  integrate(input: Stream, range?: SourceRange): Stream {
    return { id: this.add({ kind: 'integrate', inputs: [input.id], outputType: zsetOf(input.type), range }), type: input.type };
  }
}
