/**
 * Circuit Operators
 * ==================
 *
 * The closed set of operator variants a circuit is made of. Operators hold
 * integer handles to their inputs; the owning Circuit holds the operators.
 *
 * Every operator works on weighted multisets (Z-sets):
 * - LINEAR operators (map, filter, index, deindex, union/except, sink) work
 *   directly on deltas
 * - Join is BILINEAR and keeps an index of both inputs
 * - Distinct, aggregate, window and intersect keep integrated state
 *
 * @module
 */

import { assertNever, type SourceRange } from '../common/errors';
import {
  expressionToString,
  type ClosureExpression,
  type Expression,
  type LiteralExpression,
} from './expression';
import { rowType, typeToString, type RowType, type Type } from './types';

export type OperatorId = number;

// ============ STREAM TYPES ============

/** Z-set of rows */
export interface ZSetStreamType {
  readonly kind: 'zset';
  readonly element: RowType;
}

/** Z-set of (key, value) pairs, indexed by key */
export interface IndexedStreamType {
  readonly kind: 'indexed';
  readonly key: RowType;
  readonly value: RowType;
}

export type StreamType = ZSetStreamType | IndexedStreamType;

export const zsetOf = (element: RowType): ZSetStreamType => ({ kind: 'zset', element });
export const indexedOf = (key: RowType, value: RowType): IndexedStreamType => ({ kind: 'indexed', key, value });

/**
 * Row type a closure over this stream receives: the row itself, or a
 * `(key, value)` pair for indexed streams.
 */
export function elementType(stream: StreamType): RowType {
  if (stream.kind === 'zset') return stream.element;
  return rowType([
    { name: 'key', type: stream.key },
    { name: 'value', type: stream.value },
  ]);
}

export function streamTypeToString(stream: StreamType): string {
  return stream.kind === 'zset'
    ? `ZSet<${typeToString(stream.element)}>`
    : `Indexed<${typeToString(stream.key)}, ${typeToString(stream.value)}>`;
}

// ============ PAYLOAD TYPES ============

/** Metadata of an input table column */
export interface ColumnMetadata {
  readonly name: string;
  readonly type: Type;
  readonly isPrimaryKey: boolean;
  /** Constant expression bounding how late values may arrive */
  readonly lateness?: Expression;
}

export type AggregateFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface AggregateCall {
  readonly fn: AggregateFunction;
  /** Value extractor over the group's value row; absent for COUNT(*) */
  readonly argument?: ClosureExpression;
  readonly type: Type;
}

/** Aggregates whose fold can be undone by a negative weight */
export function isInvertible(fn: AggregateFunction): boolean {
  return fn === 'count' || fn === 'sum' || fn === 'avg';
}

export type FrameBoundKind = 'unbounded_preceding' | 'preceding' | 'current' | 'following' | 'unbounded_following';

export interface FrameBound {
  readonly kind: FrameBoundKind;
  readonly offset?: number;
}

export interface WindowFrame {
  readonly unit: 'rows' | 'range';
  readonly start: FrameBound;
  readonly end: FrameBound;
}

/** RANGE BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW */
export const DEFAULT_FRAME: WindowFrame = {
  unit: 'range',
  start: { kind: 'unbounded_preceding' },
  end: { kind: 'current' },
};

export type WindowFunction =
  | 'row_number'
  | 'rank'
  | 'dense_rank'
  | 'sum'
  | 'count'
  | 'avg'
  | 'min'
  | 'max'
  | 'lag'
  | 'lead';

export type RankingFunction = 'row_number' | 'rank' | 'dense_rank';

export function isRankingFunction(fn: WindowFunction): fn is RankingFunction {
  return fn === 'row_number' || fn === 'rank' || fn === 'dense_rank';
}

export interface WindowCall {
  readonly fn: WindowFunction;
  /** Field of the value row the function reads */
  readonly argument?: number;
  /** LAG/LEAD distance */
  readonly offset?: number;
  readonly frame: WindowFrame;
  readonly type: Type;
}

export interface OrderKey {
  /** Field of the value row */
  readonly index: number;
  readonly ascending: boolean;
}

export type SetOperation = 'union' | 'except' | 'intersect';

// ============ OPERATOR VARIANTS ============

interface OperatorBase {
  readonly id: OperatorId;
  readonly inputs: readonly OperatorId[];
  readonly outputType: StreamType;
  /** Position of the query construct this operator was lowered from */
  readonly range?: SourceRange;
}

export interface SourceOperator extends OperatorBase {
  readonly kind: 'source';
  readonly name: string;
  readonly columns: readonly ColumnMetadata[];
}

export interface ConstantOperator extends OperatorBase {
  readonly kind: 'constant';
  /** Row literals, each with weight 1, emitted at the first step */
  readonly rows: readonly LiteralExpression[];
}

export interface MapOperator extends OperatorBase {
  readonly kind: 'map';
  readonly fn: ClosureExpression;
}

export interface FilterOperator extends OperatorBase {
  readonly kind: 'filter';
  readonly predicate: ClosureExpression;
}

export interface IndexOperator extends OperatorBase {
  readonly kind: 'index';
  /** Returns `(key, value)` */
  readonly fn: ClosureExpression;
}

export interface DeindexOperator extends OperatorBase {
  readonly kind: 'deindex';
}

export interface JoinOperator extends OperatorBase {
  readonly kind: 'join';
  /** `|key, left, right| row` */
  readonly fn: ClosureExpression;
}

export interface AggregateOperator extends OperatorBase {
  readonly kind: 'aggregate';
  readonly aggregates: readonly AggregateCall[];
}

export interface DistinctOperator extends OperatorBase {
  readonly kind: 'distinct';
}

export interface WindowOperator extends OperatorBase {
  readonly kind: 'window';
  readonly orderBy: readonly OrderKey[];
  readonly functions: readonly WindowCall[];
}

export interface SetOpOperator extends OperatorBase {
  readonly kind: 'setop';
  readonly op: SetOperation;
}

/** Output at step t is the input at step t-1; its input edge may close a cycle */
export interface DelayOperator extends OperatorBase {
  readonly kind: 'delay';
}

export interface IntegrateOperator extends OperatorBase {
  readonly kind: 'integrate';
}

export interface DifferentiateOperator extends OperatorBase {
  readonly kind: 'differentiate';
}

/** Declared view output */
export interface SinkOperator extends OperatorBase {
  readonly kind: 'sink';
  readonly viewName: string;
}

export type Operator =
  | SourceOperator
  | ConstantOperator
  | MapOperator
  | FilterOperator
  | IndexOperator
  | DeindexOperator
  | JoinOperator
  | AggregateOperator
  | DistinctOperator
  | WindowOperator
  | SetOpOperator
  | DelayOperator
  | IntegrateOperator
  | DifferentiateOperator
  | SinkOperator;

export type OperatorKind = Operator['kind'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An operator before the circuit assigns its handle */
export type OperatorDraft = DistributiveOmit<Operator, 'id'>;

// ============ PAYLOAD ACCESS ============

/**
 * Rebuilds an operator with every embedded closure passed through `fn`.
 * Returns the same object when nothing changed.
 */
export function mapClosures<T extends OperatorDraft>(op: T, fn: (c: ClosureExpression) => ClosureExpression): T;
export function mapClosures(op: OperatorDraft, fn: (c: ClosureExpression) => ClosureExpression): OperatorDraft {
  switch (op.kind) {
    case 'map':
    case 'index':
    case 'join': {
      const next = fn(op.fn);
      return next === op.fn ? op : { ...op, fn: next };
    }
    case 'filter': {
      const next = fn(op.predicate);
      return next === op.predicate ? op : { ...op, predicate: next };
    }
    case 'aggregate': {
      let changed = false;
      const aggregates = op.aggregates.map(a => {
        if (!a.argument) return a;
        const argument = fn(a.argument);
        if (argument === a.argument) return a;
        changed = true;
        return { ...a, argument };
      });
      return changed ? { ...op, aggregates } : op;
    }
    case 'source':
    case 'constant':
    case 'deindex':
    case 'distinct':
    case 'window':
    case 'setop':
    case 'delay':
    case 'integrate':
    case 'differentiate':
    case 'sink':
      return op;
    default:
      return assertNever(op, 'operator');
  }
}

// ============ PRINTING ============

function frameToString(frame: WindowFrame): string {
  const bound = (b: FrameBound) => (b.offset !== undefined ? `${b.offset} ${b.kind}` : b.kind);
  return `${frame.unit} ${bound(frame.start)}..${bound(frame.end)}`;
}

function payloadToString(op: Operator): string {
  switch (op.kind) {
    case 'source':
      return `${op.name} [${op.columns.map(c => `${c.isPrimaryKey ? '*' : ''}${c.name}${c.lateness ? ` lateness ${expressionToString(c.lateness)}` : ''}`).join(', ')}]`;
    case 'constant':
      return op.rows.map(expressionToString).join(', ');
    case 'map':
    case 'index':
    case 'join':
      return expressionToString(op.fn);
    case 'filter':
      return expressionToString(op.predicate);
    case 'aggregate':
      return op.aggregates
        .map(a => `${a.fn}(${a.argument ? expressionToString(a.argument) : '*'}): ${typeToString(a.type)}`)
        .join(', ');
    case 'window': {
      const order = op.orderBy.map(o => `${o.index} ${o.ascending ? 'asc' : 'desc'}`).join(', ');
      const fns = op.functions
        .map(f => `${f.fn}(${f.argument ?? ''}${f.offset !== undefined ? `, ${f.offset}` : ''}) ${frameToString(f.frame)}`)
        .join(', ');
      return `order by [${order}] ${fns}`;
    }
    case 'setop':
      return op.op;
    case 'sink':
      return op.viewName;
    case 'deindex':
    case 'distinct':
    case 'delay':
    case 'integrate':
    case 'differentiate':
      return '';
    default:
      return assertNever(op, 'operator');
  }
}

/** One-line description, e.g. `#3 = filter(#2) |r: ...| ... : ZSet<...>` */
export function operatorToString(op: Operator): string {
  const inputs = op.inputs.map(i => `#${i}`).join(', ');
  const payload = payloadToString(op);
  return `#${op.id} = ${op.kind}(${inputs})${payload ? ` ${payload}` : ''} : ${streamTypeToString(op.outputType)}`;
}
