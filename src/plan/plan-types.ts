/**
 * Relational Plan Type Definitions
 * =================================
 *
 * The validated, fully typed relational plan the lowering consumes. Name
 * resolution and type checking have already happened upstream:
 *
 * - columns are referenced by position
 * - scalar expressions are typed Expression trees over the input row,
 *   bound to the variable `ROW` (see `column`)
 * - table metadata carries primary keys and lateness bounds
 *
 * @module
 */

import type { SourceRange } from '../common/errors';
import {
  field,
  variable,
  type Expression,
  type FieldExpression,
  type ScalarValue,
  type Value,
} from '../ir/expression';
import type { AggregateFunction, SetOperation, WindowFrame, WindowFunction } from '../ir/operators';
import type { RowType, Type } from '../ir/types';

/** Name of the row variable plan expressions are written over */
export const ROW = 'r';

/** Reference to input column `index` in a plan expression */
export function column(input: RowType, index: number): FieldExpression {
  return field(variable(ROW, input), index);
}

// ============ PROGRAM ============

export interface ColumnDefinition {
  name: string;
  type: Type;
  primaryKey?: boolean;
  /** Constant expression bounding how late values of this column may arrive */
  lateness?: Expression;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDefinition[];
  range?: SourceRange;
}

export interface ViewDefinition {
  name: string;
  query: PlanNode;
  /** Output column names; defaults to the query's */
  columnNames?: string[];
  /** Emit the view's full contents at every step instead of its changes */
  materialized?: boolean;
  range?: SourceRange;
}

export interface Program {
  tables: TableDefinition[];
  views: ViewDefinition[];
}

// ============ PLAN NODES ============

interface PlanNodeBase {
  range?: SourceRange;
}

/** Reads a table, or a view declared earlier in the program */
export interface ScanNode extends PlanNodeBase {
  kind: 'scan';
  name: string;
}

/** Literal rows (`VALUES`) */
export interface ValuesNode extends PlanNodeBase {
  kind: 'values';
  type: RowType;
  rows: Value[][];
}

export interface FilterNode extends PlanNodeBase {
  kind: 'filter';
  input: PlanNode;
  condition: Expression;
}

export interface ProjectNode extends PlanNodeBase {
  kind: 'project';
  input: PlanNode;
  expressions: Expression[];
  names?: string[];
}

export type JoinType = 'inner' | 'left' | 'right' | 'full';

/**
 * Join on `leftKeys[i] = rightKeys[i]`. The optional residual `condition`
 * is written over the concatenated row (left columns, then right columns).
 */
export interface JoinNode extends PlanNodeBase {
  kind: 'join';
  joinType: JoinType;
  left: PlanNode;
  right: PlanNode;
  leftKeys: number[];
  rightKeys: number[];
  condition?: Expression;
}

export type CorrelateType = 'inner' | 'left' | 'semi' | 'anti';

/**
 * A correlated sub-query after de-correlation: `right` depends on `left`
 * only through the correlation columns. Semi and anti forms output the
 * left row only.
 */
export interface CorrelateNode extends PlanNodeBase {
  kind: 'correlate';
  correlateType: CorrelateType;
  left: PlanNode;
  right: PlanNode;
  leftKeys: number[];
  rightKeys: number[];
}

export interface AggregateCallNode {
  fn: AggregateFunction;
  /** Input column; absent for COUNT(*) */
  argument?: number;
  distinct?: boolean;
  name?: string;
  range?: SourceRange;
}

/** Output: group columns, then one column per aggregate */
export interface AggregateNode extends PlanNodeBase {
  kind: 'aggregate';
  input: PlanNode;
  groupBy: number[];
  aggregates: AggregateCallNode[];
}

export interface SortKey {
  /** Column index, or a 1-based output ordinal when `ordinal` is set */
  column: number;
  ordinal?: boolean;
  ascending?: boolean;
}

export interface WindowCallNode {
  fn: WindowFunction;
  argument?: number;
  /** LAG/LEAD distance, default 1 */
  offset?: number;
  frame?: WindowFrame;
  name?: string;
  range?: SourceRange;
}

export interface WindowGroup {
  partitionBy: number[];
  orderBy: SortKey[];
  calls: WindowCallNode[];
}

/** Output: input columns, then one column per call, groups in order */
export interface WindowNode extends PlanNodeBase {
  kind: 'window';
  input: PlanNode;
  groups: WindowGroup[];
}

export interface SetOpNode extends PlanNodeBase {
  kind: 'setop';
  op: SetOperation;
  all: boolean;
  inputs: PlanNode[];
}

export interface DistinctNode extends PlanNodeBase {
  kind: 'distinct';
  input: PlanNode;
}

/** Output: group columns, then one column per pivot value */
export interface PivotNode extends PlanNodeBase {
  kind: 'pivot';
  input: PlanNode;
  groupBy: number[];
  pivotColumn: number;
  values: ScalarValue[];
  aggregate: AggregateCallNode;
  /** Output column names of the pivot values */
  names?: string[];
}

/** ORDER BY with optional LIMIT; only a LIMIT changes the contents */
export interface SortNode extends PlanNodeBase {
  kind: 'sort';
  input: PlanNode;
  keys: SortKey[];
  limit?: number;
}

export type PlanNode =
  | ScanNode
  | ValuesNode
  | FilterNode
  | ProjectNode
  | JoinNode
  | CorrelateNode
  | AggregateNode
  | WindowNode
  | SetOpNode
  | DistinctNode
  | PivotNode
  | SortNode;

export type PlanNodeKind = PlanNode['kind'];
