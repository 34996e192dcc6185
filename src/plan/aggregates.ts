/**
 * Aggregate Lowering
 * ===================
 *
 * GROUP BY aggregation:
 *
 *   plain aggregates     Index(group) → Aggregate → Map(flatten)
 *   DISTINCT aggregates  Map(group ++ arg) → Distinct → Index(group) → Aggregate → Map(flatten)
 *
 * One DISTINCT pipeline is built per distinct argument column. When a query
 * mixes branches they are joined back on the group key (nulls match, since
 * grouping puts nulls together) and a final Map restores declaration order.
 *
 * PIVOT builds one filtered aggregate per pivot value and left-joins each
 * onto the distinct group keys, so a group with no row for some value still
 * yields a row, with that pivot column null.
 *
 * @module
 */

import type { DiagnosticReporter } from '../common/diagnostics';
import { createLogger } from '../common/logger';
import type { SourceRange } from '../common/errors';
import { call, closure, field, literal, variable } from '../ir/expression';
import type { AggregateCall, AggregateFunction } from '../ir/operators';
import {
  ERROR_TYPE,
  fieldAt,
  isNumeric,
  nullable,
  scalar,
  typeToString,
  withNullability,
  type RowType,
  type Type,
} from '../ir/types';
import { equiJoin, innerJoin } from './joins';
import { column, type AggregateCallNode, type AggregateNode, type PivotNode } from './plan-types';
import type { Stream, StreamBuilder } from './streams';

const log = createLogger('lowering:aggregate');

/** Result type of an aggregate over a column of type `argument` */
export function aggregateResultType(
  fn: AggregateFunction,
  argument: Type | undefined,
  reporter: DiagnosticReporter,
  range?: SourceRange
): Type {
  if (fn === 'count') return scalar('BIGINT');
  if (!argument) {
    reporter.report('error', range, `${fn.toUpperCase()} requires an argument`, 'TypeMismatch');
    return ERROR_TYPE;
  }
  if ((fn === 'sum' || fn === 'avg') && argument.kind !== 'error' && !isNumeric(argument)) {
    reporter.report(
      'error',
      range,
      `Type mismatch: ${fn.toUpperCase()} cannot be applied to ${typeToString(argument)}`,
      'TypeMismatch'
    );
    return ERROR_TYPE;
  }
  return nullable(argument);
}

/** Builds the AggregateCall reading field `index` of the value row */
function aggregateCall(
  b: StreamBuilder,
  node: AggregateCallNode,
  value: RowType,
  index: number | undefined
): AggregateCall {
  if (index === undefined) {
    return { fn: node.fn, type: aggregateResultType(node.fn, undefined, b.reporter, node.range) };
  }
  const argument = closure([{ name: 'v', type: value }], field(variable('v', value), index));
  return { fn: node.fn, argument, type: aggregateResultType(node.fn, argument.type, b.reporter, node.range) };
}

function aggregateName(node: AggregateCallNode, position: number): string {
  return node.name ?? `${node.fn}${position}`;
}

/** DISTINCT only changes COUNT, SUM and AVG */
function needsDistinctStage(node: AggregateCallNode): boolean {
  return node.distinct === true && node.argument !== undefined && node.fn !== 'min' && node.fn !== 'max';
}

interface Branch {
  /** Group columns followed by this branch's aggregate columns */
  stream: Stream;
  /** Declared positions of the aggregates the branch computes */
  positions: number[];
}

export function lowerAggregate(b: StreamBuilder, input: Stream, node: AggregateNode): Stream {
  const groupBy = node.groupBy;
  const groupNames = groupBy.map(i => fieldAt(input.type, i, node.range).name);
  const names = node.aggregates.map(aggregateName);

  if (node.aggregates.length === 0) {
    return b.distinct(b.select(input, groupBy, node.range), node.range);
  }

  const plain: number[] = [];
  const distinctByArgument = new Map<number, number[]>();
  node.aggregates.forEach((a, position) => {
    if (needsDistinctStage(a) && a.argument !== undefined) {
      const positions = distinctByArgument.get(a.argument) ?? [];
      positions.push(position);
      distinctByArgument.set(a.argument, positions);
    } else {
      plain.push(position);
    }
  });

  const branches: Branch[] = [];
  if (plain.length > 0) {
    const indexed = b.indexColumns(input, groupBy, node.range);
    const calls = plain.map(p => aggregateCall(b, node.aggregates[p], indexed.value, node.aggregates[p].argument));
    const aggregated = b.aggregate(indexed, calls, plain.map(p => names[p]), node.range);
    branches.push({ stream: b.flatten(aggregated, [...groupNames, ...plain.map(p => names[p])], node.range), positions: plain });
  }

  for (const [argument, positions] of distinctByArgument) {
    const argumentName = fieldAt(input.type, argument, node.range).name;
    const pairs = b.map(
      input,
      r => [...groupBy.map(i => field(r, i)), field(r, argument)],
      [...groupNames, argumentName],
      node.range
    );
    const unique = b.distinct(pairs, node.range);
    const indexed = b.index(
      unique,
      r => groupBy.map((_, i) => field(r, i)),
      r => [field(r, groupBy.length)],
      [argumentName],
      node.range
    );
    const calls = positions.map(p => aggregateCall(b, node.aggregates[p], indexed.value, 0));
    const aggregated = b.aggregate(indexed, calls, positions.map(p => names[p]), node.range);
    branches.push({
      stream: b.flatten(aggregated, [...groupNames, ...positions.map(p => names[p])], node.range),
      positions,
    });
    log('DISTINCT stage over %s for %d aggregate(s)', argumentName, positions.length);
  }

  const groupColumns = groupBy.map((_, i) => i);
  let result = branches[0].stream;
  const order = [...branches[0].positions];
  for (const branch of branches.slice(1)) {
    const joined = innerJoin(b, result, branch.stream, groupColumns, groupColumns, { nullsMatch: true, range: node.range });
    // drop the branch's copy of the group columns
    const width = result.type.fields.length;
    const keep = [
      ...result.type.fields.map((_, i) => i),
      ...branch.positions.map((_, i) => width + groupBy.length + i),
    ];
    result = b.select(joined, keep, node.range);
    order.push(...branch.positions);
  }

  if (order.some((position, i) => position !== i)) {
    const reordered = [
      ...groupColumns,
      ...node.aggregates.map((_, position) => groupBy.length + order.indexOf(position)),
    ];
    result = b.select(result, reordered, node.range);
  }
  return result;
}

export function lowerPivot(b: StreamBuilder, input: Stream, node: PivotNode): Stream {
  const groupBy = node.groupBy;
  const groupColumns = groupBy.map((_, i) => i);
  const pivotType = withNullability(fieldAt(input.type, node.pivotColumn, node.range).type, false);
  const names = node.values.map((v, i) => node.names?.[i] ?? String(v));

  let result = b.distinct(b.select(input, groupBy, node.range), node.range);
  const aggregateColumns: number[] = [];

  node.values.forEach((value, i) => {
    const condition = call(
      '=',
      [column(input.type, node.pivotColumn), literal(pivotType, value)],
      b.reporter,
      node.range
    );
    const matching = b.filter(input, condition, node.range);
    const indexed = b.indexColumns(matching, groupBy, node.range);
    const aggregated = b.aggregate(
      indexed,
      [aggregateCall(b, node.aggregate, indexed.value, node.aggregate.argument)],
      [names[i]],
      node.range
    );
    const branch = b.flatten(aggregated, [...groupBy.map(c => fieldAt(input.type, c).name), names[i]], node.range);
    const width = result.type.fields.length;
    result = equiJoin(b, 'left', result, branch, groupColumns, groupColumns, { nullsMatch: true, range: node.range });
    aggregateColumns.push(width + groupBy.length);
  });

  // row-merging map: group columns, then one (possibly null) column per value
  return b.map(
    result,
    r => [...groupColumns.map(i => field(r, i)), ...aggregateColumns.map(i => field(r, i))],
    [...groupBy.map(c => fieldAt(input.type, c).name), ...names],
    node.range
  );
}
