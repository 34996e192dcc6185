/**
 * Window Lowering
 * ================
 *
 * Each OVER clause lowers to Index(partition key) → Window → Deindex.
 * Clauses with the same PARTITION BY and ORDER BY are fused into a single
 * Window operator, so ranking functions and frame aggregates over the same
 * ordering share one sorted partition state. A trailing Map restores the
 * declared column order when fusion changed it.
 *
 * RANGE frames with a numeric offset need a single non-null numeric
 * ordering column; other shapes are reported as not yet implemented.
 *
 * @module
 */

import { UnsupportedError, invariant, type SourceRange } from '../common/errors';
import { createLogger } from '../common/logger';
import {
  DEFAULT_FRAME,
  isRankingFunction,
  type OrderKey,
  type WindowCall,
  type WindowFrame,
} from '../ir/operators';
import { ERROR_TYPE, fieldAt, isNumeric, nullable, scalar, typeToString, type RowType, type Type } from '../ir/types';
import { aggregateResultType } from './aggregates';
import type { SortKey, WindowCallNode, WindowGroup, WindowNode } from './plan-types';
import type { Stream, StreamBuilder } from './streams';

const log = createLogger('lowering:window');

/** ROWS BETWEEN UNBOUNDED PRECEDING AND UNBOUNDED FOLLOWING */
export const WHOLE_PARTITION: WindowFrame = {
  unit: 'rows',
  start: { kind: 'unbounded_preceding' },
  end: { kind: 'unbounded_following' },
};

/** ROWS BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW */
export const ROWS_TO_CURRENT: WindowFrame = {
  unit: 'rows',
  start: { kind: 'unbounded_preceding' },
  end: { kind: 'current' },
};

export function toOrderKeys(keys: readonly SortKey[]): OrderKey[] {
  return keys.map(k => ({ index: k.column, ascending: k.ascending ?? true }));
}

function hasOffset(frame: WindowFrame): boolean {
  return frame.start.offset !== undefined || frame.end.offset !== undefined;
}

function checkFrame(frame: WindowFrame, input: RowType, orderBy: readonly OrderKey[], range?: SourceRange): void {
  for (const bound of [frame.start, frame.end]) {
    if (bound.kind === 'preceding' || bound.kind === 'following') {
      invariant(
        bound.offset !== undefined && Number.isInteger(bound.offset) && bound.offset >= 0,
        `Frame bound ${bound.kind} needs a non-negative integer offset`,
        range
      );
    }
  }
  if (frame.unit !== 'range' || !hasOffset(frame)) return;
  if (orderBy.length !== 1) {
    throw new UnsupportedError('OVER RANGE with an offset requires exactly one ORDER BY column', range);
  }
  const orderType = fieldAt(input, orderBy[0].index, range).type;
  if (orderType.nullable) {
    throw new UnsupportedError('OVER currently does not support sorting on nullable column', range);
  }
  if (!isNumeric(orderType)) {
    throw new UnsupportedError(`OVER RANGE with an offset on a ${typeToString(orderType)} column`, range);
  }
}

function callType(b: StreamBuilder, node: WindowCallNode, input: RowType): Type {
  if (isRankingFunction(node.fn)) return scalar('BIGINT');
  if (node.fn === 'count') return scalar('BIGINT');
  if (node.argument === undefined) {
    b.reporter.report('error', node.range, `${node.fn.toUpperCase()} requires an argument`, 'TypeMismatch');
    return ERROR_TYPE;
  }
  const argument = fieldAt(input, node.argument, node.range).type;
  if (node.fn === 'lag' || node.fn === 'lead') return nullable(argument);
  return aggregateResultType(node.fn, argument, b.reporter, node.range);
}

export function windowCall(
  b: StreamBuilder,
  node: WindowCallNode,
  input: RowType,
  orderBy: readonly OrderKey[]
): WindowCall {
  const defaultFrame = orderBy.length > 0 ? DEFAULT_FRAME : WHOLE_PARTITION;
  const frame = isRankingFunction(node.fn) ? ROWS_TO_CURRENT : node.frame ?? defaultFrame;
  checkFrame(frame, input, orderBy, node.range);
  const offset = node.fn === 'lag' || node.fn === 'lead' ? node.offset ?? 1 : undefined;
  return { fn: node.fn, argument: node.argument, offset, frame, type: callType(b, node, input) };
}

function groupKey(group: WindowGroup): string {
  return JSON.stringify([group.partitionBy, toOrderKeys(group.orderBy)]);
}

interface FusedGroup {
  partitionBy: number[];
  orderBy: OrderKey[];
  calls: WindowCallNode[];
  /** Declared output position of each call */
  positions: number[];
}

export function lowerWindow(b: StreamBuilder, input: Stream, node: WindowNode): Stream {
  const fused = new Map<string, FusedGroup>();
  let position = 0;
  for (const group of node.groups) {
    const key = groupKey(group);
    const target = fused.get(key) ?? {
      partitionBy: group.partitionBy,
      orderBy: toOrderKeys(group.orderBy),
      calls: [],
      positions: [],
    };
    for (const c of group.calls) {
      target.calls.push(c);
      target.positions.push(position++);
    }
    fused.set(key, target);
  }
  if (fused.size < node.groups.length) {
    log('fused %d OVER clauses into %d window operator(s)', node.groups.length, fused.size);
  }

  const width = input.type.fields.length;
  let current = input;
  const order: number[] = [];
  for (const group of fused.values()) {
    group.orderBy.forEach(k => fieldAt(input.type, k.index, node.range));
    const calls = group.calls.map(c => windowCall(b, c, input.type, group.orderBy));
    const names = group.calls.map((c, i) => c.name ?? `${c.fn}${group.positions[i]}`);
    const indexed = b.indexColumns(current, group.partitionBy, node.range);
    current = b.deindex(b.window(indexed, group.orderBy, calls, names, node.range), node.range);
    order.push(...group.positions);
  }

  if (order.some((p, i) => p !== i)) {
    const columns = [
      ...input.type.fields.map((_, i) => i),
      ...order.map((_, p) => width + order.indexOf(p)),
    ];
    current = b.select(current, columns, node.range);
  }
  return current;
}
