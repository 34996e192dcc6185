/**
 * Window Function State
 * ======================
 *
 * Integrated partitions for OVER clauses. Each partition keeps its rows
 * sorted by the ORDER BY keys (ties broken by the whole row, so output is
 * deterministic) next to the output row computed for each position.
 *
 * A step splices the delta into the sorted rows and recomputes only the
 * positions whose frame can reach the changed range:
 * - before it, rows whose frame ends ahead of the change keep their output
 * - after it, rows whose frame starts past the change keep theirs, unless a
 *   ranking function shifts every later position
 * The difference between the recomputed outputs and the old ones is emitted.
 *
 * Frames:
 * - ROWS bounds count physical rows from the current one
 * - RANGE bounds with an offset compare the single numeric ORDER BY value
 * - RANGE CURRENT ROW extends to every peer (equal ORDER BY values)
 *
 * Frame aggregates slide a running accumulator across the recomputed
 * positions: rows leaving the frame are retracted, rows entering it added.
 * Ranking functions ignore the frame; LAG and LEAD read the row `offset`
 * positions away and give null past the partition edge.
 *
 * @module
 */

import { InvariantViolationError, invariant } from '../common/errors';
import { compareValues } from '../ir/evaluate';
import type { Row, Value } from '../ir/expression';
import { isRankingFunction, type FrameBound, type OrderKey, type WindowCall } from '../ir/operators';
import { createAccumulator, type Accumulator } from './accumulators';
import { ZSet, splitPair, valueKey } from './zset';

interface Partition {
  key: Row;
  /** Integrated contents, negative weights included */
  contents: ZSet<Row>;
  /** Rows of positive weight, expanded and sorted */
  rows: Row[];
  /** Output row per position of `rows` */
  outputs: Row[];
  /** DENSE_RANK per position */
  dense: number[];
}

interface SlidingFrame {
  accumulator: Accumulator;
  from: number;
  to: number;
}

export class WindowState {
  private readonly partitions = new Map<string, Partition>();

  constructor(private readonly orderBy: readonly OrderKey[], private readonly functions: readonly WindowCall[]) {}

  step(delta: ZSet<Row>): ZSet<Row> {
    const changes = new Map<string, { key: Row; delta: ZSet<Row> }>();
    for (const [pair, weight] of delta.entries()) {
      const [key, row] = splitPair(pair);
      const k = valueKey(key);
      let change = changes.get(k);
      if (!change) {
        change = { key, delta: ZSet.zero<Row>() };
        changes.set(k, change);
      }
      change.delta.insert(row, weight);
    }

    const result = ZSet.zero<Row>();
    for (const [k, { key, delta: rows }] of changes) {
      const partition = this.partitions.get(k) ?? { key, contents: ZSet.zero<Row>(), rows: [], outputs: [], dense: [] };
      this.update(partition, rows, result);
      if (partition.rows.length === 0 && partition.contents.isZero()) {
        this.partitions.delete(k);
      } else {
        this.partitions.set(k, partition);
      }
    }
    return result;
  }

  reset(): void {
    this.partitions.clear();
  }

  // ============ PARTITION UPDATE ============

  private update(partition: Partition, delta: ZSet<Row>, result: ZSet<Row>): void {
    const old = partition.rows;
    const changed = delta.values();

    // Every change lands inside [lo, hiOld) of the old rows
    let lo = old.length;
    let hiOld = 0;
    for (const row of changed) {
      lo = Math.min(lo, this.search(old, row, false));
      hiOld = Math.max(hiOld, this.search(old, row, true));
    }
    hiOld = Math.max(hiOld, lo);

    const middle = new Map<string, Row>();
    for (const row of [...old.slice(lo, hiOld), ...changed]) middle.set(valueKey(row), row);
    for (const [row, weight] of delta.entries()) partition.contents.insert(row, weight);
    const spliced: Row[] = [];
    for (const row of [...middle.values()].sort((a, b) => this.compareRows(a, b))) {
      for (let n = partition.contents.getWeight(row); n > 0; n--) spliced.push(row);
    }

    const rows = [...old.slice(0, lo), ...spliced, ...old.slice(hiOld)];
    const shift = rows.length - old.length;
    const hiNew = hiOld + shift;

    // Positions outside [from, rows.length - kept) keep their outputs
    let from = lo;
    while (from > 0 && (this.reach(old, from - 1, 'end') >= lo || this.reach(rows, from - 1, 'end') >= lo)) from--;
    let to = hiNew;
    if (this.functions.some(fn => isRankingFunction(fn.fn))) {
      to = rows.length;
    } else {
      while (to < rows.length && (this.reach(rows, to, 'start') < hiNew || this.reach(old, to - shift, 'start') < hiOld)) to++;
    }
    const kept = rows.length - to;

    const recomputed = this.compute(partition.key, rows, from, to, from > 0 ? partition.dense[from - 1] : 0);
    for (let i = from; i < old.length - kept; i++) result.insert(partition.outputs[i], -1);
    for (const output of recomputed.outputs) result.insert(output, 1);

    partition.rows = rows;
    partition.outputs = [...partition.outputs.slice(0, from), ...recomputed.outputs, ...partition.outputs.slice(old.length - kept)];
    partition.dense = [...partition.dense.slice(0, from), ...recomputed.dense, ...partition.dense.slice(old.length - kept)];
  }

  /** Outputs for positions [from, to) */
  private compute(key: Row, rows: readonly Row[], from: number, to: number, denseBefore: number): { outputs: Row[]; dense: number[] } {
    const outputs: Row[] = [];
    const dense: number[] = [];
    const frames = new Map<WindowCall, SlidingFrame>();
    let denseRank = denseBefore;
    for (let i = from; i < to; i++) {
      const row = rows[i];
      const firstPeer = i > 0 && this.compareOrder(rows[i - 1], row) === 0 ? this.firstPeer(rows, i) : i;
      if (firstPeer === i) denseRank++;
      const values = this.functions.map(fn => this.evaluate(fn, rows, i, firstPeer, denseRank, frames));
      outputs.push([key, [...row, ...values]]);
      dense.push(denseRank);
    }
    return { outputs, dense };
  }

  private evaluate(
    fn: WindowCall,
    rows: readonly Row[],
    i: number,
    firstPeer: number,
    denseRank: number,
    frames: Map<WindowCall, SlidingFrame>
  ): Value {
    switch (fn.fn) {
      case 'row_number':
        return i + 1;
      case 'rank':
        return firstPeer + 1;
      case 'dense_rank':
        return denseRank;
      case 'lag':
      case 'lead': {
        invariant(fn.argument !== undefined, `${fn.fn.toUpperCase()} without an argument`);
        const j = fn.fn === 'lag' ? i - (fn.offset ?? 1) : i + (fn.offset ?? 1);
        return j >= 0 && j < rows.length ? rows[j][fn.argument] : null;
      }
      case 'count':
      case 'sum':
      case 'avg':
      case 'min':
      case 'max': {
        const start = Math.max(this.bound(fn.frame.unit, fn.frame.start, rows, i, 'start'), 0);
        const end = Math.max(Math.min(this.bound(fn.frame.unit, fn.frame.end, rows, i, 'end'), rows.length - 1) + 1, start);
        let frame = frames.get(fn);
        if (!frame || start >= frame.to) {
          frame = { accumulator: createAccumulator(fn.fn, fn.type), from: start, to: start };
          frames.set(fn, frame);
        }
        const argument = fn.argument;
        const valueOf = (r: Row): Value => (argument === undefined ? true : r[argument]);
        for (; frame.to < end; frame.to++) frame.accumulator.add(valueOf(rows[frame.to]), 1);
        for (; frame.from < start; frame.from++) frame.accumulator.add(valueOf(rows[frame.from]), -1);
        return frame.accumulator.result();
      }
    }
  }

  // ============ FRAMES ============

  /** First (start) or last (end) position any function at `i` reads */
  private reach(rows: readonly Row[], i: number, side: 'start' | 'end'): number {
    let result = i;
    for (const fn of this.functions) {
      let j: number;
      switch (fn.fn) {
        case 'row_number':
        case 'rank':
        case 'dense_rank':
          // ranks depend on every earlier row
          j = side === 'start' ? -1 : i;
          break;
        case 'lag':
          j = side === 'start' ? i - (fn.offset ?? 1) : i;
          break;
        case 'lead':
          j = side === 'start' ? i : i + (fn.offset ?? 1);
          break;
        default:
          j = this.bound(fn.frame.unit, side === 'start' ? fn.frame.start : fn.frame.end, rows, i, side);
      }
      result = side === 'start' ? Math.min(result, j) : Math.max(result, j);
    }
    return result;
  }

  /** Index of the first (start) or last (end) row of the frame; may fall outside the partition */
  private bound(unit: 'rows' | 'range', bound: FrameBound, rows: readonly Row[], i: number, side: 'start' | 'end'): number {
    if (bound.kind === 'unbounded_preceding') return side === 'start' ? 0 : -1;
    if (bound.kind === 'unbounded_following') return side === 'start' ? rows.length : rows.length - 1;
    if (unit === 'rows') {
      const offset = bound.offset ?? 0;
      if (bound.kind === 'preceding') return i - offset;
      if (bound.kind === 'following') return i + offset;
      return i;
    }
    if (bound.kind === 'current') {
      return side === 'start' ? this.firstPeer(rows, i) : this.lastPeer(rows, i);
    }

    // RANGE n PRECEDING / FOLLOWING over one numeric key
    const offset = bound.offset ?? 0;
    const limit = this.position(rows[i]) + (bound.kind === 'preceding' ? -offset : offset);
    if (side === 'start') {
      return firstIndex(rows.length, j => this.position(rows[j]) >= limit);
    }
    return firstIndex(rows.length, j => this.position(rows[j]) > limit) - 1;
  }

  private position(row: Row): number {
    const { index, ascending } = this.orderBy[0];
    const value = row[index];
    if (typeof value !== 'number') {
      throw new InvariantViolationError(`RANGE frame over non-numeric value ${JSON.stringify(value)}`);
    }
    return ascending ? value : -value;
  }

  // ============ ORDERING ============

  /** Orders rows by the ORDER BY keys only; 0 means peers */
  private compareOrder(a: Row, b: Row): number {
    for (const { index, ascending } of this.orderBy) {
      const c = compareValues(a[index], b[index]);
      if (c !== 0) return ascending ? c : -c;
    }
    return 0;
  }

  private compareRows(a: Row, b: Row): number {
    return this.compareOrder(a, b) || compareValues(a, b);
  }

  /** First position of `row` in sorted `rows`, or the one past its last copy */
  private search(rows: readonly Row[], row: Row, after: boolean): number {
    return firstIndex(rows.length, j => {
      const c = this.compareRows(rows[j], row);
      return after ? c > 0 : c >= 0;
    });
  }

  private firstPeer(rows: readonly Row[], i: number): number {
    let j = i;
    while (j > 0 && this.compareOrder(rows[j - 1], rows[i]) === 0) j--;
    return j;
  }

  private lastPeer(rows: readonly Row[], i: number): number {
    let j = i;
    while (j < rows.length - 1 && this.compareOrder(rows[j + 1], rows[i]) === 0) j++;
    return j;
  }
}

/** Smallest j in [0, n) with `test(j)`, or n; `test` must be monotone */
function firstIndex(n: number, test: (j: number) => boolean): number {
  let low = 0;
  let high = n;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (test(mid)) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return low;
}
