/**
 * Running Aggregates
 * ===================
 *
 * Per-group accumulators that absorb weighted values one change at a time.
 * A negative weight un-folds a value, so a retraction never rescans the
 * group:
 *
 * - COUNT, SUM and AVG keep a running count and sum
 * - MIN and MAX keep a multiset of the values seen; only retracting the
 *   current extreme forces a scan of the distinct values left
 *
 * Nulls are skipped. COUNT of nothing is 0, every other aggregate of
 * nothing is null.
 *
 * @module
 */

import { invariant } from '../common/errors';
import { compareValues } from '../ir/evaluate';
import type { Value } from '../ir/expression';
import { isInvertible, type AggregateFunction } from '../ir/operators';
import { isIntegral, type Type } from '../ir/types';
import { valueKey, type Weight } from './zset';

export interface Accumulator {
  add(value: Value, weight: Weight): void;
  result(): Value;
}

// ============ COUNT / SUM / AVG ============

/** Subtract the outgoing value, add the incoming one */
export class RunningSum implements Accumulator {
  private count = 0;
  private sum = 0;

  constructor(private readonly fn: 'count' | 'sum' | 'avg', private readonly type: Type) {}

  add(value: Value, weight: Weight): void {
    if (value === null || weight === 0) return;
    this.count += weight;
    if (this.fn === 'count') return;
    invariant(typeof value === 'number', `${this.fn.toUpperCase()} over non-numeric value ${JSON.stringify(value)}`);
    this.sum += value * weight;
  }

  result(): Value {
    if (this.fn === 'count') return this.count;
    if (this.count === 0) return null;
    if (this.fn === 'sum') return this.sum;
    return isIntegral(this.type) ? Math.trunc(this.sum / this.count) : this.sum / this.count;
  }
}

// ============ MIN / MAX ============

export class RunningExtreme implements Accumulator {
  private readonly values = new Map<string, { value: Value; weight: Weight }>();
  private best: Value = null;
  /** The extreme was retracted; the next result rescans */
  private stale = false;

  constructor(private readonly fn: 'min' | 'max') {}

  add(value: Value, weight: Weight): void {
    if (value === null || weight === 0) return;
    const k = valueKey(value);
    const weightNow = (this.values.get(k)?.weight ?? 0) + weight;
    if (weightNow === 0) {
      this.values.delete(k);
    } else {
      this.values.set(k, { value, weight: weightNow });
    }

    if (weightNow > 0) {
      if (!this.stale && (this.best === null || this.beats(value, this.best))) this.best = value;
    } else if (this.best !== null && compareValues(value, this.best) === 0) {
      this.stale = true;
    }
  }

  result(): Value {
    if (this.stale) {
      this.best = null;
      for (const { value, weight } of this.values.values()) {
        if (weight > 0 && (this.best === null || this.beats(value, this.best))) this.best = value;
      }
      this.stale = false;
    }
    return this.best;
  }

  private beats(a: Value, b: Value): boolean {
    const c = compareValues(a, b);
    return this.fn === 'min' ? c < 0 : c > 0;
  }
}

export function createAccumulator(fn: AggregateFunction, type: Type): Accumulator {
  if (isInvertible(fn)) {
    invariant(fn === 'count' || fn === 'sum' || fn === 'avg', `${fn} is not invertible`);
    return new RunningSum(fn, type);
  }
  invariant(fn === 'min' || fn === 'max', `No accumulator for ${fn}`);
  return new RunningExtreme(fn);
}
