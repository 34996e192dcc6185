/**
 * Grouped Aggregation State
 *
 * Aggregation is NOT linear. Each group keeps one running accumulator per
 * aggregate; a step feeds the delta's weighted values into the groups it
 * touches and emits the retraction of the old result row and the insertion
 * of the new one. A retraction un-folds its value, so no group is rescanned.
 */

import { applyClosure } from '../ir/evaluate';
import type { Row, Value } from '../ir/expression';
import type { AggregateCall, AggregateFunction } from '../ir/operators';
import type { Type } from '../ir/types';
import { createAccumulator, type Accumulator } from './accumulators';
import { ZSet, splitPair, valueKey, type Weight } from './zset';

/**
 * Folds weighted values with SQL semantics: nulls are skipped, COUNT of
 * nothing is 0, every other aggregate of nothing is null.
 */
export function foldAggregate(fn: AggregateFunction, values: ReadonlyArray<readonly [Value, Weight]>, type: Type): Value {
  const accumulator = createAccumulator(fn, type);
  for (const [value, weight] of values) {
    accumulator.add(value, weight);
  }
  return accumulator.result();
}

interface GroupState {
  key: Row;
  /** Total weight of the group's rows; the group lives while it is nonzero */
  rows: Weight;
  accumulators: Accumulator[];
  output?: Row;
}

/**
 * Incremental GROUP BY over a Z-set of `(key, value)` pairs. With an empty
 * key (a global aggregate) the single result row exists even when the
 * input is empty, and is emitted at the first step.
 */
export class GroupedAggregateState {
  private readonly groups = new Map<string, GroupState>();
  private started = false;

  constructor(private readonly aggregates: readonly AggregateCall[], private readonly global: boolean) {}

  step(delta: ZSet<Row>): ZSet<Row> {
    const touched = new Map<string, GroupState>();
    if (this.global && !this.started) {
      touched.set(valueKey([]), this.group([]));
    }
    this.started = true;

    for (const [pair, weight] of delta.entries()) {
      const [key, value] = splitPair(pair);
      const group = this.group(key);
      group.rows += weight;
      this.aggregates.forEach((a, i) => {
        group.accumulators[i].add(a.argument ? applyClosure(a.argument, [value]) : true, weight);
      });
      touched.set(valueKey(key), group);
    }

    const result = ZSet.zero<Row>();
    for (const [k, group] of touched) {
      const previous = group.output;
      const next: Row | undefined =
        group.rows === 0 && !this.global ? undefined : [group.key, group.accumulators.map(a => a.result())];
      if (next) {
        group.output = next;
      } else {
        this.groups.delete(k);
      }
      if (previous && next && valueKey(previous) === valueKey(next)) continue;
      if (previous) result.insert(previous, -1);
      if (next) result.insert(next, 1);
    }
    return result;
  }

  reset(): void {
    this.groups.clear();
    this.started = false;
  }

  private group(key: Row): GroupState {
    const k = valueKey(key);
    let group = this.groups.get(k);
    if (!group) {
      group = { key, rows: 0, accumulators: this.aggregates.map(a => createAccumulator(a.fn, a.type)) };
      this.groups.set(k, group);
    }
    return group;
  }
}
