/**
 * Z-Set: A set with integer weights
 *
 * Z-sets generalize database tables: each element has an associated weight.
 * - Positive weights represent presence (multiplicity in multisets)
 * - Negative weights represent deletions
 * - Zero weights are not stored (implicit)
 *
 * Z-sets form an abelian group with pointwise addition. Elements are
 * identified structurally: two rows holding the same values are the same
 * element.
 */

import { invariant } from '../common/errors';
import { asRow, compareValues } from '../ir/evaluate';
import type { Row, Value } from '../ir/expression';

/** Weight type - integers from ℤ */
export type Weight = number;

/** Structural identity of a value */
export const valueKey = (value: Value): string => JSON.stringify(value);

/**
 * ZSet<T> represents a multiset with integer weights
 * Conceptually: Map<T, Weight> where we only store non-zero weights
 */
export class ZSet<T extends Value = Row> {
  private readonly data = new Map<string, { value: T; weight: Weight }>();

  /** Create a ZSet from (value, weight) pairs */
  static fromEntries<T extends Value>(entries: Iterable<readonly [T, Weight]>): ZSet<T> {
    const zset = new ZSet<T>();
    for (const [value, weight] of entries) {
      zset.insert(value, weight);
    }
    return zset;
  }

  /** Create a ZSet from values, each with weight 1 */
  static fromValues<T extends Value>(values: Iterable<T>): ZSet<T> {
    const zset = new ZSet<T>();
    for (const value of values) {
      zset.insert(value, 1);
    }
    return zset;
  }

  /** Create an empty ZSet (identity element for addition) */
  static zero<T extends Value = Row>(): ZSet<T> {
    return new ZSet<T>();
  }

  /** Insert or add weight to an element */
  insert(value: T, weight: Weight = 1): void {
    if (weight === 0) return;
    const key = valueKey(value);
    const newWeight = (this.data.get(key)?.weight ?? 0) + weight;
    if (newWeight === 0) {
      this.data.delete(key);
    } else {
      this.data.set(key, { value, weight: newWeight });
    }
  }

  /** Weight of an element (0 if absent) */
  getWeight(value: T): Weight {
    return this.data.get(valueKey(value))?.weight ?? 0;
  }

  has(value: T): boolean {
    return this.getWeight(value) !== 0;
  }

  entries(): [T, Weight][] {
    return Array.from(this.data.values(), ({ value, weight }) => [value, weight]);
  }

  values(): T[] {
    return Array.from(this.data.values(), ({ value }) => value);
  }

  /** Number of distinct elements */
  size(): number {
    return this.data.size;
  }

  isZero(): boolean {
    return this.data.size === 0;
  }

  // ============ GROUP OPERATIONS ============

  /** Pointwise addition of weights */
  add(other: ZSet<T>): ZSet<T> {
    const result = this.clone();
    for (const [value, weight] of other.entries()) {
      result.insert(value, weight);
    }
    return result;
  }

  negate(): ZSet<T> {
    const result = new ZSet<T>();
    for (const [value, weight] of this.entries()) {
      result.insert(value, -weight);
    }
    return result;
  }

  subtract(other: ZSet<T>): ZSet<T> {
    return this.add(other.negate());
  }

  /**
   * Elements positive in both sets, with the smaller weight
   * (bag INTERSECT)
   */
  intersect(other: ZSet<T>): ZSet<T> {
    const result = new ZSet<T>();
    for (const [value, weight] of this.entries()) {
      const otherWeight = other.getWeight(value);
      if (weight > 0 && otherWeight > 0) {
        result.insert(value, Math.min(weight, otherWeight));
      }
    }
    return result;
  }

  // ============ LINEAR OPERATORS ============

  /** filter(a + b) = filter(a) + filter(b) */
  filter(predicate: (value: T) => boolean): ZSet<T> {
    const result = new ZSet<T>();
    for (const [value, weight] of this.entries()) {
      if (predicate(value)) {
        result.insert(value, weight);
      }
    }
    return result;
  }

  /** map(a + b) = map(a) + map(b); elements mapped together merge */
  map<U extends Value>(fn: (value: T) => U): ZSet<U> {
    const result = new ZSet<U>();
    for (const [value, weight] of this.entries()) {
      result.insert(fn(value), weight);
    }
    return result;
  }

  // ============ SET OPERATIONS ============

  /** distinct(m)[x] = 1 if m[x] > 0, 0 otherwise */
  distinct(): ZSet<T> {
    const result = new ZSet<T>();
    for (const [value, weight] of this.entries()) {
      if (weight > 0) {
        result.insert(value, 1);
      }
    }
    return result;
  }

  /** All weights are 1 */
  isSet(): boolean {
    return this.entries().every(([, weight]) => weight === 1);
  }

  equals(other: ZSet<T>): boolean {
    if (this.size() !== other.size()) return false;
    return this.entries().every(([value, weight]) => other.getWeight(value) === weight);
  }

  clone(): ZSet<T> {
    return ZSet.fromEntries(this.entries());
  }

  /** Entries in value order, for stable output */
  sortedEntries(): [T, Weight][] {
    return this.entries().sort(([a], [b]) => compareValues(a, b));
  }

  toString(): string {
    const entries = this.sortedEntries()
      .map(([v, w]) => `${JSON.stringify(v)} → ${w}`)
      .join(', ');
    return `ZSet { ${entries} }`;
  }
}

// ============ INDEXED Z-SETS ============

/**
 * Z-set of `(key, value)` pairs grouped by key, so all values of one key
 * can be looked up without a scan. Mutable: operators keep one as their
 * integrated state.
 */
export class IndexedZSet {
  private readonly groups = new Map<string, { key: Row; values: ZSet<Row> }>();

  /** Adds every `[key, value]` pair of a Z-set */
  static fromPairs(pairs: ZSet<Row>): IndexedZSet {
    const result = new IndexedZSet();
    result.addPairs(pairs);
    return result;
  }

  insert(key: Row, value: Row, weight: Weight = 1): void {
    const k = valueKey(key);
    let group = this.groups.get(k);
    if (!group) {
      group = { key, values: new ZSet<Row>() };
      this.groups.set(k, group);
    }
    group.values.insert(value, weight);
    if (group.values.isZero()) {
      this.groups.delete(k);
    }
  }

  addPairs(pairs: ZSet<Row>): void {
    for (const [pair, weight] of pairs.entries()) {
      const [key, value] = splitPair(pair);
      this.insert(key, value, weight);
    }
  }

  /** Values stored under `key` (empty when absent) */
  group(key: Row): ZSet<Row> {
    return this.groups.get(valueKey(key))?.values ?? ZSet.zero();
  }

  keys(): Row[] {
    return Array.from(this.groups.values(), g => g.key);
  }

  size(): number {
    return this.groups.size;
  }

  clear(): void {
    this.groups.clear();
  }
}

/** Splits an indexed element into its key and value rows */
export function splitPair(pair: Row): [Row, Row] {
  invariant(pair.length === 2, `Expected a (key, value) pair, got ${JSON.stringify(pair)}`);
  return [asRow(pair[0]), asRow(pair[1])];
}

/** Distinct keys appearing in a Z-set of pairs */
export function keysOf(pairs: ZSet<Row>): Row[] {
  const keys = new Map<string, Row>();
  for (const pair of pairs.values()) {
    const [key] = splitPair(pair);
    keys.set(valueKey(key), key);
  }
  return Array.from(keys.values());
}

// ============ BILINEAR OPERATIONS ============

/**
 * Equi-join of a Z-set of pairs against an index: every pair of values
 * sharing a key contributes `combine(key, left, right)` with the product of
 * their weights. This is a BILINEAR operator.
 */
export function joinWithIndex(
  left: ZSet<Row>,
  right: IndexedZSet,
  combine: (key: Row, left: Row, right: Row) => Row
): ZSet<Row> {
  const result = new ZSet<Row>();
  for (const [pair, weightL] of left.entries()) {
    const [key, valueL] = splitPair(pair);
    for (const [valueR, weightR] of right.group(key).entries()) {
      result.insert(combine(key, valueL, valueR), weightL * weightR);
    }
  }
  return result;
}
