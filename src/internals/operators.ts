/**
 * Stateful Stream Operators
 *
 * The fundamental operators of DBSP, as per-step state machines:
 * 1. Delay (z^-1): Delay stream by one timestamp
 * 2. Integration (I): Cumulative sum of stream values
 * 3. Differentiation (D): Differences between consecutive values
 * 4. Incremental distinct: threshold crossing over the integrated input
 *
 * Key theorems:
 * - D and I are inverses: D(I(s)) = I(D(s)) = s
 * - Linear operators are their own incremental versions: Q^Δ = Q
 */

import type { Row } from '../ir/expression';
import { ZSet, valueKey } from './zset';

// ============ GROUP OPERATIONS ============

export interface GroupValue<T> {
  zero: () => T;
  add: (a: T, b: T) => T;
  negate: (a: T) => T;
}

/** Group operations for Z-sets of rows */
export function zsetGroup(): GroupValue<ZSet<Row>> {
  return {
    zero: () => ZSet.zero<Row>(),
    add: (a, b) => a.add(b),
    negate: a => a.negate(),
  };
}

// ============ DELAY OPERATOR (z^-1) ============

/**
 * z^-1(s)[t] = { zero     when t = 0
 *              { s[t-1]   when t ≥ 1
 *
 * Strict: the output at t is known before the input at t, which is what
 * lets a delay close a feedback loop.
 */
export class DelayState<T> {
  private previous: T;

  constructor(private readonly zero: T) {
    this.previous = zero;
  }

  /** Output for the current step */
  peek(): T {
    return this.previous;
  }

  /** Process one value, return the delayed value */
  step(input: T): T {
    const output = this.previous;
    this.previous = input;
    return output;
  }

  reset(): void {
    this.previous = this.zero;
  }
}

// ============ INTEGRATION OPERATOR (I) ============

/**
 * I(s)[t] = Σ_{i≤t} s[i]
 */
export class IntegrationState<T> {
  private sum: T;

  constructor(private readonly group: GroupValue<T>) {
    this.sum = group.zero();
  }

  /** Process one value, return the integrated value */
  step(input: T): T {
    this.sum = this.group.add(this.sum, input);
    return this.sum;
  }

  getState(): T {
    return this.sum;
  }

  reset(): void {
    this.sum = this.group.zero();
  }
}

// ============ DIFFERENTIATION OPERATOR (D) ============

/**
 * D(s)[t] = s[t] - s[t-1]  (with s[-1] = 0)
 */
export class DifferentiationState<T> {
  private previous: T;

  constructor(private readonly group: GroupValue<T>) {
    this.previous = group.zero();
  }

  step(input: T): T {
    const diff = this.group.add(input, this.group.negate(this.previous));
    this.previous = input;
    return diff;
  }

  reset(): void {
    this.previous = this.group.zero();
  }
}

// ============ INCREMENTAL DISTINCT ============

/**
 * Distinct is NOT linear: the integrated input is tracked and an element
 * is emitted only when its weight crosses zero.
 *
 * H(i, d)[x] = { -1 if i[x] > 0 and (i+d)[x] ≤ 0
 *             {  1 if i[x] ≤ 0 and (i+d)[x] > 0
 *             {  0 otherwise
 */
export class IncrementalDistinct {
  private integrated = ZSet.zero<Row>();

  step(delta: ZSet<Row>): ZSet<Row> {
    const result = ZSet.zero<Row>();
    for (const [value, deltaWeight] of delta.entries()) {
      const oldWeight = this.integrated.getWeight(value);
      const newWeight = oldWeight + deltaWeight;
      if (oldWeight > 0 && newWeight <= 0) {
        result.insert(value, -1);
      } else if (oldWeight <= 0 && newWeight > 0) {
        result.insert(value, 1);
      }
    }
    this.integrated = this.integrated.add(delta);
    return result;
  }

  reset(): void {
    this.integrated = ZSet.zero<Row>();
  }
}

// ============ INCREMENTAL INTERSECT ============

/**
 * Bag intersection of two integrated inputs. Only rows a delta touches are
 * revisited; each emits the change of min(I(a), I(b)), where a weight at
 * or below zero counts as absent.
 */
export class IncrementalIntersect {
  private left = ZSet.zero<Row>();
  private right = ZSet.zero<Row>();

  step(deltaLeft: ZSet<Row>, deltaRight: ZSet<Row>): ZSet<Row> {
    const touched = [...deltaLeft.values(), ...deltaRight.values()];
    const before = touched.map(row => this.weight(row));
    for (const [row, weight] of deltaLeft.entries()) this.left.insert(row, weight);
    for (const [row, weight] of deltaRight.entries()) this.right.insert(row, weight);

    const result = ZSet.zero<Row>();
    const seen = new Set<string>();
    touched.forEach((row, i) => {
      const k = valueKey(row);
      if (seen.has(k)) return;
      seen.add(k);
      result.insert(row, this.weight(row) - before[i]);
    });
    return result;
  }

  reset(): void {
    this.left = ZSet.zero<Row>();
    this.right = ZSet.zero<Row>();
  }

  private weight(row: Row): number {
    return Math.max(0, Math.min(this.left.getWeight(row), this.right.getWeight(row)));
  }
}
