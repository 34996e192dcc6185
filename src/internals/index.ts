/**
 * Internals
 * ==========
 *
 * Z-sets and the stateful operators the reference executor is built from.
 * Usable directly for experiments with incremental computation.
 *
 * @module
 */

// Z-Sets (multisets with weights)
export { ZSet, IndexedZSet, joinWithIndex, keysOf, splitPair, valueKey } from './zset';
export type { Weight } from './zset';

// Operators
export * from './operators';

// Aggregation and window state
export { RunningExtreme, RunningSum, createAccumulator } from './accumulators';
export type { Accumulator } from './accumulators';
export { GroupedAggregateState, foldAggregate } from './aggregate-state';
export { WindowState } from './window-state';

// Circuit execution
export { CircuitExecutor } from './executor';
export type { Relation } from './executor';
