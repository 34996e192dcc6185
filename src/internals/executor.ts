/**
 * Circuit Executor
 * =================
 *
 * Reference interpreter for compiled circuits. Each `step` feeds one batch
 * of input changes (a Z-set per table) through every operator in
 * topological order and returns the change of every view.
 *
 * Linear operators work on the deltas directly. Join, distinct,
 * aggregate, window and intersect keep integrated state across steps, so
 * summing the outputs of a sequence of steps gives the same view contents
 * as one step over the summed inputs.
 *
 * @module
 */

import { InvariantViolationError, assertNever, invariant } from '../common/errors';
import { createLogger } from '../common/logger';
import type { Circuit } from '../ir/circuit';
import { applyClosure, asRow, evaluate } from '../ir/evaluate';
import type { Row } from '../ir/expression';
import type { Operator, OperatorId, SetOperation } from '../ir/operators';
import { GroupedAggregateState } from './aggregate-state';
import {
  DelayState,
  DifferentiationState,
  IncrementalDistinct,
  IncrementalIntersect,
  IntegrationState,
  zsetGroup,
} from './operators';
import { WindowState } from './window-state';
import { IndexedZSet, ZSet, joinWithIndex, splitPair } from './zset';

const log = createLogger('executor');

/** A Z-set of rows flowing along one edge */
export type Relation = ZSet<Row>;

interface OperatorNode {
  op: Operator;
  compute: (inputs: Relation[]) => Relation;
  reset?: () => void;
}

export class CircuitExecutor {
  private readonly order: Operator[];
  private readonly nodes = new Map<OperatorId, OperatorNode>();
  private readonly delays = new Map<OperatorId, DelayState<Relation>>();
  private readonly contents = new Map<string, IntegrationState<Relation>>();
  /** Latest output of views whose sink already emits full contents */
  private readonly snapshots = new Map<string, Relation>();
  private values = new Map<OperatorId, Relation>();
  private inputs: Readonly<Record<string, Relation>> = {};
  private stepCount = 0;

  constructor(private readonly circuit: Circuit) {
    circuit.validate();
    this.order = circuit.topologicalOrder();
    for (const op of this.order) {
      this.nodes.set(op.id, this.createNode(op));
    }
  }

  /**
   * Processes one step. `inputs` maps table names to their changes;
   * absent tables did not change. Returns the change of every view.
   */
  step(inputs: Readonly<Record<string, Relation>>): Record<string, Relation> {
    for (const name of Object.keys(inputs)) {
      invariant(this.circuit.source(name) !== undefined, `Unknown table '${name}'`);
    }
    this.inputs = inputs;
    this.values = new Map();

    for (const op of this.order) {
      const node = this.nodes.get(op.id);
      invariant(node !== undefined, `No executor node for #${op.id}`);
      this.values.set(op.id, node.compute(op.kind === 'delay' ? [] : op.inputs.map(i => this.value(i))));
    }
    for (const [id, state] of this.delays) {
      const [input] = this.circuit.get(id).inputs;
      state.step(this.value(input));
    }

    const outputs: Record<string, Relation> = {};
    for (const sink of this.circuit.sinks()) {
      const delta = this.value(sink.id);
      outputs[sink.viewName] = delta;
      if (this.isMaterialized(sink.inputs[0])) {
        this.snapshots.set(sink.viewName, delta);
      } else {
        this.viewState(sink.viewName).step(delta);
      }
    }
    this.stepCount++;
    log('step %d: %d view(s)', this.stepCount, Object.keys(outputs).length);
    return outputs;
  }

  /**
   * Current contents of a view: the sum of all its changes so far, or the
   * latest output of a materialized view
   */
  view(name: string): Relation {
    const sink = this.circuit.view(name);
    invariant(sink !== undefined, `Unknown view '${name}'`);
    if (this.isMaterialized(sink.inputs[0])) {
      return this.snapshots.get(name) ?? ZSet.zero<Row>();
    }
    return this.viewState(name).getState();
  }

  /** Returns every operator to its initial state */
  reset(): void {
    for (const node of this.nodes.values()) {
      node.reset?.();
    }
    for (const state of this.contents.values()) {
      state.reset();
    }
    this.snapshots.clear();
    this.values.clear();
    this.stepCount = 0;
  }

  getStepCount(): number {
    return this.stepCount;
  }

  private value(id: OperatorId): Relation {
    const value = this.values.get(id);
    if (!value) {
      throw new InvariantViolationError(`Operator #${id} has not been evaluated`);
    }
    return value;
  }

  private isMaterialized(sinkInput: OperatorId): boolean {
    return this.circuit.get(sinkInput).kind === 'integrate';
  }

  private viewState(name: string): IntegrationState<Relation> {
    let state = this.contents.get(name);
    if (!state) {
      state = new IntegrationState(zsetGroup());
      this.contents.set(name, state);
    }
    return state;
  }

  // ============ OPERATOR NODES ============

  private createNode(op: Operator): OperatorNode {
    switch (op.kind) {
      case 'source':
        return { op, compute: () => this.sourceInput(op.name, op.columns.map(c => c.type.nullable)) };
      case 'constant': {
        let emitted = false;
        return {
          op,
          compute: () => {
            if (emitted) return ZSet.zero();
            emitted = true;
            return ZSet.fromValues(op.rows.map(r => asRow(evaluate(r))));
          },
          reset: () => {
            emitted = false;
          },
        };
      }
      case 'map':
      case 'index':
        return { op, compute: ([input]) => input.map(row => asRow(applyClosure(op.fn, [row]))) };
      case 'filter':
        return { op, compute: ([input]) => input.filter(row => applyClosure(op.predicate, [row]) === true) };
      case 'deindex':
        return { op, compute: ([input]) => input.map(pair => splitPair(pair)[1]) };
      case 'join': {
        // Δ(a ⋈ b) = Δa ⋈ Δb + prevA ⋈ Δb + Δa ⋈ prevB
        const left = new IndexedZSet();
        const right = new IndexedZSet();
        const combine = (key: Row, l: Row, r: Row) => asRow(applyClosure(op.fn, [key, l, r]));
        const swapped = (key: Row, r: Row, l: Row) => combine(key, l, r);
        return {
          op,
          compute: ([deltaA, deltaB]) => {
            const both = joinWithIndex(deltaA, IndexedZSet.fromPairs(deltaB), combine);
            const fromRight = joinWithIndex(deltaB, left, swapped);
            const fromLeft = joinWithIndex(deltaA, right, combine);
            left.addPairs(deltaA);
            right.addPairs(deltaB);
            return both.add(fromRight).add(fromLeft);
          },
          reset: () => {
            left.clear();
            right.clear();
          },
        };
      }
      case 'aggregate': {
        const global = op.outputType.kind === 'indexed' && op.outputType.key.fields.length === 0;
        const state = new GroupedAggregateState(op.aggregates, global);
        return { op, compute: ([input]) => state.step(input), reset: () => state.reset() };
      }
      case 'distinct': {
        const state = new IncrementalDistinct();
        return { op, compute: ([input]) => state.step(input), reset: () => state.reset() };
      }
      case 'window': {
        const state = new WindowState(op.orderBy, op.functions);
        return { op, compute: ([input]) => state.step(input), reset: () => state.reset() };
      }
      case 'setop':
        return this.setOpNode(op.op, op);
      case 'delay': {
        const state = new DelayState<Relation>(ZSet.zero());
        this.delays.set(op.id, state);
        return { op, compute: () => state.peek(), reset: () => state.reset() };
      }
      case 'integrate': {
        const state = new IntegrationState(zsetGroup());
        return { op, compute: ([input]) => state.step(input), reset: () => state.reset() };
      }
      case 'differentiate': {
        const state = new DifferentiationState(zsetGroup());
        return { op, compute: ([input]) => state.step(input), reset: () => state.reset() };
      }
      case 'sink':
        return { op, compute: ([input]) => input };
      default:
        return assertNever(op, 'operator');
    }
  }

  private setOpNode(kind: SetOperation, op: Operator): OperatorNode {
    switch (kind) {
      case 'union':
        return { op, compute: ([a, b]) => a.add(b) };
      case 'except':
        return { op, compute: ([a, b]) => a.subtract(b) };
      case 'intersect': {
        const state = new IncrementalIntersect();
        return { op, compute: ([a, b]) => state.step(a, b), reset: () => state.reset() };
      }
    }
  }

  private sourceInput(name: string, nullable: readonly boolean[]): Relation {
    const input = this.inputs[name] ?? ZSet.zero();
    for (const row of input.values()) {
      invariant(
        row.length === nullable.length,
        `Row ${JSON.stringify(row)} of '${name}' has ${row.length} value(s), expected ${nullable.length}`
      );
      row.forEach((v, i) => {
        invariant(v !== null || nullable[i], `Null in non-nullable column ${i} of '${name}'`);
      });
    }
    return input;
  }
}
