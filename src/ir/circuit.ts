/**
 * Circuit
 * ========
 *
 * An arena of operators addressed by integer handles. The circuit owns
 * every operator; operators refer to their inputs by handle only, so graphs
 * with shared substructure (fan-out, diamonds) carry no aliasing hazards.
 *
 * The graph is acyclic except through delay operators: a delay's input
 * edge is a feedback edge and is ignored by topological ordering.
 *
 * @module
 */

import { InvariantViolationError, invariant } from '../common/errors';
import {
  operatorToString,
  type Operator,
  type OperatorDraft,
  type OperatorId,
  type SinkOperator,
  type SourceOperator,
} from './operators';

export class Circuit {
  private readonly operators = new Map<OperatorId, Operator>();
  private nextId = 0;

  /** Adds an operator; every input must already be in the circuit */
  add(draft: OperatorDraft): Operator {
    for (const input of draft.inputs) {
      invariant(this.operators.has(input), `Input #${input} of new ${draft.kind} operator is not in the circuit`);
    }
    const op: Operator = { ...draft, id: this.nextId++ };
    this.operators.set(op.id, op);
    return op;
  }

  get(id: OperatorId): Operator {
    const op = this.operators.get(id);
    if (!op) {
      throw new InvariantViolationError(`Operator #${id} is not in the circuit`);
    }
    return op;
  }

  has(id: OperatorId): boolean {
    return this.operators.has(id);
  }

  get size(): number {
    return this.operators.size;
  }

  /**
   * Substitutes new content under an existing handle; every downstream
   * reference now resolves to the replacement.
   */
  replace(id: OperatorId, draft: OperatorDraft): Operator {
    this.get(id);
    for (const input of draft.inputs) {
      invariant(this.operators.has(input), `Input #${input} of replacement for #${id} is not in the circuit`);
    }
    const op: Operator = { ...draft, id };
    this.operators.set(id, op);
    return op;
  }

  /** Removes an operator nothing references */
  remove(id: OperatorId): void {
    const users = this.consumers(id);
    invariant(
      users.length === 0,
      `Cannot remove #${id}: still used by ${users.map(u => `#${u.id}`).join(', ')}`
    );
    this.operators.delete(id);
  }

  /** Connects the feedback edge of a delay created with a placeholder input */
  connectFeedback(delayId: OperatorId, input: OperatorId): void {
    const delay = this.get(delayId);
    invariant(delay.kind === 'delay', `#${delayId} is not a delay operator`);
    this.replace(delayId, { ...delay, inputs: [input] });
  }

  /** Operators that read from `id` */
  consumers(id: OperatorId): Operator[] {
    return this.all().filter(op => op.inputs.includes(id));
  }

  /** Operators in insertion (handle) order */
  all(): Operator[] {
    return Array.from(this.operators.values()).sort((a, b) => a.id - b.id);
  }

  sources(): SourceOperator[] {
    return this.all().filter((op): op is SourceOperator => op.kind === 'source');
  }

  sinks(): SinkOperator[] {
    return this.all().filter((op): op is SinkOperator => op.kind === 'sink');
  }

  /** Names of the declared views, in declaration order */
  views(): string[] {
    return this.sinks().map(s => s.viewName);
  }

  source(name: string): SourceOperator | undefined {
    return this.sources().find(s => s.name === name);
  }

  view(name: string): SinkOperator | undefined {
    return this.sinks().find(s => s.viewName === name);
  }

  /**
   * Deterministic topological order: inputs before their dependents, ties
   * broken by handle. Delay feedback edges are not followed. A cycle that
   * does not pass through a delay is an invariant violation.
   */
  topologicalOrder(): Operator[] {
    const order: Operator[] = [];
    const done = new Set<OperatorId>();
    const active = new Set<OperatorId>();

    const visit = (op: Operator) => {
      if (done.has(op.id)) return;
      if (active.has(op.id)) {
        throw new InvariantViolationError(`Cycle through #${op.id} without a delay operator`);
      }
      active.add(op.id);
      if (op.kind !== 'delay') {
        for (const input of op.inputs) {
          visit(this.get(input));
        }
      }
      active.delete(op.id);
      done.add(op.id);
      order.push(op);
    };

    for (const op of this.all()) {
      visit(op);
    }
    return order;
  }

  /** Checks handles and acyclicity */
  validate(): void {
    for (const op of this.operators.values()) {
      for (const input of op.inputs) {
        invariant(this.operators.has(input), `#${op.id} reads missing operator #${input}`);
      }
    }
    this.topologicalOrder();
  }

  toString(): string {
    return this.topologicalOrder().map(operatorToString).join('\n');
  }
}

/** Structural equality of two circuits, handles included */
export function circuitsEqual(a: Circuit, b: Circuit): boolean {
  return a.toString() === b.toString();
}

/** Counts operators of each kind */
export function operatorCounts(circuit: Circuit): Partial<Record<Operator['kind'], number>> {
  const counts: Partial<Record<Operator['kind'], number>> = {};
  for (const op of circuit.all()) {
    counts[op.kind] = (counts[op.kind] ?? 0) + 1;
  }
  return counts;
}
