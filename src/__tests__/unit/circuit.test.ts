import { describe, it, expect } from 'vitest';
import { InvariantViolationError } from '../../common/errors';
import { Circuit, circuitsEqual, operatorCounts } from '../../ir/circuit';
import { call, closure, field, intLiteral, variable } from '../../ir/expression';
import { zsetOf, type ColumnMetadata, type Operator } from '../../ir/operators';
import { nullable, rowType, scalar } from '../../ir/types';

const INT = scalar('INTEGER');
const ROW = rowType([{ name: 'id', type: INT }, { name: 'v', type: nullable(scalar('VARCHAR')) }]);
const COLUMNS: ColumnMetadata[] = [
  { name: 'id', type: INT, isPrimaryKey: true },
  { name: 'v', type: nullable(scalar('VARCHAR')), isPrimaryKey: false },
];

function source(circuit: Circuit, name = 'T'): Operator {
  return circuit.add({ kind: 'source', inputs: [], outputType: zsetOf(ROW), name, columns: COLUMNS });
}

function positive(circuit: Circuit, input: Operator): Operator {
  const r = variable('r', ROW);
  const predicate = closure([{ name: 'r', type: ROW }], call('>', [field(r, 0), intLiteral(0)]));
  return circuit.add({ kind: 'filter', inputs: [input.id], outputType: zsetOf(ROW), predicate });
}

describe('Circuit', () => {
  describe('arena', () => {
    it('should hand out increasing handles', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      const f = positive(circuit, t);
      expect([t.id, f.id]).toEqual([0, 1]);
      expect(circuit.size).toBe(2);
      expect(circuit.get(1)).toBe(f);
    });

    it('should reject inputs that are not in the circuit', () => {
      const circuit = new Circuit();
      expect(() => circuit.add({ kind: 'distinct', inputs: [5], outputType: zsetOf(ROW) })).toThrow(
        'Input #5 of new distinct operator is not in the circuit'
      );
      expect(() => circuit.get(5)).toThrow(InvariantViolationError);
    });

    it('should replace an operator under the same handle', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      const f = positive(circuit, t);
      const sink = circuit.add({ kind: 'sink', inputs: [f.id], outputType: zsetOf(ROW), viewName: 'V' });

      circuit.replace(f.id, { kind: 'distinct', inputs: [t.id], outputType: zsetOf(ROW) });
      expect(circuit.get(f.id).kind).toBe('distinct');
      expect(circuit.consumers(f.id)).toEqual([sink]);
    });

    it('should only remove unreferenced operators', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      const f = positive(circuit, t);
      expect(() => circuit.remove(t.id)).toThrow('Cannot remove #0: still used by #1');
      circuit.remove(f.id);
      circuit.remove(t.id);
      expect(circuit.size).toBe(0);
    });
  });

  describe('ordering', () => {
    it('should order inputs before their dependents, ties by handle', () => {
      const circuit = new Circuit();
      const t = source(circuit, 'T');
      const u = source(circuit, 'U');
      const union = circuit.add({ kind: 'setop', inputs: [u.id, t.id], outputType: zsetOf(ROW), op: 'union' });
      circuit.add({ kind: 'sink', inputs: [union.id], outputType: zsetOf(ROW), viewName: 'V' });
      expect(circuit.topologicalOrder().map(op => op.id)).toEqual([0, 1, 2, 3]);
    });

    it('should close a feedback loop through a delay', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      const delay = circuit.add({ kind: 'delay', inputs: [], outputType: zsetOf(ROW) });
      const union = circuit.add({ kind: 'setop', inputs: [t.id, delay.id], outputType: zsetOf(ROW), op: 'union' });
      circuit.connectFeedback(delay.id, union.id);

      expect(circuit.get(delay.id).inputs).toEqual([union.id]);
      expect(() => circuit.validate()).not.toThrow();
      expect(circuit.topologicalOrder().map(op => op.id)).toEqual([0, 1, 2]);
    });

    it('should reject a cycle without a delay', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      const a = circuit.add({ kind: 'distinct', inputs: [t.id], outputType: zsetOf(ROW) });
      const b = circuit.add({ kind: 'distinct', inputs: [a.id], outputType: zsetOf(ROW) });
      circuit.replace(a.id, { kind: 'distinct', inputs: [b.id], outputType: zsetOf(ROW) });
      expect(() => circuit.validate()).toThrow('Cycle through #1 without a delay operator');
    });
  });

  describe('inspection', () => {
    it('should print one operator per line', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      circuit.add({ kind: 'sink', inputs: [positive(circuit, t).id], outputType: zsetOf(ROW), viewName: 'V' });
      expect(circuit.toString().split('\n')).toEqual([
        '#0 = source() T [*id, v] : ZSet<ROW(id INTEGER, v VARCHAR?)>',
        '#1 = filter(#0) |r: ROW(id INTEGER, v VARCHAR?)| (r.0 > 0) : ZSet<ROW(id INTEGER, v VARCHAR?)>',
        '#2 = sink(#1) V : ZSet<ROW(id INTEGER, v VARCHAR?)>',
      ]);
    });

    it('should find sources and views by name', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      circuit.add({ kind: 'sink', inputs: [t.id], outputType: zsetOf(ROW), viewName: 'V' });
      expect(circuit.source('T')?.id).toBe(0);
      expect(circuit.view('V')?.id).toBe(1);
      expect(circuit.views()).toEqual(['V']);
      expect(circuit.source('V')).toBeUndefined();
    });

    it('should count operators by kind', () => {
      const circuit = new Circuit();
      const t = source(circuit);
      positive(circuit, positive(circuit, t));
      expect(operatorCounts(circuit)).toEqual({ source: 1, filter: 2 });
    });

    it('should compare circuits structurally', () => {
      const build = () => {
        const circuit = new Circuit();
        positive(circuit, source(circuit));
        return circuit;
      };
      expect(circuitsEqual(build(), build())).toBe(true);
      const other = build();
      source(other, 'U');
      expect(circuitsEqual(build(), other)).toBe(false);
    });
  });
});
