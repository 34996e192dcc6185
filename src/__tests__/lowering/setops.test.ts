import { describe, it, expect } from 'vitest';
import { operatorCounts } from '../../ir/circuit';
import { CircuitExecutor } from '../../internals/executor';
import type { SetOperation } from '../../ir/operators';
import { compile } from '../../compiler';
import { BIGINT, INT, STR, compileOrThrow, entries, runSteps, scan, table, view, zset } from '../fixtures';

const A = table('A', [['x', INT]]);
const B = table('B', [['x', INT]]);
const data = { A: zset([[1], 2], [[2], 1]), B: zset([[1], 1], [[3], 1]) };

function setop(op: SetOperation, all: boolean) {
  return compileOrThrow({
    tables: [A, B],
    views: [view('S', { kind: 'setop', op, all, inputs: [scan('A'), scan('B')] })],
  });
}

describe('Lowering: set operations', () => {
  it('should add weights for UNION ALL', () => {
    expect(entries(runSteps(setop('union', true), [data]).S)).toEqual([[[1], 3], [[2], 1], [[3], 1]]);
  });

  it('should follow UNION with a Distinct', () => {
    const circuit = setop('union', false);
    expect(operatorCounts(circuit).distinct).toBe(1);
    expect(entries(runSteps(circuit, [data]).S)).toEqual([[[1], 1], [[2], 1], [[3], 1]]);
  });

  it('should subtract weights for EXCEPT ALL', () => {
    expect(entries(runSteps(setop('except', true), [data]).S)).toEqual([[[1], 1], [[2], 1], [[3], -1]]);
  });

  it('should subtract distinct inputs for EXCEPT', () => {
    const circuit = setop('except', false);
    expect(operatorCounts(circuit).distinct).toBe(3);
    expect(entries(runSteps(circuit, [data]).S)).toEqual([[[2], 1]]);
  });

  it('should keep the smaller positive weight for INTERSECT ALL', () => {
    expect(entries(runSteps(setop('intersect', true), [data]).S)).toEqual([[[1], 1]]);
  });

  it('should maintain INTERSECT as rows come and go', () => {
    const executor = new CircuitExecutor(setop('intersect', false));
    executor.step(data);
    expect(entries(executor.step({ A: zset([[3], 1]) }).S)).toEqual([[[3], 1]]);
    expect(entries(executor.step({ B: zset([[1], -1]) }).S)).toEqual([[[1], -1]]);
    expect(entries(executor.view('S'))).toEqual([[[3], 1]]);
  });

  it('should fold more than two inputs left to right', () => {
    const C = table('C', [['x', INT]]);
    const circuit = compileOrThrow({
      tables: [A, B, C],
      views: [view('S', { kind: 'setop', op: 'union', all: true, inputs: [scan('A'), scan('B'), scan('C')] })],
    });
    expect(operatorCounts(circuit).setop).toBe(2);
    const result = runSteps(circuit, [{ ...data, C: zset([[2], 4]) }]);
    expect(entries(result.S)).toEqual([[[1], 3], [[2], 5], [[3], 1]]);
  });

  it('should widen inputs to their common type', () => {
    const W = table('W', [['y', BIGINT]]);
    const circuit = compileOrThrow({
      tables: [A, W],
      views: [view('S', { kind: 'setop', op: 'union', all: true, inputs: [scan('A'), scan('W')] })],
    });
    const sink = circuit.view('S');
    const types = sink?.outputType.kind === 'zset' ? sink.outputType.element.fields.map(f => f.type) : [];
    expect(types).toEqual([BIGINT]);
  });

  it('should report inputs with no common type', () => {
    const D = table('D', [['s', STR]]);
    const { circuit, messages } = compile({
      tables: [A, D],
      views: [view('S', { kind: 'setop', op: 'union', all: true, inputs: [scan('A'), scan('D')] })],
    });
    expect(circuit).toBeUndefined();
    expect(messages.errorCount).toBe(1);
    expect(messages.getErrors()[0].code).toBe('TypeMismatch');
  });
});
