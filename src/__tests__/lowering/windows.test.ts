import { describe, it, expect } from 'vitest';
import { operatorCounts } from '../../ir/circuit';
import { CircuitExecutor } from '../../internals/executor';
import type { PlanNode, SortKey, WindowGroup } from '../../plan/plan-types';
import { INT, compileOrThrow, entries, inserts, runSteps, scan, table, view } from '../fixtures';

const T = table('T', [['g', INT], ['t', INT], ['v', INT]]);
const rows = inserts([1, 1, 10], [1, 2, 20], [1, 2, 5]);

function windowView(groups: WindowGroup[]) {
  return compileOrThrow({ tables: [T], views: [view('W', { kind: 'window', input: scan('T'), groups })] });
}

function columnNames(circuit: ReturnType<typeof windowView>, name: string): string[] {
  const sink = circuit.view(name);
  return sink?.outputType.kind === 'zset' ? sink.outputType.element.fields.map(f => f.name) : [];
}

const byTime: Omit<WindowGroup, 'calls'> = { partitionBy: [0], orderBy: [{ column: 1 }] };

describe('Lowering: window functions', () => {
  it('should number rows and sum over peers with the default frame', () => {
    const circuit = windowView([{ ...byTime, calls: [{ fn: 'row_number' }, { fn: 'sum', argument: 2 }] }]);
    expect(columnNames(circuit, 'W')).toEqual(['g', 't', 'v', 'row_number0', 'sum1']);
    expect(entries(runSteps(circuit, [{ T: rows }]).W)).toEqual([
      [[1, 1, 10, 1, 10], 1],
      [[1, 2, 5, 2, 35], 1],
      [[1, 2, 20, 3, 35], 1],
    ]);
  });

  it('should fuse OVER clauses with the same partitioning and ordering', () => {
    const circuit = windowView([
      { ...byTime, calls: [{ fn: 'rank' }] },
      { partitionBy: [0], orderBy: [{ column: 2, ascending: false }], calls: [{ fn: 'row_number' }] },
      { ...byTime, calls: [{ fn: 'sum', argument: 2, name: 'running' }] },
    ]);
    expect(operatorCounts(circuit).window).toBe(2);
    expect(columnNames(circuit, 'W')).toEqual(['g', 't', 'v', 'rank0', 'row_number1', 'running']);
    expect(entries(runSteps(circuit, [{ T: rows }]).W)).toEqual([
      [[1, 1, 10, 1, 2, 10], 1],
      [[1, 2, 5, 2, 3, 35], 1],
      [[1, 2, 20, 2, 1, 35], 1],
    ]);
  });

  it('should use the whole partition as the frame without ORDER BY', () => {
    const circuit = windowView([{ partitionBy: [0], orderBy: [], calls: [{ fn: 'sum', argument: 2 }] }]);
    const result = runSteps(circuit, [{ T: inserts([1, 1, 10], [1, 2, 20], [2, 1, 7]) }]);
    expect(entries(result.W)).toEqual([
      [[1, 1, 10, 30], 1],
      [[1, 2, 20, 30], 1],
      [[2, 1, 7, 7], 1],
    ]);
  });

  it('should read the previous row for LAG', () => {
    const circuit = windowView([{ ...byTime, calls: [{ fn: 'lag', argument: 2 }] }]);
    expect(entries(runSteps(circuit, [{ T: rows }]).W)).toEqual([
      [[1, 1, 10, null], 1],
      [[1, 2, 5, 10], 1],
      [[1, 2, 20, 5], 1],
    ]);
  });

  it('should evaluate a RANGE frame with offsets', () => {
    const circuit = windowView([{
      ...byTime,
      calls: [{
        fn: 'count',
        frame: { unit: 'range', start: { kind: 'preceding', offset: 1 }, end: { kind: 'current' } },
      }],
    }]);
    const result = runSteps(circuit, [{ T: inserts([1, 1, 0], [1, 2, 0], [1, 4, 0], [1, 5, 0]) }]);
    expect(entries(result.W)).toEqual([
      [[1, 1, 0, 1], 1],
      [[1, 2, 0, 2], 1],
      [[1, 4, 0, 1], 1],
      [[1, 5, 0, 2], 1],
    ]);
  });

  it('should only recompute the partitions a change touches', () => {
    const executor = new CircuitExecutor(windowView([{ ...byTime, calls: [{ fn: 'row_number' }] }]));
    executor.step({ T: inserts([1, 1, 10], [1, 3, 30], [2, 1, 1]) });
    expect(entries(executor.step({ T: inserts([1, 2, 20]) }).W)).toEqual([
      [[1, 2, 20, 2], 1],
      [[1, 3, 30, 2], -1],
      [[1, 3, 30, 3], 1],
    ]);
  });
});

describe('Lowering: ORDER BY and LIMIT', () => {
  const X = table('X', [['x', INT]]);

  function sorted(keys: SortKey[], limit?: number): PlanNode {
    return { kind: 'sort', input: scan('X'), keys, limit };
  }

  it('should leave the contents unchanged without LIMIT', () => {
    const circuit = compileOrThrow({ tables: [X], views: [view('S', sorted([{ column: 0 }]))] });
    expect(operatorCounts(circuit)).toEqual({ source: 1, sink: 1 });
  });

  it('should keep the top rows and replace one displaced by an insert', () => {
    const executor = new CircuitExecutor(
      compileOrThrow({ tables: [X], views: [view('TOP', sorted([{ column: 0, ascending: false }], 2))] })
    );
    expect(entries(executor.step({ X: inserts([5], [3], [9]) }).TOP)).toEqual([[[5], 1], [[9], 1]]);
    expect(entries(executor.step({ X: inserts([7]) }).TOP)).toEqual([[[5], -1], [[7], 1]]);
    expect(entries(executor.view('TOP'))).toEqual([[[7], 1], [[9], 1]]);
  });

  it('should resolve ORDER BY ordinals', () => {
    const circuit = compileOrThrow({ tables: [X], views: [view('TOP', sorted([{ column: 1, ordinal: true }], 1))] });
    expect(entries(runSteps(circuit, [{ X: inserts([5], [3], [9]) }]).TOP)).toEqual([[[3], 1]]);
  });
});
