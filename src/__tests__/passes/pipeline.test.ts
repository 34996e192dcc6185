import { describe, it, expect } from 'vitest';
import type { Row } from '../../ir/expression';
import type { ZSet } from '../../internals/zset';
import { CompilerMessages } from '../../common/diagnostics';
import { DEFAULT_PIPELINE } from '../../common/options';
import { Circuit, circuitsEqual, operatorCounts } from '../../ir/circuit';
import { call, field, intLiteral } from '../../ir/expression';
import type { ColumnMetadata } from '../../ir/operators';
import { concatRows } from '../../ir/types';
import { DeadCode, liveOperators } from '../../passes/dead-code';
import { createPass, optimize } from '../../passes/pipeline';
import { RemoveDeindex } from '../../passes/remove-deindex';
import { column, type Program } from '../../plan/plan-types';
import { StreamBuilder } from '../../plan/streams';
import { INT, STR, compileOrThrow, deletes, entries, inserts, rowOf, runSteps, scan, table, view } from '../fixtures';

const T = table('T', [['g', INT], ['v', INT]]);
const U = table('U', [['g', INT], ['label', STR]]);
const JOINED = concatRows(rowOf(T), rowOf(U));

function metadata(names: string[]): ColumnMetadata[] {
  return names.map(name => ({ name, type: INT, isPrimaryKey: false }));
}

describe('DeadCode', () => {
  it('should drop operators no view reads but keep every source', () => {
    const b = new StreamBuilder(new Circuit(), new CompilerMessages());
    const t = b.source('T', metadata(['g', 'v']));
    b.source('UNUSED', metadata(['x']));
    b.map(t, r => [call('+', [field(r, 1), intLiteral(1)])]);
    b.sink(t, 'V');

    expect(liveOperators(b.circuit)).toEqual(new Set([0, 1, 3]));
    expect(operatorCounts(new DeadCode().apply(b.circuit))).toEqual({ source: 2, sink: 1 });
  });
});

describe('RemoveDeindex', () => {
  it('should replace every Deindex with a Map and keep the results', () => {
    const circuit = compileOrThrow({
      tables: [T],
      views: [view('W', {
        kind: 'window',
        input: scan('T'),
        groups: [{ partitionBy: [0], orderBy: [{ column: 1 }], calls: [{ fn: 'row_number' }] }],
      })],
    }, { optimize: false });
    expect(operatorCounts(circuit).deindex).toBe(1);

    const rewritten = new RemoveDeindex().apply(circuit);
    expect(operatorCounts(rewritten)).toEqual({ source: 1, index: 1, window: 1, map: 1, sink: 1 });
    const steps = [{ T: inserts([1, 5], [1, 3], [2, 4]) }];
    expect(entries(runSteps(rewritten, steps).W)).toEqual([
      [[1, 3, 1], 1],
      [[1, 5, 2], 1],
      [[2, 4, 1], 1],
    ]);
  });
});

describe('optimize', () => {
  const program: Program = {
    tables: [T, U],
    views: [view('TOTALS', {
      kind: 'aggregate',
      input: {
        kind: 'filter',
        input: {
          kind: 'join',
          joinType: 'left',
          left: scan('T'),
          right: scan('U'),
          leftKeys: [0],
          rightKeys: [0],
        },
        condition: call('>', [column(JOINED, 1), intLiteral(0)]),
      },
      groupBy: [3],
      aggregates: [{ fn: 'sum', argument: 1 }, { fn: 'count' }],
    })],
  };
  const steps: Array<Record<string, ZSet<Row>>> = [
    { T: inserts([1, 5], [1, 7], [2, 3], [3, -1]), U: inserts([1, 'a']) },
    { U: inserts([2, 'a'], [3, 'b']) },
    { T: deletes([1, 7]) },
  ];

  it('should not change what the views contain', () => {
    const plain = compileOrThrow(program, { optimize: false });
    const optimized = compileOrThrow(program);

    const expected = runSteps(plain, steps).TOTALS;
    expect(runSteps(optimized, steps).TOTALS.equals(expected)).toBe(true);
    expect(entries(expected)).toEqual([[['a', 8, 2], 1]]);
  });

  it('should reach a fixed point', () => {
    const optimized = compileOrThrow(program);
    expect(circuitsEqual(optimize(optimized), optimized)).toBe(true);
  });

  it('should return the circuit unchanged for an empty pipeline', () => {
    const circuit = compileOrThrow(program, { optimize: false });
    expect(optimize(circuit, [])).toBe(circuit);
  });

  it('should build the default pipeline by name', () => {
    expect(DEFAULT_PIPELINE.map(name => createPass(name).name)).toEqual([...DEFAULT_PIPELINE]);
  });
});
