import { describe, it, expect } from 'vitest';
import { compile } from '../../compiler';
import { CompilationError } from '../../common/errors';
import { tuple } from '../../ir/expression';
import { rowType, scalar } from '../../ir/types';
import { column, type Program } from '../../plan/plan-types';
import { INT, STR, rowOf, scan, table, view } from '../fixtures';

const T = table('T', [['id', INT], ['label', STR], ['score', scalar('INTEGER', true)]]);
const TROW = rowOf(T);
const RANGE = { startLine: 2, startColumn: 15, endLine: 2, endColumn: 16 };

describe('Lowering: diagnostics', () => {
  it('should report an unknown object and produce no circuit', () => {
    const result = compile({
      tables: [T],
      views: [view('OK', scan('T')), view('BAD', { kind: 'scan', name: 'X', range: RANGE })],
    });
    expect(result.circuit).toBeUndefined();
    expect(result.schema).toBeUndefined();
    expect(result.messages.toString()).toBe("2:15: error: Object 'X' not found");
    expect(result.messages.exitCode).toBe(1);
  });

  it('should report every failing view', () => {
    const result = compile({
      tables: [T],
      views: [view('A', scan('X')), view('B', scan('T')), view('C', scan('Y'))],
    });
    expect(result.messages.getErrors().map(m => m.message)).toEqual([
      "Object 'X' not found",
      "Object 'Y' not found",
    ]);
  });

  it('should reject a view declared twice', () => {
    const { messages } = compile({ tables: [T], views: [view('V', scan('T')), view('V', scan('T'))] });
    expect(messages.getErrors()[0].message).toBe("Object 'V' is already defined");
  });

  it('should report row-typed view columns as not yet implemented', () => {
    const { messages } = compile({
      tables: [T],
      views: [view('NESTED', {
        kind: 'project',
        input: scan('T'),
        expressions: [column(TROW, 0), tuple([column(TROW, 1), column(TROW, 2)])],
      })],
    });
    expect(messages.getErrors()).toEqual([
      { severity: 'error', range: undefined, message: 'Not yet implemented: ROW', code: 'UnsupportedConstruct' },
    ]);
  });

  it('should report a type mismatch in an aggregate', () => {
    const { circuit, messages } = compile({
      tables: [T],
      views: [view('S', { kind: 'aggregate', input: scan('T'), groupBy: [], aggregates: [{ fn: 'sum', argument: 1 }] })],
    });
    expect(circuit).toBeUndefined();
    expect(messages.getErrors()[0]).toMatchObject({
      code: 'TypeMismatch',
      message: 'Type mismatch: SUM cannot be applied to VARCHAR',
    });
  });

  it('should reject an out-of-range ORDER BY ordinal', () => {
    const { messages } = compile({
      tables: [T],
      views: [view('TOP', {
        kind: 'sort',
        input: { kind: 'project', input: scan('T'), expressions: [column(TROW, 0), column(TROW, 1)] },
        keys: [{ column: 3, ordinal: true }],
        limit: 10,
      })],
    });
    expect(messages.getErrors()[0].message).toBe('ORDER BY ordinal 3 is out of range: the query has 2 column(s)');
  });

  it('should reject a RANGE offset over a nullable ordering column', () => {
    const { messages } = compile({
      tables: [T],
      views: [view('W', {
        kind: 'window',
        input: scan('T'),
        groups: [{
          partitionBy: [1],
          orderBy: [{ column: 2 }],
          calls: [{
            fn: 'sum',
            argument: 0,
            frame: { unit: 'range', start: { kind: 'preceding', offset: 1 }, end: { kind: 'current' } },
          }],
        }],
      })],
    });
    expect(messages.getErrors()).toEqual([{
      severity: 'error',
      range: undefined,
      message: 'Not yet implemented: OVER currently does not support sorting on nullable column',
      code: 'UnsupportedConstruct',
    }]);
  });

  it('should abort the unit on a broken plan contract', () => {
    const { circuit, messages } = compile({
      tables: [],
      views: [view('V', { kind: 'values', type: rowType([{ name: 'a', type: INT }, { name: 'b', type: INT }]), rows: [[1]] })],
    });
    expect(circuit).toBeUndefined();
    expect(messages.getErrors()).toEqual([{
      severity: 'error',
      range: undefined,
      message: 'VALUES row has 1 value(s), expected 2',
      code: 'InvariantViolation',
    }]);
  });

  it('should throw the first error when throwOnError is set', () => {
    const program: Program = { tables: [T], views: [view('V', scan('X'))] };
    expect(() => compile(program, { throwOnError: true })).toThrow(CompilationError);
    expect(() => compile(program, { throwOnError: true })).toThrow("Object 'X' not found");
  });
});

describe('Lowering: warnings', () => {
  const U = table('U', [['x', INT]]);

  it('should warn about tables no view reads, without blocking the circuit', () => {
    const { circuit, messages } = compile({ tables: [T, U], views: [view('V', scan('T'))] });
    expect(circuit).toBeDefined();
    expect(messages.hasErrors()).toBe(false);
    expect(messages.warningCount).toBe(1);
    expect(messages.messages[0].code).toBe('UnusedTable');
    expect(messages.toString()).toBe("warning: Table 'U' is not used");
  });

  it('should not count reads through a view as unused', () => {
    const { messages } = compile({
      tables: [T, U],
      views: [view('V', scan('U')), view('W', scan('V'))],
    });
    expect(messages.toString()).toBe("warning: Table 'T' is not used");
  });

  it('should stay silent when the warning is disabled', () => {
    const { messages } = compile({ tables: [T, U], views: [] }, { warnUnusedTables: false });
    expect(messages.messages).toEqual([]);
  });

  it('should still emit the unused table as a source', () => {
    const { circuit } = compile({ tables: [T, U], views: [view('V', scan('T'))] });
    expect(circuit?.sources().map(s => s.name)).toEqual(['T', 'U']);
  });
});
