import { describe, it, expect } from 'vitest';
import { circuitsEqual, operatorCounts } from '../../ir/circuit';
import {
  boolLiteral,
  call,
  cast,
  expressionToString,
  field,
  ifElse,
  intLiteral,
  stringLiteral,
  tuple,
  variable,
  type Expression,
} from '../../ir/expression';
import { nullable, rowType, scalar } from '../../ir/types';
import { ConstantFold, ExpressionFolder } from '../../passes/constant-fold';
import { column, type Program } from '../../plan/plan-types';
import { INT, compileOrThrow, entries, inserts, rowOf, runSteps, scan, table, view } from '../fixtures';

const x = variable('x', INT);
const fold = (expr: Expression): string => expressionToString(new ExpressionFolder().rewrite(expr));

describe('ExpressionFolder', () => {
  it('should evaluate calls over literals', () => {
    expect(fold(call('*', [call('+', [intLiteral(1), intLiteral(2)]), x]))).toBe('(3 * x)');
  });

  it('should drop neutral operands of AND', () => {
    expect(fold(call('and', [boolLiteral(true), call('>', [x, intLiteral(0)])]))).toBe('(x > 0)');
  });

  it('should collapse OR with a true operand', () => {
    expect(fold(call('or', [call('>', [x, intLiteral(0)]), boolLiteral(true)]))).toBe('true');
  });

  it('should decide null tests on non-nullable operands', () => {
    expect(fold(call('is_null', [x]))).toBe('false');
    const y = variable('y', nullable(INT));
    expect(fold(call('is_null', [y]))).toBe('is_null(y)');
  });

  it('should pick the branch of a literal condition', () => {
    expect(fold(ifElse(boolLiteral(false), x, intLiteral(2)))).toBe('2');
    expect(fold(ifElse(boolLiteral(null), intLiteral(1), intLiteral(2)))).toBe('2');
  });

  it('should read a field of a tuple', () => {
    expect(fold(field(tuple([x, intLiteral(7)]), 1))).toBe('7');
  });

  it('should evaluate casts of literals', () => {
    expect(fold(cast(intLiteral(5), scalar('DOUBLE')))).toBe('5');
  });

  it('should leave a cast that cannot be computed for run time', () => {
    expect(fold(cast(stringLiteral('abc'), INT))).toBe("CAST('abc' AS INTEGER)");
  });

  it('should leave expressions over variables alone', () => {
    const expr = call('+', [x, intLiteral(1)]);
    expect(new ExpressionFolder().rewrite(expr)).toBe(expr);
  });
});

describe('ConstantFold', () => {
  const T = table('T', [['id', INT], ['v', INT]]);
  const always = call('<', [intLiteral(1), intLiteral(2)]);

  it('should remove a filter whose predicate is always true', () => {
    const circuit = compileOrThrow(
      { tables: [T], views: [view('V', { kind: 'filter', input: scan('T'), condition: always })] },
      { optimize: false }
    );
    expect(operatorCounts(circuit).filter).toBe(1);

    const folded = new ConstantFold().apply(circuit);
    expect(operatorCounts(folded)).toEqual({ source: 1, sink: 1 });
    expect(entries(runSteps(folded, [{ T: inserts([1, 2]) }]).V)).toEqual([[[1, 2], 1]]);
  });

  it('should be idempotent', () => {
    const circuit = compileOrThrow(
      {
        tables: [T],
        views: [view('V', {
          kind: 'project',
          input: scan('T'),
          expressions: [call('+', [call('*', [intLiteral(2), intLiteral(3)]), field(variable('r', rowOf(T)), 1)])],
        })],
      },
      { optimize: false }
    );
    const once = new ConstantFold().apply(circuit);
    expect(once.toString()).toContain('(6 + r.1)');
    expect(circuitsEqual(new ConstantFold().apply(once), once)).toBe(true);
  });

  it('should keep null tests on quotients, which are null on division by zero', () => {
    const D = table('D', [['a', INT], ['b', INT]]);
    const DROW = rowOf(D);
    const QROW = rowType([{ name: 'q', type: nullable(INT) }]);
    const program: Program = {
      tables: [D],
      views: [view('Q', {
        kind: 'filter',
        input: {
          kind: 'project',
          input: scan('D'),
          expressions: [call('/', [column(DROW, 0), column(DROW, 1)])],
          names: ['q'],
        },
        condition: call('is_null', [column(QROW, 0)]),
      })],
    };
    const steps = [{ D: inserts([1, 0], [4, 2]) }];
    const plain = runSteps(compileOrThrow(program, { optimize: false }), steps).Q;
    const optimized = runSteps(compileOrThrow(program), steps).Q;
    expect(entries(plain)).toEqual([[[null], 1]]);
    expect(entries(optimized)).toEqual([[[null], 1]]);
  });
});
