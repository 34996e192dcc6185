import { describe, it, expect } from 'vitest';
import { CompilerMessages } from '../../common/diagnostics';
import { EvaluationError, InvariantViolationError } from '../../common/errors';
import { applyClosure, compareValues, evaluate } from '../../ir/evaluate';
import {
  boolLiteral,
  call,
  cast,
  closure,
  doubleLiteral,
  expressionToString,
  field,
  ifElse,
  intLiteral,
  literal,
  nullLiteral,
  stringLiteral,
  tuple,
  variable,
} from '../../ir/expression';
import { nullable, rowType, scalar, typeToString } from '../../ir/types';

const INT = scalar('INTEGER');
const ROW = rowType([{ name: 'x', type: INT }, { name: 's', type: nullable(scalar('VARCHAR')) }]);
const r = variable('r', ROW);

describe('Expressions', () => {
  describe('construction', () => {
    it('should reject a null literal of a non-nullable type', () => {
      expect(() => literal(INT, null)).toThrow(InvariantViolationError);
      expect(nullLiteral(INT).type.nullable).toBe(true);
    });

    it('should make fields of a nullable row nullable', () => {
      const maybe = variable('m', nullable(ROW));
      expect(typeToString(field(maybe, 0).type)).toBe('INTEGER?');
      expect(typeToString(field(r, 0).type)).toBe('INTEGER');
    });

    it('should reject duplicate closure parameters', () => {
      expect(() => closure([{ name: 'a', type: INT }, { name: 'a', type: INT }], intLiteral(1))).toThrow(
        'Closure parameters must have distinct names'
      );
    });

    it('should name tuple fields', () => {
      expect(typeToString(tuple([intLiteral(1), stringLiteral('a')]).type)).toBe('ROW(f0 INTEGER, f1 VARCHAR)');
      expect(typeToString(tuple([intLiteral(1)], ['n']).type)).toBe('ROW(n INTEGER)');
    });
  });

  describe('call typing', () => {
    it('should compute result types from the operator signature', () => {
      expect(typeToString(call('+', [intLiteral(1), doubleLiteral(2)]).type)).toBe('DOUBLE');
      expect(typeToString(call('=', [intLiteral(null), intLiteral(1)]).type)).toBe('BOOLEAN?');
      expect(typeToString(call('is_null', [intLiteral(null)]).type)).toBe('BOOLEAN');
      expect(typeToString(call('indicator', [field(r, 1)]).type)).toBe('BIGINT');
      expect(typeToString(call('char_length', [field(r, 1)]).type)).toBe('INTEGER?');
    });

    it('should make COALESCE non-nullable when any operand is', () => {
      expect(typeToString(call('coalesce', [intLiteral(null), intLiteral(0)]).type)).toBe('INTEGER');
      expect(typeToString(call('coalesce', [intLiteral(null), intLiteral(null)]).type)).toBe('INTEGER?');
    });

    it('should report operand mismatches and yield ERROR', () => {
      const messages = new CompilerMessages();
      const bad = call('+', [intLiteral(1), stringLiteral('a')], messages);
      expect(bad.type.kind).toBe('error');
      expect(messages.getErrors()[0].message).toBe("Type mismatch: operator '+' cannot be applied to (INTEGER, VARCHAR)");

      // nothing further is reported for an operand that is already ERROR
      call('-', [bad, intLiteral(1)], messages);
      expect(messages.errorCount).toBe(1);
    });

    it('should report arity mismatches', () => {
      const messages = new CompilerMessages();
      call('not', [boolLiteral(true), boolLiteral(false)], messages);
      expect(messages.getErrors()[0].message).toBe("Operator 'not' expects 1 argument(s), got 2");
    });

    it('should throw without a reporter', () => {
      expect(() => call('+', [intLiteral(1), stringLiteral('a')])).toThrow(InvariantViolationError);
    });

    it('should require a BOOLEAN condition', () => {
      const messages = new CompilerMessages();
      const expr = ifElse(intLiteral(1), intLiteral(2), intLiteral(3), messages);
      expect(expr.type.kind).toBe('error');
      expect(messages.getErrors()[0].message).toBe('Type mismatch: condition must be BOOLEAN, got INTEGER');
    });
  });

  describe('printing', () => {
    it('should print infix operators, calls and closures', () => {
      const plus = call('+', [field(r, 0), intLiteral(1)]);
      expect(expressionToString(plus)).toBe('(r.0 + 1)');
      expect(expressionToString(call('coalesce', [field(r, 1), stringLiteral('-')]))).toBe("coalesce(r.1, '-')");
      expect(expressionToString(closure([{ name: 'r', type: ROW }], plus))).toBe('|r: ROW(x INTEGER, s VARCHAR?)| (r.0 + 1)');
    });

    it('should print literals unambiguously', () => {
      expect(expressionToString(stringLiteral("it's"))).toBe("'it''s'");
      expect(expressionToString(nullLiteral(INT))).toBe('null::INTEGER?');
      expect(expressionToString(cast(intLiteral(1), scalar('DOUBLE')))).toBe('CAST(1 AS DOUBLE)');
    });
  });
});

describe('evaluate', () => {
  const T = boolLiteral(true);
  const F = boolLiteral(false);
  const N = boolLiteral(null);

  it('should follow three-valued logic', () => {
    expect(evaluate(call('and', [N, F]))).toBe(false);
    expect(evaluate(call('and', [N, T]))).toBeNull();
    expect(evaluate(call('or', [N, T]))).toBe(true);
    expect(evaluate(call('or', [N, F]))).toBeNull();
    expect(evaluate(call('not', [N]))).toBeNull();
  });

  it('should propagate nulls through strict operators', () => {
    expect(evaluate(call('+', [intLiteral(null), intLiteral(1)]))).toBeNull();
    expect(evaluate(call('=', [intLiteral(null), intLiteral(null)]))).toBeNull();
    expect(evaluate(call('is_null', [intLiteral(null)]))).toBe(true);
    expect(evaluate(call('coalesce', [intLiteral(null), intLiteral(4)]))).toBe(4);
  });

  it('should truncate integer division and give null on division by zero', () => {
    expect(evaluate(call('/', [intLiteral(7), intLiteral(2)]))).toBe(3);
    expect(evaluate(call('/', [intLiteral(7), doubleLiteral(2)]))).toBe(3.5);
    expect(evaluate(call('/', [intLiteral(7), intLiteral(0)]))).toBeNull();
    expect(evaluate(call('%', [intLiteral(7), intLiteral(3)]))).toBe(1);
  });

  it('should type division and remainder as nullable', () => {
    expect(call('/', [intLiteral(7), intLiteral(2)]).type).toEqual(nullable(INT));
    expect(typeToString(call('%', [intLiteral(7), doubleLiteral(2)]).type)).toBe('DOUBLE?');
  });

  it('should evaluate string functions', () => {
    expect(evaluate(call('||', [stringLiteral('ab'), stringLiteral('cd')]))).toBe('abcd');
    expect(evaluate(call('upper', [stringLiteral('ab')]))).toBe('AB');
    expect(evaluate(call('char_length', [stringLiteral('abc')]))).toBe(3);
  });

  it('should cast values', () => {
    expect(evaluate(cast(stringLiteral('12.7'), INT))).toBe(12);
    expect(evaluate(cast(stringLiteral('abc'), nullable(INT)))).toBeNull();
    expect(() => evaluate(cast(stringLiteral('abc'), INT))).toThrow(EvaluationError);
    expect(() => evaluate(cast(stringLiteral(''), scalar('DOUBLE')))).toThrow('Cannot cast "" to DOUBLE');
    expect(evaluate(cast(intLiteral(3), scalar('VARCHAR')))).toBe('3');
    expect(evaluate(cast(stringLiteral(' TRUE '), scalar('BOOLEAN')))).toBe(true);
  });

  it('should take the else branch on a null condition', () => {
    expect(evaluate(ifElse(N, intLiteral(1), intLiteral(2)))).toBe(2);
  });

  it('should apply closures to rows', () => {
    const fn = closure([{ name: 'r', type: ROW }], tuple([call('*', [field(r, 0), intLiteral(2)]), field(r, 1)]));
    expect(applyClosure(fn, [[21, null]])).toEqual([42, null]);
    expect(() => applyClosure(fn, [])).toThrow('Closure expects 1 argument(s), got 0');
  });

  it('should order nulls first and rows lexicographically', () => {
    expect(compareValues(null, 0)).toBe(-1);
    expect(compareValues([1, 'b'], [1, 'a'])).toBe(1);
    expect(compareValues([1], [1, null])).toBeLessThan(0);
    expect(compareValues(false, true)).toBe(-1);
  });
});
