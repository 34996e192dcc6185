/**
 * Expression Evaluation
 * ======================
 *
 * Evaluates expression trees with SQL three-valued logic. Shared by
 * constant folding and the reference executor.
 *
 * @module
 */

import { EvaluationError, InvariantViolationError, assertNever, invariant } from '../common/errors';
import type { CallExpression, ClosureExpression, Expression, Row, Value } from './expression';
import { isIntegral, typeToString, type Type } from './types';

export type Environment = ReadonlyMap<string, Value>;

export function isRow(value: Value): value is Row {
  return Array.isArray(value);
}

export function asRow(value: Value): Row {
  invariant(isRow(value), `Expected a row value, got ${JSON.stringify(value)}`);
  return value;
}

/**
 * Total order used for ORDER BY, MIN and MAX: null sorts first, rows
 * compare lexicographically.
 */
export function compareValues(a: Value, b: Value): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if (isRow(a) && isRow(b)) {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const c = compareValues(a[i], b[i]);
      if (c !== 0) return c;
    }
    return a.length - b.length;
  }
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function num(value: Value): number {
  invariant(typeof value === 'number', `Expected a number, got ${JSON.stringify(value)}`);
  return value;
}

function str(value: Value): string {
  invariant(typeof value === 'string', `Expected a string, got ${JSON.stringify(value)}`);
  return value;
}

function arithmetic(op: string, a: number, b: number, type: Type): Value {
  const integral = isIntegral(type);
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) return null;
      return integral ? Math.trunc(a / b) : a / b;
    case '%':
      if (b === 0) return null;
      return a % b;
    default:
      throw new InvariantViolationError(`Not an arithmetic operator: ${op}`);
  }
}

function evaluateCall(expr: CallExpression, env: Environment): Value {
  // and/or/coalesce/null tests must see nulls themselves
  switch (expr.op) {
    case 'and': {
      const values = expr.args.map(a => evaluate(a, env));
      if (values.some(v => v === false)) return false;
      return values.some(v => v === null) ? null : true;
    }
    case 'or': {
      const values = expr.args.map(a => evaluate(a, env));
      if (values.some(v => v === true)) return true;
      return values.some(v => v === null) ? null : false;
    }
    case 'coalesce': {
      for (const arg of expr.args) {
        const value = evaluate(arg, env);
        if (value !== null) return value;
      }
      return null;
    }
    case 'is_null':
      return evaluate(expr.args[0], env) === null;
    case 'is_not_null':
      return evaluate(expr.args[0], env) !== null;
    case 'indicator':
      return evaluate(expr.args[0], env) === null ? 0 : 1;
    default:
      break;
  }

  const args = expr.args.map(a => evaluate(a, env));
  if (args.some(v => v === null)) return null;

  switch (expr.op) {
    case 'neg':
      return -num(args[0]);
    case 'not':
      return !args[0];
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
      return arithmetic(expr.op, num(args[0]), num(args[1]), expr.type);
    case '=':
      return compareValues(args[0], args[1]) === 0;
    case '<>':
      return compareValues(args[0], args[1]) !== 0;
    case '<':
      return compareValues(args[0], args[1]) < 0;
    case '<=':
      return compareValues(args[0], args[1]) <= 0;
    case '>':
      return compareValues(args[0], args[1]) > 0;
    case '>=':
      return compareValues(args[0], args[1]) >= 0;
    case '||':
      return str(args[0]) + str(args[1]);
    case 'abs':
      return Math.abs(num(args[0]));
    case 'upper':
      return str(args[0]).toUpperCase();
    case 'lower':
      return str(args[0]).toLowerCase();
    case 'char_length':
      return str(args[0]).length;
    default:
      return assertNever(expr.op, 'operator');
  }
}

/** Null for a nullable target when the value is not a number; an error otherwise */
function castNumber(value: Value, type: Type, round: (n: number) => number): Value {
  const n = typeof value === 'string' && value.trim() === '' ? NaN : Number(value);
  if (Number.isFinite(n)) return round(n);
  if (type.nullable) return null;
  throw new EvaluationError(`Cannot cast ${JSON.stringify(value)} to ${typeToString(type)}`);
}

function castValue(value: Value, type: Type): Value {
  if (value === null) return null;
  if (type.kind !== 'scalar') return value;
  switch (type.scalar) {
    case 'TINYINT':
    case 'SMALLINT':
    case 'INTEGER':
    case 'BIGINT':
      return castNumber(value, type, Math.trunc);
    case 'DECIMAL':
    case 'REAL':
    case 'DOUBLE':
      return castNumber(value, type, n => n);
    case 'VARCHAR':
      return String(value);
    case 'BOOLEAN':
      return typeof value === 'string' ? value.trim().toLowerCase() === 'true' : Boolean(value);
    default:
      return value;
  }
}

/** Evaluates a closure-free expression under the given parameter bindings */
export function evaluate(expr: Expression, env: Environment = new Map()): Value {
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'var': {
      invariant(env.has(expr.name), `Unbound variable ${expr.name}`);
      return env.get(expr.name) ?? null;
    }
    case 'field': {
      const target = evaluate(expr.target, env);
      if (target === null) return null;
      return asRow(target)[expr.index] ?? null;
    }
    case 'call':
      return evaluateCall(expr, env);
    case 'cast':
      return castValue(evaluate(expr.operand, env), expr.type);
    case 'if':
      return evaluate(expr.condition, env) === true
        ? evaluate(expr.then, env)
        : evaluate(expr.otherwise, env);
    case 'tuple':
      return expr.fields.map(f => evaluate(f, env));
    case 'closure':
      throw new InvariantViolationError('A closure is not a value; use applyClosure');
    default:
      return assertNever(expr, 'expression');
  }
}

/** Applies a row-transform closure to its arguments */
export function applyClosure(fn: ClosureExpression, args: readonly Value[]): Value {
  invariant(fn.params.length === args.length, `Closure expects ${fn.params.length} argument(s), got ${args.length}`);
  const env = new Map<string, Value>();
  fn.params.forEach((p, i) => env.set(p.name, args[i]));
  return evaluate(fn.body, env);
}
