/**
 * Expression IR
 * ==============
 *
 * Immutable, typed expression trees. Operator payloads (map functions,
 * filter predicates, join combiners, index key extractors) are closures
 * built from these nodes.
 *
 * Expressions are pure: rewrites duplicate, reorder and hoist them freely,
 * and equal printed forms mean equal semantics.
 *
 * @module
 */

import type { DiagnosticReporter } from '../common/diagnostics';
import { InvariantViolationError, assertNever, invariant, type SourceRange } from '../common/errors';
import {
  ERROR_TYPE,
  asRowType,
  commonType,
  fieldAt,
  isBoolean,
  isCompatible,
  isNumeric,
  isString,
  nullable,
  rowType,
  scalar,
  typeToString,
  withNullability,
  type RowField,
  type RowType,
  type Type,
} from './types';

// ============ VALUES ============

export type ScalarValue = number | string | boolean;

/**
 * Runtime value of an expression; rows are arrays of values. Numbers are
 * doubles, so BIGINT and DECIMAL are exact only within 2^53.
 */
export type Value = ScalarValue | null | readonly Value[];

export type Row = readonly Value[];

// ============ EXPRESSION VARIANTS ============

export interface LiteralExpression {
  readonly kind: 'literal';
  readonly type: Type;
  readonly value: Value;
}

/** Reference to a closure parameter */
export interface VariableExpression {
  readonly kind: 'var';
  readonly name: string;
  readonly type: Type;
}

/** Positional field of a row-valued expression */
export interface FieldExpression {
  readonly kind: 'field';
  readonly target: Expression;
  readonly index: number;
  readonly type: Type;
}

export interface CallExpression {
  readonly kind: 'call';
  readonly op: OperatorName;
  readonly args: readonly Expression[];
  readonly type: Type;
}

export interface CastExpression {
  readonly kind: 'cast';
  readonly operand: Expression;
  readonly type: Type;
}

export interface IfExpression {
  readonly kind: 'if';
  readonly condition: Expression;
  readonly then: Expression;
  readonly otherwise: Expression;
  readonly type: Type;
}

export interface TupleExpression {
  readonly kind: 'tuple';
  readonly fields: readonly Expression[];
  readonly type: RowType;
}

export interface Parameter {
  readonly name: string;
  readonly type: Type;
}

/** Row-transform function embedded in an operator */
export interface ClosureExpression {
  readonly kind: 'closure';
  readonly params: readonly Parameter[];
  readonly body: Expression;
  readonly type: Type;
}

export type Expression =
  | LiteralExpression
  | VariableExpression
  | FieldExpression
  | CallExpression
  | CastExpression
  | IfExpression
  | TupleExpression
  | ClosureExpression;

// ============ OPERATOR SIGNATURES ============

export type OperatorName =
  | 'neg'
  | 'not'
  | 'is_null'
  | 'is_not_null'
  | 'indicator'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '='
  | '<>'
  | '<'
  | '<='
  | '>'
  | '>='
  | 'and'
  | 'or'
  | '||'
  | 'coalesce'
  | 'abs'
  | 'upper'
  | 'lower'
  | 'char_length';

type OperandClass = 'numeric' | 'boolean' | 'string' | 'comparable' | 'any';

type ResultRule =
  | 'common'           // least upper bound of the operands
  | 'common-nullable'  // least upper bound, always nullable (division by zero gives null)
  | 'boolean'          // BOOLEAN, nullable if any operand is
  | 'boolean-not-null'
  | 'indicator'        // BIGINT NOT NULL
  | 'integer'          // INTEGER, nullable if any operand is
  | 'coalesce';        // common type, nullable only if every operand is

interface OperatorSignature {
  minArity: number;
  maxArity: number;
  operands: OperandClass;
  result: ResultRule;
}

const unary = (operands: OperandClass, result: ResultRule): OperatorSignature =>
  ({ minArity: 1, maxArity: 1, operands, result });
const binaryOp = (operands: OperandClass, result: ResultRule): OperatorSignature =>
  ({ minArity: 2, maxArity: 2, operands, result });

export const OPERATOR_SIGNATURES: Readonly<Record<OperatorName, OperatorSignature>> = {
  neg: unary('numeric', 'common'),
  not: unary('boolean', 'boolean'),
  is_null: unary('any', 'boolean-not-null'),
  is_not_null: unary('any', 'boolean-not-null'),
  indicator: unary('any', 'indicator'),
  '+': binaryOp('numeric', 'common'),
  '-': binaryOp('numeric', 'common'),
  '*': binaryOp('numeric', 'common'),
  '/': binaryOp('numeric', 'common-nullable'),
  '%': binaryOp('numeric', 'common-nullable'),
  '=': binaryOp('comparable', 'boolean'),
  '<>': binaryOp('comparable', 'boolean'),
  '<': binaryOp('comparable', 'boolean'),
  '<=': binaryOp('comparable', 'boolean'),
  '>': binaryOp('comparable', 'boolean'),
  '>=': binaryOp('comparable', 'boolean'),
  and: binaryOp('boolean', 'boolean'),
  or: binaryOp('boolean', 'boolean'),
  '||': binaryOp('string', 'common'),
  coalesce: { minArity: 1, maxArity: Infinity, operands: 'comparable', result: 'coalesce' },
  abs: unary('numeric', 'common'),
  upper: unary('string', 'common'),
  lower: unary('string', 'common'),
  char_length: unary('string', 'integer'),
};

/** Reporter used when the caller supplies none: any mismatch is a bug */
const STRICT_REPORTER: DiagnosticReporter = {
  report(_severity, range, message) {
    throw new InvariantViolationError(message, range);
  },
};

function operandsMatch(operands: OperandClass, args: readonly Expression[]): boolean {
  switch (operands) {
    case 'numeric':
      return args.every(a => isNumeric(a.type));
    case 'boolean':
      return args.every(a => isBoolean(a.type));
    case 'string':
      return args.every(a => isString(a.type));
    case 'comparable':
      return args.every(a => a.type.kind === 'scalar' && isCompatible(a.type, args[0].type));
    case 'any':
      return true;
    default:
      return assertNever(operands, 'operand class');
  }
}

function resultType(
  rule: ResultRule,
  args: readonly Expression[],
  reporter: DiagnosticReporter,
  range?: SourceRange
): Type {
  const anyNullable = args.some(a => a.type.nullable);
  switch (rule) {
    case 'common':
      return args.slice(1).reduce<Type>((acc, a) => commonType(acc, a.type, reporter, range), args[0].type);
    case 'common-nullable':
      return nullable(args.slice(1).reduce<Type>((acc, a) => commonType(acc, a.type, reporter, range), args[0].type));
    case 'boolean':
      return scalar('BOOLEAN', anyNullable);
    case 'boolean-not-null':
      return scalar('BOOLEAN');
    case 'indicator':
      return scalar('BIGINT');
    case 'integer':
      return scalar('INTEGER', anyNullable);
    case 'coalesce': {
      const common = args.slice(1).reduce<Type>((acc, a) => commonType(acc, a.type, reporter, range), args[0].type);
      return withNullability(common, args.every(a => a.type.nullable));
    }
    default:
      return assertNever(rule, 'result rule');
  }
}

// ============ CONSTRUCTORS ============

/**
 * Typed literal. A `null` value with a non-nullable type is a contract
 * violation and fails immediately.
 */
export function literal(type: Type, value: Value): LiteralExpression {
  if (value === null && !type.nullable) {
    throw new InvariantViolationError(`Null value with non-nullable type ${typeToString(type)}`);
  }
  return { kind: 'literal', type, value };
}

export function nullLiteral(type: Type): LiteralExpression {
  return literal(nullable(type), null);
}

export const intLiteral = (value: number | null, nullableType = value === null): LiteralExpression =>
  literal(scalar('INTEGER', nullableType), value);
export const bigintLiteral = (value: number): LiteralExpression => literal(scalar('BIGINT'), value);
export const doubleLiteral = (value: number | null, nullableType = value === null): LiteralExpression =>
  literal(scalar('DOUBLE', nullableType), value);
export const stringLiteral = (value: string | null, nullableType = value === null): LiteralExpression =>
  literal(scalar('VARCHAR', nullableType), value);
export const boolLiteral = (value: boolean | null, nullableType = value === null): LiteralExpression =>
  literal(scalar('BOOLEAN', nullableType), value);

export function variable(name: string, type: Type): VariableExpression {
  return { kind: 'var', name, type };
}

export function field(target: Expression, index: number, range?: SourceRange): FieldExpression {
  if (target.type.kind === 'error') {
    return { kind: 'field', target, index, type: ERROR_TYPE };
  }
  const row = asRowType(target.type, range);
  const fieldType = fieldAt(row, index, range).type;
  return {
    kind: 'field',
    target,
    index,
    type: row.nullable ? nullable(fieldType) : fieldType,
  };
}

/**
 * Operator call, validated against OPERATOR_SIGNATURES. Mismatches are
 * reported as TypeMismatch and produce an ERROR-typed node.
 */
export function call(
  op: OperatorName,
  args: readonly Expression[],
  reporter: DiagnosticReporter = STRICT_REPORTER,
  range?: SourceRange
): CallExpression {
  const signature = OPERATOR_SIGNATURES[op];
  if (args.length < signature.minArity || args.length > signature.maxArity) {
    reporter.report('error', range, `Operator '${op}' expects ${signature.minArity} argument(s), got ${args.length}`, 'TypeMismatch');
    return { kind: 'call', op, args, type: ERROR_TYPE };
  }
  if (args.some(a => a.type.kind === 'error')) {
    return { kind: 'call', op, args, type: ERROR_TYPE };
  }
  if (!operandsMatch(signature.operands, args)) {
    const types = args.map(a => typeToString(a.type)).join(', ');
    reporter.report('error', range, `Type mismatch: operator '${op}' cannot be applied to (${types})`, 'TypeMismatch');
    return { kind: 'call', op, args, type: ERROR_TYPE };
  }
  return { kind: 'call', op, args, type: resultType(signature.result, args, reporter, range) };
}

export function cast(operand: Expression, type: Type): CastExpression {
  return { kind: 'cast', operand, type };
}

export function ifElse(
  condition: Expression,
  then: Expression,
  otherwise: Expression,
  reporter: DiagnosticReporter = STRICT_REPORTER,
  range?: SourceRange
): IfExpression {
  if (condition.type.kind !== 'error' && !isBoolean(condition.type)) {
    reporter.report('error', range, `Type mismatch: condition must be BOOLEAN, got ${typeToString(condition.type)}`, 'TypeMismatch');
    return { kind: 'if', condition, then, otherwise, type: ERROR_TYPE };
  }
  return { kind: 'if', condition, then, otherwise, type: commonType(then.type, otherwise.type, reporter, range) };
}

export function tuple(fields: readonly Expression[], names?: readonly string[]): TupleExpression {
  const rowFields: RowField[] = fields.map((f, i) => ({ name: names?.[i] ?? `f${i}`, type: f.type }));
  return { kind: 'tuple', fields, type: rowType(rowFields) };
}

export function closure(params: readonly Parameter[], body: Expression): ClosureExpression {
  const names = new Set(params.map(p => p.name));
  invariant(names.size === params.length, 'Closure parameters must have distinct names');
  return { kind: 'closure', params, body, type: body.type };
}

/** The row type a closure produces */
export function closureRowType(fn: ClosureExpression): RowType {
  return asRowType(fn.body.type);
}

// ============ PRINTING ============

function valueToString(value: Value): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
  if (Array.isArray(value)) return `(${value.map(valueToString).join(', ')})`;
  return String(value);
}

/** Canonical printed form; used for circuit dumps and structural equality */
export function expressionToString(expr: Expression): string {
  switch (expr.kind) {
    case 'literal':
      return expr.value === null ? `null::${typeToString(expr.type)}` : valueToString(expr.value);
    case 'var':
      return expr.name;
    case 'field':
      return `${expressionToString(expr.target)}.${expr.index}`;
    case 'call': {
      const args = expr.args.map(expressionToString);
      if (args.length === 2 && !/^[a-z_]+$/.test(expr.op)) {
        return `(${args[0]} ${expr.op} ${args[1]})`;
      }
      return `${expr.op}(${args.join(', ')})`;
    }
    case 'cast':
      return `CAST(${expressionToString(expr.operand)} AS ${typeToString(expr.type)})`;
    case 'if':
      return `if ${expressionToString(expr.condition)} then ${expressionToString(expr.then)} else ${expressionToString(expr.otherwise)}`;
    case 'tuple':
      return `(${expr.fields.map(expressionToString).join(', ')})`;
    case 'closure': {
      const params = expr.params.map(p => `${p.name}: ${typeToString(p.type)}`).join(', ');
      return `|${params}| ${expressionToString(expr.body)}`;
    }
    default:
      return assertNever(expr, 'expression');
  }
}
