/**
 * Type System
 * ============
 *
 * Scalar and row types with nullability. Nullability belongs to the type:
 * a value of a non-nullable type is never absent.
 *
 * Types are plain immutable objects compared structurally, so they can be
 * used as memoization keys (`typeKey`) and in output-schema equality checks.
 *
 * @module
 */

import type { DiagnosticReporter } from '../common/diagnostics';
import { InvariantViolationError, assertNever, invariant, type SourceRange } from '../common/errors';

// ============ TYPE VARIANTS ============

export type ScalarKind =
  | 'TINYINT'
  | 'SMALLINT'
  | 'INTEGER'
  | 'BIGINT'
  | 'DECIMAL'
  | 'REAL'
  | 'DOUBLE'
  | 'VARCHAR'
  | 'VARBINARY'
  | 'BOOLEAN'
  | 'DATE'
  | 'TIME'
  | 'TIMESTAMP';

export interface ScalarType {
  readonly kind: 'scalar';
  readonly scalar: ScalarKind;
  readonly nullable: boolean;
}

export interface RowField {
  readonly name: string;
  readonly type: Type;
}

/** Ordered sequence of named fields; order matters for positional access */
export interface RowType {
  readonly kind: 'row';
  readonly fields: readonly RowField[];
  readonly nullable: boolean;
}

/**
 * Poison type substituted after a type mismatch has been reported.
 * Anything combined with it stays ERROR without another diagnostic.
 */
export interface ErrorType {
  readonly kind: 'error';
  readonly nullable: true;
}

export type Type = ScalarType | RowType | ErrorType;

export const ERROR_TYPE: ErrorType = { kind: 'error', nullable: true };

// ============ CONSTRUCTORS ============

export function scalar(kind: ScalarKind, nullable = false): ScalarType {
  return { kind: 'scalar', scalar: kind, nullable };
}

export function rowType(fields: readonly RowField[], nullable = false): RowType {
  return { kind: 'row', fields, nullable };
}

/** Row type with fields named `f0`, `f1`, ... */
export function tupleType(types: readonly Type[], nullable = false): RowType {
  return rowType(types.map((type, i) => ({ name: `f${i}`, type })), nullable);
}

export function withNullability<T extends Type>(type: T, nullable: boolean): T;
export function withNullability(type: Type, nullable: boolean): Type {
  switch (type.kind) {
    case 'scalar':
      return type.nullable === nullable ? type : { ...type, nullable };
    case 'row':
      return type.nullable === nullable ? type : { ...type, nullable };
    case 'error':
      return type;
    default:
      return assertNever(type, 'type');
  }
}

export function nullable<T extends Type>(type: T): T {
  return withNullability(type, true);
}

/** Make every field of a row nullable (the padded side of an outer join) */
export function nullableFields(type: RowType): RowType {
  return rowType(type.fields.map(f => ({ name: f.name, type: nullable(f.type) })), type.nullable);
}

// ============ CLASSIFICATION ============

const NUMERIC_RANK: Partial<Record<ScalarKind, number>> = {
  TINYINT: 0,
  SMALLINT: 1,
  INTEGER: 2,
  BIGINT: 3,
  DECIMAL: 4,
  REAL: 5,
  DOUBLE: 6,
};

const BIGINT_RANK = 3;

export type TypeFamily = 'numeric' | 'string' | 'binary' | 'boolean' | 'date' | 'time' | 'timestamp';

export function scalarFamily(kind: ScalarKind): TypeFamily {
  if (NUMERIC_RANK[kind] !== undefined) return 'numeric';
  switch (kind) {
    case 'VARCHAR':
      return 'string';
    case 'VARBINARY':
      return 'binary';
    case 'BOOLEAN':
      return 'boolean';
    case 'DATE':
      return 'date';
    case 'TIME':
      return 'time';
    case 'TIMESTAMP':
      return 'timestamp';
    default:
      throw new InvariantViolationError(`No family for ${kind}`);
  }
}

export function isNumeric(type: Type): boolean {
  return type.kind === 'scalar' && scalarFamily(type.scalar) === 'numeric';
}

export function isIntegral(type: Type): boolean {
  if (type.kind !== 'scalar') return false;
  const rank = NUMERIC_RANK[type.scalar];
  return rank !== undefined && rank <= BIGINT_RANK;
}

export function isBoolean(type: Type): boolean {
  return type.kind === 'scalar' && type.scalar === 'BOOLEAN';
}

export function isString(type: Type): boolean {
  return type.kind === 'scalar' && type.scalar === 'VARCHAR';
}

// ============ COMPATIBILITY ============

/**
 * Two types are compatible when a common type exists:
 * same scalar family, or rows of equal arity with compatible fields.
 */
export function isCompatible(a: Type, b: Type): boolean {
  if (a.kind === 'error' || b.kind === 'error') return true;
  if (a.kind === 'scalar' && b.kind === 'scalar') {
    return scalarFamily(a.scalar) === scalarFamily(b.scalar);
  }
  if (a.kind === 'row' && b.kind === 'row') {
    return a.fields.length === b.fields.length &&
      a.fields.every((f, i) => isCompatible(f.type, b.fields[i].type));
  }
  return false;
}

/**
 * Least upper bound of two types. Incompatible kinds report a TypeMismatch
 * and yield ERROR_TYPE.
 */
export function commonType(a: Type, b: Type, reporter: DiagnosticReporter, range?: SourceRange): Type {
  if (a.kind === 'error' || b.kind === 'error') return ERROR_TYPE;
  if (!isCompatible(a, b)) {
    reporter.report(
      'error',
      range,
      `Type mismatch: no common type for ${typeToString(a)} and ${typeToString(b)}`,
      'TypeMismatch'
    );
    return ERROR_TYPE;
  }
  const isNullable = a.nullable || b.nullable;

  if (a.kind === 'scalar' && b.kind === 'scalar') {
    const rankA = NUMERIC_RANK[a.scalar];
    const rankB = NUMERIC_RANK[b.scalar];
    const kind = rankA !== undefined && rankB !== undefined && rankB > rankA ? b.scalar : a.scalar;
    return scalar(kind, isNullable);
  }
  if (a.kind === 'row' && b.kind === 'row') {
    return rowType(
      a.fields.map((f, i) => ({ name: f.name, type: commonType(f.type, b.fields[i].type, reporter, range) })),
      isNullable
    );
  }
  throw new InvariantViolationError('Compatible types of different kinds');
}

// ============ STRUCTURAL IDENTITY ============

export function typeToString(type: Type): string {
  switch (type.kind) {
    case 'scalar':
      return type.nullable ? `${type.scalar}?` : type.scalar;
    case 'row': {
      const fields = type.fields.map(f => `${f.name} ${typeToString(f.type)}`).join(', ');
      return `ROW(${fields})${type.nullable ? '?' : ''}`;
    }
    case 'error':
      return 'ERROR';
    default:
      return assertNever(type, 'type');
  }
}

/** Structural hash key: equal keys ⇔ equal types */
export function typeKey(type: Type): string {
  return typeToString(type);
}

export function typeEquals(a: Type, b: Type): boolean {
  return typeKey(a) === typeKey(b);
}

// ============ ROW ACCESS ============

export function fieldAt(row: RowType, index: number, range?: SourceRange): RowField {
  invariant(
    Number.isInteger(index) && index >= 0 && index < row.fields.length,
    `Field index ${index} out of range for ${typeToString(row)}`,
    range
  );
  return row.fields[index];
}

export function asRowType(type: Type, range?: SourceRange): RowType {
  invariant(type.kind === 'row', `Expected a row type, got ${typeToString(type)}`, range);
  return type;
}

/** Concatenate the fields of two rows */
export function concatRows(left: RowType, right: RowType): RowType {
  return rowType([...left.fields, ...right.fields]);
}

/** Row type with only the selected fields, in the given order */
export function projectRow(row: RowType, indexes: readonly number[]): RowType {
  return rowType(indexes.map(i => fieldAt(row, i)));
}
