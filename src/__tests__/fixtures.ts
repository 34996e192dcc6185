/**
 * Shared test fixtures: table builders, plan shorthands and helpers that
 * compile and run programs.
 */

import { compile } from '../compiler';
import type { CompilerOptions } from '../common/options';
import type { Circuit } from '../ir/circuit';
import type { Row } from '../ir/expression';
import { rowType, scalar, type RowType, type Type } from '../ir/types';
import { CircuitExecutor } from '../internals/executor';
import { ZSet, type Weight } from '../internals/zset';
import type { PlanNode, Program, ScanNode, TableDefinition, ViewDefinition } from '../plan/plan-types';

export const INT = scalar('INTEGER');
export const INT_NULL = scalar('INTEGER', true);
export const BIGINT = scalar('BIGINT');
export const STR = scalar('VARCHAR');
export const BOOL = scalar('BOOLEAN');

export function table(name: string, columns: Array<[string, Type]>, primaryKey: string[] = []): TableDefinition {
  return {
    name,
    columns: columns.map(([columnName, type]) => ({ name: columnName, type, primaryKey: primaryKey.includes(columnName) })),
  };
}

export function rowOf(t: TableDefinition): RowType {
  return rowType(t.columns.map(c => ({ name: c.name, type: c.type })));
}

export const scan = (name: string): ScanNode => ({ kind: 'scan', name });

export function view(name: string, query: PlanNode, extra: Partial<ViewDefinition> = {}): ViewDefinition {
  return { name, query, ...extra };
}

/** Compiles and fails the test with the diagnostics if no circuit came out */
export function compileOrThrow(program: Program, options: Partial<CompilerOptions> = {}): Circuit {
  const { circuit, messages } = compile(program, options);
  if (!circuit) {
    throw new Error(`Compilation failed:\n${messages.toString()}`);
  }
  return circuit;
}

/** Z-set from `[row, weight]` pairs */
export function zset(...entries: Array<[Row, Weight]>): ZSet<Row> {
  return ZSet.fromEntries(entries);
}

/** Inserts, each with weight 1 */
export function inserts(...rows: Row[]): ZSet<Row> {
  return ZSet.fromValues(rows);
}

export function deletes(...rows: Row[]): ZSet<Row> {
  return ZSet.fromValues(rows).negate();
}

/** Entries in value order, for exact assertions */
export function entries(z: ZSet<Row>): Array<[Row, Weight]> {
  return z.sortedEntries();
}

/** Runs `steps` through a fresh executor and returns each view's final contents */
export function runSteps(
  circuit: Circuit,
  steps: ReadonlyArray<Readonly<Record<string, ZSet<Row>>>>
): Record<string, ZSet<Row>> {
  const executor = new CircuitExecutor(circuit);
  for (const step of steps) {
    executor.step(step);
  }
  return Object.fromEntries(circuit.views().map(name => [name, executor.view(name)]));
}

/** Sums each table's changes over all steps */
export function mergeSteps(steps: ReadonlyArray<Readonly<Record<string, ZSet<Row>>>>): Record<string, ZSet<Row>> {
  const merged: Record<string, ZSet<Row>> = {};
  for (const step of steps) {
    for (const [name, delta] of Object.entries(step)) {
      merged[name] = (merged[name] ?? ZSet.zero()).add(delta);
    }
  }
  return merged;
}
