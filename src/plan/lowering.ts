/**
 * Plan Lowering
 * ==============
 *
 * Translates a validated relational plan into a circuit, bottom-up: each
 * node's inputs are lowered first, then the node's own operators are
 * placed. Simple nodes (filter, project) map one-to-one; joins,
 * aggregates, windows, pivots and set operations expand into the indexes
 * and distinct stages incremental evaluation needs.
 *
 * Failures are contained per view:
 * - UnsupportedError: reported as "Not yet implemented: ...", view skipped
 * - other CompilerErrors: reported, view skipped
 * - InvariantViolationError: propagates and aborts the compilation unit
 *
 * @module
 */

import type { DiagnosticReporter } from '../common/diagnostics';
import {
  CompilationError,
  CompilerError,
  InvariantViolationError,
  ReportedError,
  UnsupportedError,
  assertNever,
  invariant,
  type SourceRange,
} from '../common/errors';
import { createLogger } from '../common/logger';
import { Circuit } from '../ir/circuit';
import { bigintLiteral, call, closure, literal, tuple, type Expression } from '../ir/expression';
import type { ColumnMetadata, WindowCall } from '../ir/operators';
import { fieldAt, rowType, scalar, typeToString, type RowType } from '../ir/types';
import { lowerAggregate, lowerPivot } from './aggregates';
import { correlate, equiJoin } from './joins';
import {
  ROW,
  column,
  type Program,
  type PlanNode,
  type SetOpNode,
  type SortNode,
  type TableDefinition,
  type ValuesNode,
  type ViewDefinition,
} from './plan-types';
import { StreamBuilder, type Stream } from './streams';
import { ROWS_TO_CURRENT, lowerWindow, toOrderKeys } from './windows';

const log = createLogger('lowering');

export interface LoweringOptions {
  /** Warn about tables no view reads */
  warnUnusedTables?: boolean;
}

export class PlanLowering {
  private readonly circuit = new Circuit();
  private readonly b: StreamBuilder;
  private readonly tables = new Map<string, Stream>();
  private readonly views = new Map<string, Stream>();
  private readonly usedTables = new Set<string>();

  constructor(private readonly reporter: DiagnosticReporter, private readonly options: LoweringOptions = {}) {
    this.b = new StreamBuilder(this.circuit, reporter);
  }

  lower(program: Program): Circuit {
    for (const table of program.tables) {
      this.declareTable(table);
    }
    for (const view of program.views) {
      this.lowerViewGuarded(view);
    }
    if (this.options.warnUnusedTables ?? true) {
      for (const table of program.tables) {
        if (!this.usedTables.has(table.name)) {
          this.reporter.report('warning', table.range, `Table '${table.name}' is not used`, 'UnusedTable');
        }
      }
    }
    log('lowered %d table(s), %d view(s) into %d operators', program.tables.length, this.views.size, this.circuit.size);
    return this.circuit;
  }

  // ============ DECLARATIONS ============

  private declareTable(table: TableDefinition): void {
    invariant(!this.tables.has(table.name), `Table '${table.name}' declared twice`, table.range);
    const columns: ColumnMetadata[] = table.columns.map(c => ({
      name: c.name,
      type: c.type,
      isPrimaryKey: c.primaryKey ?? false,
      lateness: c.lateness,
    }));
    this.tables.set(table.name, this.b.source(table.name, columns, table.range));
  }

  private lowerViewGuarded(view: ViewDefinition): void {
    try {
      this.lowerView(view);
    } catch (error) {
      if (error instanceof InvariantViolationError || error instanceof CompilationError) throw error;
      if (error instanceof ReportedError) {
        log('view %s skipped: %s', view.name, error.message);
        return;
      }
      if (error instanceof UnsupportedError) {
        this.reporter.report('error', error.range ?? view.range, error.message, 'UnsupportedConstruct');
        return;
      }
      if (error instanceof CompilerError) {
        this.reporter.report('error', error.range ?? view.range, error.message, 'Error');
        return;
      }
      throw error;
    }
  }

  private lowerView(view: ViewDefinition): void {
    if (this.views.has(view.name) || this.tables.has(view.name)) {
      throw new CompilerError(`Object '${view.name}' is already defined`, view.range);
    }
    let stream = this.lowerNode(view.query);
    if (view.columnNames) {
      invariant(
        view.columnNames.length === stream.type.fields.length,
        `View '${view.name}' names ${view.columnNames.length} column(s) but its query has ${stream.type.fields.length}`,
        view.range
      );
      const renamed = rowType(stream.type.fields.map((f, i) => ({ name: view.columnNames?.[i] ?? f.name, type: f.type })));
      stream = this.b.conform(stream, renamed, view.range);
    }
    for (const f of stream.type.fields) {
      if (f.type.kind === 'row') {
        throw new UnsupportedError('ROW', view.range);
      }
    }
    // later views read the changes, even of a materialized view
    this.views.set(view.name, stream);
    const output = view.materialized ? this.b.integrate(stream, view.range) : stream;
    this.b.sink(output, view.name, view.range);
    log('view %s: %s', view.name, typeToString(stream.type));
  }

  // ============ PLAN NODES ============

  private lowerNode(node: PlanNode): Stream {
    switch (node.kind) {
      case 'scan':
        return this.lowerScan(node.name, node.range);
      case 'values':
        return this.lowerValues(node);
      case 'filter':
        return this.b.filter(this.lowerNode(node.input), node.condition, node.range);
      case 'project': {
        const input = this.lowerNode(node.input);
        const names = node.expressions.map((e, i) => node.names?.[i] ?? defaultName(e, input.type, i));
        return this.b.mapWith(input, closure([{ name: ROW, type: input.type }], tuple(node.expressions, names)), node.range);
      }
      case 'join':
        return equiJoin(
          this.b,
          node.joinType,
          this.lowerNode(node.left),
          this.lowerNode(node.right),
          node.leftKeys,
          node.rightKeys,
          { condition: node.condition, range: node.range }
        );
      case 'correlate':
        return correlate(
          this.b,
          node.correlateType,
          this.lowerNode(node.left),
          this.lowerNode(node.right),
          node.leftKeys,
          node.rightKeys,
          node.range
        );
      case 'aggregate':
        return lowerAggregate(this.b, this.lowerNode(node.input), node);
      case 'window':
        return lowerWindow(this.b, this.lowerNode(node.input), node);
      case 'setop':
        return this.lowerSetOp(node);
      case 'distinct':
        return this.b.distinct(this.lowerNode(node.input), node.range);
      case 'pivot':
        return lowerPivot(this.b, this.lowerNode(node.input), node);
      case 'sort':
        return this.lowerSort(node);
      default:
        return assertNever(node, 'plan node');
    }
  }

  private lowerScan(name: string, range?: SourceRange): Stream {
    const table = this.tables.get(name);
    if (table) {
      this.usedTables.add(name);
      return table;
    }
    const view = this.views.get(name);
    if (view) return view;
    throw new CompilerError(`Object '${name}' not found`, range);
  }

  private lowerValues(node: ValuesNode): Stream {
    const rows = node.rows.map(values => {
      invariant(
        values.length === node.type.fields.length,
        `VALUES row has ${values.length} value(s), expected ${node.type.fields.length}`,
        node.range
      );
      values.forEach((v, i) => {
        const f = fieldAt(node.type, i, node.range);
        invariant(v !== null || f.type.nullable, `Null value for non-nullable column ${f.name}`, node.range);
      });
      return literal(node.type, values);
    });
    return this.b.constant(node.type, rows, node.range);
  }

  private lowerSetOp(node: SetOpNode): Stream {
    invariant(node.inputs.length >= 2, `${node.op} needs at least two inputs`, node.range);
    const inputs = node.inputs.map(i => this.lowerNode(i));
    // EXCEPT without ALL subtracts sets, not bags
    const operands = node.op === 'except' && !node.all
      ? inputs.map(s => this.b.distinct(s, node.range))
      : inputs;
    const combined = operands.slice(1).reduce((acc, s) => this.b.setop(node.op, acc, s, node.range), operands[0]);
    return node.all ? combined : this.b.distinct(combined, node.range);
  }

  private lowerSort(node: SortNode): Stream {
    const input = this.lowerNode(node.input);
    const width = input.type.fields.length;
    const keys = node.keys.map(k => {
      if (!k.ordinal) {
        fieldAt(input.type, k.column, node.range);
        return k;
      }
      if (!Number.isInteger(k.column) || k.column < 1 || k.column > width) {
        throw new CompilerError(`ORDER BY ordinal ${k.column} is out of range: the query has ${width} column(s)`, node.range);
      }
      return { column: k.column - 1, ascending: k.ascending };
    });
    if (node.limit === undefined) {
      log('ORDER BY without LIMIT leaves the view contents unchanged');
      return input;
    }
    invariant(Number.isInteger(node.limit) && node.limit >= 0, `Invalid LIMIT ${node.limit}`, node.range);

    // top-k: number the rows of one global partition, keep the first `limit`
    const everything = this.b.indexColumns(input, [], node.range);
    const rowNumber: WindowCall = { fn: 'row_number', frame: ROWS_TO_CURRENT, type: scalar('BIGINT') };
    const numbered = this.b.deindex(
      this.b.window(everything, toOrderKeys(keys), [rowNumber], ['rn'], node.range),
      node.range
    );
    const condition = call('<=', [column(numbered.type, width), bigintLiteral(node.limit)], this.reporter, node.range);
    const limited = this.b.filter(numbered, condition, node.range);
    return this.b.select(limited, input.type.fields.map((_, i) => i), node.range);
  }
}

function defaultName(expr: Expression, input: RowType, index: number): string {
  if (expr.kind === 'field' && expr.target.kind === 'var' && expr.target.name === ROW) {
    return fieldAt(input, expr.index).name;
  }
  return `EXPR$${index}`;
}

/** Lowers a whole program into a circuit */
export function lowerProgram(program: Program, reporter: DiagnosticReporter, options: LoweringOptions = {}): Circuit {
  return new PlanLowering(reporter, options).lower(program);
}
