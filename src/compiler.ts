/**
 * Circuit Compiler
 * =================
 *
 * Compiles a validated program into an incremental circuit:
 *
 *   Program → lowering → rewrite pipeline → Circuit
 *
 * ```ts
 * const { circuit, messages } = compile(program);
 * if (!circuit) console.error(messages.toString());
 * ```
 *
 * A compilation that reports any error returns no circuit. Warnings never
 * block emission.
 *
 * @module
 */

import { CompilerMessages } from './common/diagnostics';
import { InvariantViolationError } from './common/errors';
import { createLogger } from './common/logger';
import { resolveOptions, type CompilerOptions } from './common/options';
import type { Circuit } from './ir/circuit';
import { typeToString, withNullability, type Type } from './ir/types';
import { optimize } from './passes/pipeline';
import { lowerProgram } from './plan/lowering';
import type { Program } from './plan/plan-types';

const log = createLogger('compiler');

// ============ SCHEMA ============

export interface SchemaField {
  name: string;
  type: string;
  nullable: boolean;
}

export interface InputRelation {
  name: string;
  fields: SchemaField[];
  primaryKey: string[];
  /** Columns that carry a lateness bound */
  lateness: string[];
}

export interface OutputRelation {
  name: string;
  fields: SchemaField[];
}

export interface ProgramSchema {
  inputs: InputRelation[];
  outputs: OutputRelation[];
}

function schemaField(name: string, type: Type): SchemaField {
  return { name, type: typeToString(withNullability(type, false)), nullable: type.nullable };
}

/** Describes the tables a circuit reads and the views it produces */
export function programSchema(circuit: Circuit): ProgramSchema {
  const inputs = circuit.sources().map(source => ({
    name: source.name,
    fields: source.columns.map(c => schemaField(c.name, c.type)),
    primaryKey: source.columns.filter(c => c.isPrimaryKey).map(c => c.name),
    lateness: source.columns.filter(c => c.lateness !== undefined).map(c => c.name),
  }));
  const outputs = circuit.sinks().map(sink => {
    const element = sink.outputType.kind === 'zset' ? sink.outputType.element.fields : [];
    return {
      name: sink.viewName,
      fields: element.map(f => schemaField(f.name, f.type)),
    };
  });
  return { inputs, outputs };
}

// ============ COMPILER ============

export interface CompileResult {
  /** Absent when any error was reported */
  circuit?: Circuit;
  schema?: ProgramSchema;
  messages: CompilerMessages;
}

export class CircuitCompiler {
  readonly options: CompilerOptions;

  constructor(options: Partial<CompilerOptions> = {}) {
    this.options = resolveOptions(options);
  }

  compile(program: Program): CompileResult {
    const messages = new CompilerMessages(this.options.throwOnError);
    let circuit: Circuit;
    try {
      circuit = lowerProgram(program, messages, { warnUnusedTables: this.options.warnUnusedTables });
      if (messages.hasErrors()) {
        log('lowering reported %d error(s)', messages.errorCount);
        return { messages };
      }
      if (this.options.optimize) {
        circuit = optimize(circuit, this.options.passes);
      }
    } catch (error) {
      if (!(error instanceof InvariantViolationError)) throw error;
      messages.report('error', error.range, error.message, 'InvariantViolation');
      return { messages };
    }
    log('compiled %d view(s) into %d operators', circuit.views().length, circuit.size);
    return { circuit, schema: programSchema(circuit), messages };
  }
}

/** Compiles with the given options; see CircuitCompiler */
export function compile(program: Program, options: Partial<CompilerOptions> = {}): CompileResult {
  return new CircuitCompiler(options).compile(program);
}
