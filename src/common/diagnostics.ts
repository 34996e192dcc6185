/**
 * Diagnostics
 * ============
 *
 * The reporter every compilation step receives explicitly. Messages are
 * accumulated, so one run reports every independent problem it finds.
 *
 * @module
 */

import { CompilationError, formatRange, type SourceRange } from './errors';
import { createLogger } from './logger';

const log = createLogger('diagnostics');

export type Severity = 'error' | 'warning';

/** Error taxonomy used to classify reported messages */
export type DiagnosticCode =
  | 'TypeMismatch'
  | 'UnsupportedConstruct'
  | 'InvariantViolation'
  | 'UnusedTable'
  | 'Error';

export interface Diagnostic {
  severity: Severity;
  range?: SourceRange;
  message: string;
  code: DiagnosticCode;
}

/**
 * Receives errors and warnings. Implementations must not terminate the
 * host process.
 */
export interface DiagnosticReporter {
  report(severity: Severity, range: SourceRange | undefined, message: string, code?: DiagnosticCode): void;
}

/**
 * Default reporter: an append-only message log.
 */
export class CompilerMessages implements DiagnosticReporter {
  readonly messages: Diagnostic[] = [];

  /** When set, the first error is thrown as a CompilationError */
  constructor(private readonly throwOnError = false) {}

  report(severity: Severity, range: SourceRange | undefined, message: string, code: DiagnosticCode = 'Error'): void {
    this.messages.push({ severity, range, message, code });
    log('%s: %s', severity, message);
    if (severity === 'error' && this.throwOnError) {
      throw new CompilationError(message, range);
    }
  }

  get errorCount(): number {
    return this.messages.filter(m => m.severity === 'error').length;
  }

  get warningCount(): number {
    return this.messages.filter(m => m.severity === 'warning').length;
  }

  hasErrors(): boolean {
    return this.errorCount > 0;
  }

  /** Process exit code a command-line wrapper should use */
  get exitCode(): number {
    return this.hasErrors() ? 1 : 0;
  }

  getErrors(): Diagnostic[] {
    return this.messages.filter(m => m.severity === 'error');
  }

  toString(): string {
    return this.messages
      .map(m => {
        const where = formatRange(m.range);
        return where ? `${where}: ${m.severity}: ${m.message}` : `${m.severity}: ${m.message}`;
      })
      .join('\n');
  }
}
