/**
 * DiagnosticSink - Turns parser complaints into positioned ParseErrors
 *
 * One sink is bound to each input file for the duration of its parse, so
 * parser functions never need to know which file they are reading.
 *
 * Usage:
 *   const diag = new DiagnosticSink('builtin', 'builtins.def', logger);
 *   throw diag.error(scanner, 'missing semicolon');
 */

import { ParseError, type InputKind } from '../errors/GeneratorError.js';
import type { Logger } from '../logging/Logger.js';
import type { Scanner } from '../parser/Scanner.js';

export class DiagnosticSink {
  constructor(
    readonly input: InputKind,
    readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Build a ParseError positioned on the scanner's current line.
   *
   * @param column - 1-based column; defaults to the cursor
   */
  error(scanner: Scanner, message: string, column: number = scanner.column): ParseError {
    const error = new ParseError(this.input, message, this.filePath, scanner.line, column);
    this.logger.debug('Parse failure', { file: this.filePath, line: scanner.line, column });
    return error;
  }

  /** Per-entry tracing, visible at debug level */
  trace(scanner: Scanner, message: string, context?: Record<string, unknown>): void {
    this.logger.trace(`${this.filePath}:${scanner.line}: ${message}`, context);
  }
}
