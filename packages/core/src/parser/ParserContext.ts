import type { BaseType } from '@bifgen/types';
import type { DiagnosticSink } from '../diagnostics/DiagnosticSink.js';
import type { Scanner } from './Scanner.js';

/**
 * Parser state threaded through every recursive-descent function.
 * One context exists per input file.
 */
export interface ParserContext {
  scanner: Scanner;
  diag: DiagnosticSink;
  /** Element kinds the type grammar accepts */
  enabledBases: ReadonlySet<BaseType>;
  /** Most restricted operands one prototype may carry */
  maxRestrictedOperands: number;
}
