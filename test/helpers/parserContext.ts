/**
 * Builds parser contexts over inline source text.
 */

import {
  BASE_TYPES,
  ConsoleLogger,
  DiagnosticSink,
  Scanner,
  type BaseType,
  type InputKind,
  type ParserContext,
} from '@bifgen/core';

export const TEST_FILE = 'test.def';

export interface ContextOptions {
  input?: InputKind;
  enabledBases?: readonly BaseType[];
  maxRestrictedOperands?: number;
}

export function contextFor(source: string, options: ContextOptions = {}): ParserContext {
  return {
    scanner: new Scanner(source, TEST_FILE),
    diag: new DiagnosticSink(options.input ?? 'builtin', TEST_FILE, new ConsoleLogger('silent')),
    enabledBases: new Set(options.enabledBases ?? BASE_TYPES),
    maxRestrictedOperands: options.maxRestrictedOperands ?? 2,
  };
}

/**
 * Context positioned on the first content of a single line.
 */
export function lineContext(line: string, options: ContextOptions = {}): ParserContext {
  const ctx = contextFor(line, options);
  ctx.scanner.advanceLine();
  return ctx;
}
