/**
 * Overload file parser.
 *
 * File layout:
 *
 *   [VEC_ABS, vec_abs, __builtin_vec_abs]
 *     vsc __builtin_vec_abs (vsc);
 *       ABS_V16QI
 *
 * Every entry names a builtin id already registered by the builtin file.
 */

import type { OverloadEntry, OverloadStanza } from '@bifgen/types';
import { InternalError } from '../errors/GeneratorError.js';
import { mangle } from '../mangle/mangle.js';
import type { GeneratorRegistries } from '../registry/registries.js';
import type { ParserContext } from './ParserContext.js';
import { parsePrototype } from './PrototypeParser.js';

export interface OverloadParseResult {
  /** Stanzas in file order */
  stanzas: OverloadStanza[];
  /** Entries in file order */
  entries: OverloadEntry[];
}

/**
 * Parse a whole overload file. The builtin id registry must already be
 * closed.
 */
export function parseOverloadFile(ctx: ParserContext, registries: GeneratorRegistries): OverloadParseResult {
  const { scanner, diag } = ctx;
  if (!registries.builtinIds.isClosed) {
    throw new InternalError('overload file parsed before the builtin id registry was closed');
  }

  const stanzas: OverloadStanza[] = [];
  const entries: OverloadEntry[] = [];
  let stanza: OverloadStanza | null = null;

  while (scanner.advanceLine()) {
    if (scanner.peek() === '[') {
      stanza = parseOverloadHeader(ctx);
      stanzas.push(stanza);
      diag.trace(scanner, `stanza [${stanza.groupId}]`, { extern: stanza.externName, intern: stanza.internName });
      continue;
    }
    if (stanza === null) {
      throw diag.error(scanner, 'ill-formed stanza header');
    }
    const entry = parseOverloadEntry(ctx, stanza, registries);
    diag.trace(scanner, `overload ${entry.refId}`, { fntype: entry.typeDescId });
    entries.push(entry);
  }

  return { stanzas, entries };
}

/**
 * `[ <group-id>, <extern-name>, <intern-name> ]` with the cursor on the bracket.
 */
export function parseOverloadHeader(ctx: ParserContext): OverloadStanza {
  const { scanner, diag } = ctx;
  scanner.advance();
  scanner.consumeWhitespace();

  const groupId = scanner.matchIdentifier();
  if (groupId === null) {
    throw diag.error(scanner, 'no identifier found in stanza header');
  }
  expectComma(ctx);

  const externName = scanner.matchIdentifier();
  if (externName === null) {
    throw diag.error(scanner, 'missing external name');
  }
  expectComma(ctx);

  const internName = scanner.matchIdentifier();
  if (internName === null) {
    throw diag.error(scanner, 'missing internal name');
  }

  scanner.consumeWhitespace();
  if (scanner.peek() !== ']') {
    throw diag.error(scanner, 'ill-formed stanza header');
  }
  scanner.advance();

  scanner.consumeWhitespace();
  if (!scanner.atEndOfLine()) {
    throw diag.error(scanner, 'garbage after stanza header');
  }

  return { groupId, externName, internName };
}

function expectComma(ctx: ParserContext): void {
  const { scanner, diag } = ctx;
  scanner.consumeWhitespace();
  if (scanner.peek() !== ',') {
    throw diag.error(scanner, 'missing comma');
  }
  scanner.advance();
  scanner.consumeWhitespace();
}

function parseOverloadEntry(
  ctx: ParserContext,
  stanza: OverloadStanza,
  registries: GeneratorRegistries,
): OverloadEntry {
  const { scanner, diag } = ctx;
  const line = scanner.line;

  const proto = parsePrototype(ctx);
  const typeDescId = mangle(proto.returnType, proto.args);
  registries.typeDescIds.insert(typeDescId);

  if (!scanner.advanceLine()) {
    throw diag.error(scanner, 'unexpected end of file');
  }

  const idStart = scanner.pos;
  const refId = scanner.matchIdentifier();
  if (refId === null) {
    throw diag.error(scanner, 'missing overload id');
  }
  if (!registries.builtinIds.has(refId)) {
    throw diag.error(scanner, `builtin ID '${refId}' not found in builtin file`, idStart + 1);
  }
  if (!registries.overloadIds.insert(refId)) {
    throw diag.error(scanner, `duplicate overload ID '${refId}'`, idStart + 1);
  }

  scanner.consumeWhitespace();
  if (!scanner.atEndOfLine()) {
    throw diag.error(scanner, 'garbage at end of line');
  }

  return { stanza, proto, refId, typeDescId, line };
}
