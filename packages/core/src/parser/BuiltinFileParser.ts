/**
 * Builtin file parser.
 *
 * File layout:
 *
 *   [altivec]
 *     const vsc __builtin_altivec_abs_v16qi (vsc);
 *       ABS_V16QI absv16qi2 {}
 *
 * A stanza header names a gating token; each entry that follows takes two
 * lines: an optional purity keyword plus prototype, then
 * `<id> <pattern> { <attr>, ... }`.
 */

import {
  isAttributeName,
  isGatingToken,
  type AttributeName,
  type AttributeSet,
  type BuiltinEntry,
  type GatingStanza,
} from '@bifgen/types';
import { mangle } from '../mangle/mangle.js';
import type { SymbolRegistry } from '../registry/SymbolRegistry.js';
import type { ParserContext } from './ParserContext.js';
import { parsePrototype } from './PrototypeParser.js';
import { FUNCTION_KIND_KEYWORDS, GATING_STANZAS } from './vocabulary.js';

export interface BuiltinParseResult {
  /** Entries in file order */
  entries: BuiltinEntry[];
  stanzaCount: number;
}

/**
 * Parse a whole builtin file, registering builtin ids and
 * type-descriptor ids as they are met.
 */
export function parseBuiltinFile(
  ctx: ParserContext,
  registries: { builtinIds: SymbolRegistry; typeDescIds: SymbolRegistry },
): BuiltinParseResult {
  const { scanner, diag } = ctx;
  const entries: BuiltinEntry[] = [];
  let stanza: GatingStanza | null = null;
  let stanzaCount = 0;

  while (scanner.advanceLine()) {
    if (scanner.peek() === '[') {
      stanza = parseGatingHeader(ctx);
      stanzaCount++;
      diag.trace(scanner, `stanza [${stanza.token}]`);
      continue;
    }
    if (stanza === null) {
      throw diag.error(scanner, 'ill-formed stanza header');
    }
    const entry = parseBuiltinEntry(ctx, stanza, registries);
    diag.trace(scanner, `builtin ${entry.id}`, { pattern: entry.patternName, fntype: entry.typeDescId });
    entries.push(entry);
  }

  return { entries, stanzaCount };
}

/**
 * `[ <gating-token> ]` with the cursor on the bracket.
 */
export function parseGatingHeader(ctx: ParserContext): GatingStanza {
  const { scanner, diag } = ctx;
  scanner.advance();
  scanner.consumeWhitespace();

  const start = scanner.pos;
  const token = scanner.matchGatingToken();
  if (token === null) {
    throw diag.error(scanner, 'no expression found in stanza header');
  }
  if (!isGatingToken(token)) {
    throw diag.error(scanner, `unrecognized stanza '${token}'`, start + 1);
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

  return GATING_STANZAS[token];
}

function parseBuiltinEntry(
  ctx: ParserContext,
  stanza: GatingStanza,
  registries: { builtinIds: SymbolRegistry; typeDescIds: SymbolRegistry },
): BuiltinEntry {
  const { scanner, diag } = ctx;
  const line = scanner.line;

  // Line 1: [const|pure|fpmath] <prototype>
  const kindStart = scanner.pos;
  const first = scanner.matchIdentifier();
  if (first === null) {
    throw diag.error(scanner, 'malformed entry');
  }
  let kind = FUNCTION_KIND_KEYWORDS.get(first);
  if (kind === undefined) {
    kind = 'none';
    scanner.reset(kindStart);
  }

  const proto = parsePrototype(ctx);
  const typeDescId = mangle(proto.returnType, proto.args);
  registries.typeDescIds.insert(typeDescId);

  // Line 2: <id> <pattern> { <attrs> }
  if (!scanner.advanceLine()) {
    throw diag.error(scanner, 'unexpected end of file');
  }

  const idStart = scanner.pos;
  const id = scanner.matchIdentifier();
  if (id === null) {
    throw diag.error(scanner, 'missing builtin id');
  }
  if (!registries.builtinIds.insert(id)) {
    throw diag.error(scanner, `duplicate function ID '${id}'`, idStart + 1);
  }

  scanner.consumeWhitespace();
  const patternName = scanner.matchIdentifier();
  if (patternName === null) {
    throw diag.error(scanner, 'missing pattern name');
  }

  const attrs = parseAttributes(ctx);

  scanner.consumeWhitespace();
  if (!scanner.atEndOfLine()) {
    throw diag.error(scanner, 'garbage at end of line');
  }

  return { stanza, kind, proto, id, patternName, attrs, typeDescId, line };
}

/**
 * `{ attr, attr, ... }`, possibly empty.
 */
export function parseAttributes(ctx: ParserContext): AttributeSet {
  const { scanner, diag } = ctx;
  const attrs = new Set<AttributeName>();

  scanner.consumeWhitespace();
  if (scanner.peek() !== '{') {
    throw diag.error(scanner, 'missing attribute set');
  }
  scanner.advance();

  scanner.consumeWhitespace();
  if (scanner.peek() === '}') {
    scanner.advance();
    return attrs;
  }

  for (;;) {
    scanner.consumeWhitespace();
    const start = scanner.pos;
    const name = scanner.matchIdentifier();
    if (name === null) {
      throw diag.error(scanner, attrs.size === 0 ? 'badly terminated attr set' : "missing attribute after ','");
    }
    if (!isAttributeName(name)) {
      throw diag.error(scanner, `unknown attribute '${name}'`, start + 1);
    }
    attrs.add(name);

    scanner.consumeWhitespace();
    if (scanner.peek() === '}') {
      scanner.advance();
      return attrs;
    }
    if (scanner.peek() !== ',') {
      throw diag.error(scanner, "attribute not followed by ',' or '}'");
    }
    scanner.advance();
  }
}
