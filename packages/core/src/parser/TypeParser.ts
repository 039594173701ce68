/**
 * Type descriptor parser.
 *
 * A legal type is of the form
 *
 *   [const] [[signed|unsigned] <basetype> | <vector-shorthand>] [*]
 *
 * where `const` applies only to `int` (optionally signed or unsigned) and
 * may carry a restriction suffix, plus the special case `const char *`.
 * `void` is legal only where the caller allows it, or as `void *`.
 */

import { emptyTypeDescriptor, type Restriction, type TypeDescriptor } from '@bifgen/types';
import type { ParserContext } from './ParserContext.js';
import type { Scanner } from './Scanner.js';
import { BASE_TYPE_KEYWORDS, INTEGRAL_BASES, VECTOR_SHORTHANDS } from './vocabulary.js';

/** Restriction bounds are emitted as C `int` literals */
const INT_MIN = -0x80000000;
const INT_MAX = 0x7fffffff;

const RESTRICTION_CLOSERS: ReadonlyMap<string, string> = new Map([
  ['<', '>'],
  ['[', ']'],
  ['{', '}'],
]);

/**
 * Match one type at the cursor.
 *
 * @param voidAllowed - true in return position
 * @returns null when no identifier starts at the cursor (the cursor is
 *   left where it was); throws ParseError for a malformed type
 */
export function matchType(ctx: ParserContext, voidAllowed: boolean): TypeDescriptor | null {
  const { scanner, diag } = ctx;
  scanner.consumeWhitespace();
  const start = scanner.pos;
  const token = scanner.matchIdentifier();
  if (token === null) {
    return null;
  }

  const type = emptyTypeDescriptor();

  if (token === 'void') {
    type.isVoid = true;
    if (matchPointer(scanner)) {
      type.isPointer = true;
    } else if (!voidAllowed) {
      throw diag.error(scanner, "'void' is not allowed here", start + 1);
    }
    return type;
  }

  if (token === 'const') {
    type.isConst = true;
    return matchConstType(ctx, type);
  }

  const shorthand = VECTOR_SHORTHANDS.get(token);
  if (shorthand !== undefined) {
    if (shorthand.opaque) {
      type.isOpaque = true;
    } else {
      if (!ctx.enabledBases.has(shorthand.base)) {
        throw diag.error(scanner, 'unrecognized base type', start + 1);
      }
      type.isVector = true;
      type.isSigned = shorthand.signed ?? false;
      type.isUnsigned = shorthand.unsigned ?? false;
      type.isBool = shorthand.bool ?? false;
      type.isPixel = shorthand.pixel ?? false;
    }
    type.base = shorthand.base;
    type.isPointer = matchPointer(scanner);
    return type;
  }

  if (token === 'signed' || token === 'unsigned') {
    type.isSigned = token === 'signed';
    type.isUnsigned = token === 'unsigned';
    scanner.consumeWhitespace();
    const baseStart = scanner.pos;
    matchBaseType(ctx, type);
    if (!INTEGRAL_BASES.has(type.base)) {
      throw diag.error(scanner, `'${token}' applies only to integral types`, baseStart + 1);
    }
    type.isPointer = matchPointer(scanner);
    return type;
  }

  // Plain scalar: push the token back
  scanner.reset(start);
  matchBaseType(ctx, type);
  type.isPointer = matchPointer(scanner);
  return type;
}

/**
 * Match one scalar keyword into `type.base`. `long` must be followed by a
 * second `long`.
 */
export function matchBaseType(ctx: ParserContext, type: TypeDescriptor): void {
  const { scanner, diag } = ctx;
  scanner.consumeWhitespace();
  const start = scanner.pos;
  const token = scanner.matchIdentifier();
  if (token === null) {
    throw diag.error(scanner, 'missing base type');
  }

  if (token === 'long') {
    scanner.consumeWhitespace();
    if (scanner.matchIdentifier() !== 'long') {
      throw diag.error(scanner, "incomplete 'long long'", start + 1);
    }
    type.base = 'longlong';
  } else {
    const base = BASE_TYPE_KEYWORDS.get(token);
    if (base === undefined) {
      throw diag.error(scanner, 'unrecognized base type', start + 1);
    }
    type.base = base;
  }

  if (!ctx.enabledBases.has(type.base)) {
    throw diag.error(scanner, 'unrecognized base type', start + 1);
  }
}

/**
 * Parse what follows `const`: `[signed|unsigned] int [restriction]`,
 * or `char *`.
 */
function matchConstType(ctx: ParserContext, type: TypeDescriptor): TypeDescriptor {
  const { scanner, diag } = ctx;
  scanner.consumeWhitespace();
  const start = scanner.pos;
  const token = scanner.matchIdentifier();

  if (token === 'char') {
    type.base = 'char';
    if (!matchPointer(scanner)) {
      throw diag.error(scanner, "'const char' must be a pointer");
    }
    type.isPointer = true;
    return type;
  }

  if (token === 'signed' || token === 'unsigned') {
    type.isSigned = token === 'signed';
    type.isUnsigned = token === 'unsigned';
    scanner.consumeWhitespace();
    const intStart = scanner.pos;
    if (scanner.matchIdentifier() !== 'int') {
      throw diag.error(scanner, `'${token}' not followed by 'int'`, intStart + 1);
    }
  } else if (token !== 'int') {
    throw diag.error(scanner, "'const' not followed by 'int'", start + 1);
  }

  type.base = 'int';
  scanner.consumeWhitespace();
  if (RESTRICTION_CLOSERS.has(scanner.peek())) {
    type.restriction = matchConstRestriction(ctx);
  }
  return type;
}

/**
 * Parse a restriction suffix with the cursor on its opening delimiter:
 *
 *   <N>    Bits(N)
 *   <X,Y>  Range(X,Y)
 *   [X,Y]  VarRange(X,Y)
 *   {X,Y}  Values(X,Y)
 */
export function matchConstRestriction(ctx: ParserContext): Restriction {
  const { scanner, diag } = ctx;
  const open = scanner.peek();
  const close = RESTRICTION_CLOSERS.get(open);
  if (close === undefined) {
    throw diag.error(scanner, 'malformed restriction');
  }
  scanner.advance();

  const x = requireInteger(ctx);
  scanner.consumeWhitespace();

  if (open === '<' && scanner.peek() === '>') {
    scanner.advance();
    return { kind: 'bits', bits: x };
  }
  if (scanner.peek() !== ',') {
    throw diag.error(scanner, open === '<' ? 'malformed restriction' : 'missing comma');
  }
  scanner.advance();

  const y = requireInteger(ctx);
  scanner.consumeWhitespace();
  if (scanner.peek() !== close) {
    throw diag.error(scanner, 'malformed restriction');
  }
  scanner.advance();

  switch (open) {
    case '<':
      return { kind: 'range', low: x, high: y };
    case '[':
      return { kind: 'varRange', low: x, high: y };
    default:
      return { kind: 'values', first: x, second: y };
  }
}

function requireInteger(ctx: ParserContext): number {
  const { scanner, diag } = ctx;
  scanner.consumeWhitespace();
  const start = scanner.pos;
  const value = scanner.matchInteger();
  if (value === null) {
    throw diag.error(scanner, 'malformed integer');
  }
  if (value < INT_MIN || value > INT_MAX) {
    throw diag.error(scanner, 'malformed integer', start + 1);
  }
  return value;
}

function matchPointer(scanner: Scanner): boolean {
  scanner.consumeWhitespace();
  if (scanner.peek() === '*') {
    scanner.advance();
    return true;
  }
  return false;
}
