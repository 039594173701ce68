import type { Prototype, RestrictedOperand, TypeDescriptor } from '@bifgen/types';
import type { ParserContext } from './ParserContext.js';
import { matchType } from './TypeParser.js';

/**
 * Parse `<return-type> <name> ( <args> ) ;` through to end of line.
 */
export function parsePrototype(ctx: ParserContext): Prototype {
  const { scanner, diag } = ctx;

  scanner.consumeWhitespace();
  const returnStart = scanner.pos;
  const returnType = matchType(ctx, true);
  if (returnType === null) {
    throw diag.error(scanner, 'missing return type');
  }
  // Restrictions describe constant arguments only
  if (returnType.restriction !== undefined) {
    throw diag.error(scanner, 'restriction not allowed on return type', returnStart + 1);
  }

  scanner.consumeWhitespace();
  const name = scanner.matchIdentifier();
  if (name === null) {
    throw diag.error(scanner, 'missing function name');
  }

  scanner.consumeWhitespace();
  if (scanner.peek() !== '(') {
    throw diag.error(scanner, "missing '('");
  }
  scanner.advance();

  const { args, restrictedOperands } = parseArgs(ctx);

  scanner.consumeWhitespace();
  if (scanner.peek() !== ';') {
    throw diag.error(scanner, 'missing semicolon');
  }
  scanner.advance();

  scanner.consumeWhitespace();
  if (!scanner.atEndOfLine()) {
    throw diag.error(scanner, 'garbage at end of line');
  }

  return { returnType, name, args, restrictedOperands };
}

/**
 * Argument list after the opening parenthesis, consuming the closing one.
 */
function parseArgs(ctx: ParserContext): { args: TypeDescriptor[]; restrictedOperands: RestrictedOperand[] } {
  const { scanner, diag } = ctx;
  const args: TypeDescriptor[] = [];
  const restrictedOperands: RestrictedOperand[] = [];

  scanner.consumeWhitespace();
  if (scanner.peek() === ')') {
    scanner.advance();
    return { args, restrictedOperands };
  }

  for (;;) {
    scanner.consumeWhitespace();
    const argStart = scanner.pos;
    const arg = matchType(ctx, false);
    if (arg === null) {
      throw diag.error(scanner, args.length === 0 ? 'badly terminated arg list' : "missing argument after ','");
    }

    if (arg.restriction !== undefined) {
      if (restrictedOperands.length >= ctx.maxRestrictedOperands) {
        throw diag.error(scanner, `more than ${ctx.maxRestrictedOperands} restricted operands`, argStart + 1);
      }
      restrictedOperands.push({ operand: args.length + 1, restriction: arg.restriction });
    }
    args.push(arg);

    scanner.consumeWhitespace();
    if (scanner.peek() === ')') {
      scanner.advance();
      return { args, restrictedOperands };
    }
    if (scanner.peek() !== ',') {
      throw diag.error(scanner, "arg not followed by ',' or ')'");
    }
    scanner.advance();
  }
}
