/**
 * Type descriptors - the typed form of one return or argument type
 * in a builtin or overload prototype.
 */

/**
 * Element kind of a scalar or vector type.
 *
 * Source keywords: `char`, `short`, `int`, `long long`, `float`, `double`,
 * `__int128`, `_Float128`, `_Decimal32`, `_Decimal64`, `_Decimal128`, `__ibm128`.
 */
export type BaseType =
  | 'char'
  | 'short'
  | 'int'
  | 'longlong'
  | 'float'
  | 'double'
  | 'int128'
  | 'float128'
  | 'decimal32'
  | 'decimal64'
  | 'decimal128'
  | 'ibm128';

/** All base types, in declaration order */
export const BASE_TYPES: readonly BaseType[] = [
  'char',
  'short',
  'int',
  'longlong',
  'float',
  'double',
  'int128',
  'float128',
  'decimal32',
  'decimal64',
  'decimal128',
  'ibm128',
];

export function isBaseType(value: unknown): value is BaseType {
  return typeof value === 'string' && (BASE_TYPES as readonly string[]).includes(value);
}

/**
 * Restriction on a constant integer argument.
 *
 * - bits:     `<N>`   value is unsigned and fits in N bits
 * - range:    `<X,Y>` value lies in [X,Y]
 * - varRange: `[X,Y]` same bound, checked only when the argument is constant
 * - values:   `{X,Y}` value is exactly X or Y
 */
export type Restriction =
  | { kind: 'bits'; bits: number }
  | { kind: 'range'; low: number; high: number }
  | { kind: 'varRange'; low: number; high: number }
  | { kind: 'values'; first: number; second: number };

export type RestrictionKind = Restriction['kind'];

export interface TypeDescriptor {
  isVoid: boolean;
  isConst: boolean;
  isVector: boolean;
  isSigned: boolean;
  isUnsigned: boolean;
  isBool: boolean;
  isPixel: boolean;
  isPointer: boolean;
  isOpaque: boolean;
  /** Element kind; meaningless for void and opaque types */
  base: BaseType;
  /** Only ever set on a `const int` argument */
  restriction?: Restriction;
}

/**
 * A descriptor with every flag cleared. Parsers start from this and set
 * what the source text says.
 */
export function emptyTypeDescriptor(): TypeDescriptor {
  return {
    isVoid: false,
    isConst: false,
    isVector: false,
    isSigned: false,
    isUnsigned: false,
    isBool: false,
    isPixel: false,
    isPointer: false,
    isOpaque: false,
    base: 'int',
  };
}

/**
 * The two numeric operands a restriction stores in generated tables.
 * Bits restrictions only use the first.
 */
export function restrictionValues(restriction: Restriction): [number, number] {
  switch (restriction.kind) {
    case 'bits':
      return [restriction.bits, 0];
    case 'range':
    case 'varRange':
      return [restriction.low, restriction.high];
    case 'values':
      return [restriction.first, restriction.second];
  }
}
