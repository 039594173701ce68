import type { BaseType } from '@bifgen/types';

/** Machine mode suffix of each scalar base type */
export const SCALAR_MODES: Readonly<Record<BaseType, string>> = {
  char: 'qi',
  short: 'hi',
  int: 'si',
  longlong: 'di',
  float: 'sf',
  double: 'df',
  int128: 'ti',
  float128: 'tf',
  decimal32: 'sd',
  decimal64: 'dd',
  decimal128: 'td',
  ibm128: 'if',
};

/**
 * Vector mode of each element type that can form a 128-bit vector.
 * Decimal and IBM extended types have none.
 */
export const VECTOR_MODES: Readonly<Partial<Record<BaseType, string>>> = {
  char: '16qi',
  short: '8hi',
  int: '4si',
  longlong: '2di',
  float: '4sf',
  double: '2df',
  int128: '1ti',
  float128: '1tf',
};

export const PIXEL_MODE = 'p8hi';
