/**
 * Closed vocabularies of the two definition languages.
 */

import type { BaseType, FunctionKind, GatingStanza, GatingToken } from '@bifgen/types';

/**
 * Scalar keywords. `long` is not listed: it is only valid as `long long`,
 * which the type parser handles as a two-token keyword.
 */
export const BASE_TYPE_KEYWORDS: ReadonlyMap<string, BaseType> = new Map<string, BaseType>([
  ['char', 'char'],
  ['short', 'short'],
  ['int', 'int'],
  ['float', 'float'],
  ['double', 'double'],
  ['__int128', 'int128'],
  ['_Float128', 'float128'],
  ['_Decimal32', 'decimal32'],
  ['_Decimal64', 'decimal64'],
  ['_Decimal128', 'decimal128'],
  ['__ibm128', 'ibm128'],
]);

/** Bases that `signed` and `unsigned` may qualify */
export const INTEGRAL_BASES: ReadonlySet<BaseType> = new Set<BaseType>(['char', 'short', 'int', 'longlong', 'int128']);

export interface VectorShorthand {
  base: BaseType;
  signed?: boolean;
  unsigned?: boolean;
  bool?: boolean;
  pixel?: boolean;
  opaque?: boolean;
}

/**
 * Vector shorthand tokens: `vsc` is `vector signed char`, `vbll` is
 * `vector bool long long`, `vop` is an opaque vector matching any vector.
 */
export const VECTOR_SHORTHANDS: ReadonlyMap<string, VectorShorthand> = new Map<string, VectorShorthand>([
  ['vsc', { base: 'char', signed: true }],
  ['vuc', { base: 'char', unsigned: true }],
  ['vbc', { base: 'char', bool: true }],
  ['vss', { base: 'short', signed: true }],
  ['vus', { base: 'short', unsigned: true }],
  ['vbs', { base: 'short', bool: true }],
  ['vsi', { base: 'int', signed: true }],
  ['vui', { base: 'int', unsigned: true }],
  ['vbi', { base: 'int', bool: true }],
  ['vsll', { base: 'longlong', signed: true }],
  ['vull', { base: 'longlong', unsigned: true }],
  ['vbll', { base: 'longlong', bool: true }],
  ['vsq', { base: 'int128', signed: true }],
  ['vuq', { base: 'int128', unsigned: true }],
  ['vbq', { base: 'int128', bool: true }],
  ['vp', { base: 'short', pixel: true }],
  ['vf', { base: 'float' }],
  ['vd', { base: 'double' }],
  ['vop', { base: 'int', opaque: true }],
]);

/** Purity keywords that may open a builtin prototype line */
export const FUNCTION_KIND_KEYWORDS: ReadonlyMap<string, FunctionKind> = new Map<string, FunctionKind>([
  ['const', 'const'],
  ['pure', 'pure'],
  ['fpmath', 'fpmath'],
]);

/**
 * Gating stanzas: enable tag and the build-configuration condition under
 * which builtins of the stanza are registered.
 */
export const GATING_STANZAS: Readonly<Record<GatingToken, GatingStanza>> = {
  always: { token: 'always', enableTag: 'ENB_ALWAYS', condition: null },
  power5: { token: 'power5', enableTag: 'ENB_P5', condition: 'TARGET_POPCNTB' },
  power6: { token: 'power6', enableTag: 'ENB_P6', condition: 'TARGET_CMPB' },
  altivec: { token: 'altivec', enableTag: 'ENB_ALTIVEC', condition: 'TARGET_ALTIVEC' },
  vsx: { token: 'vsx', enableTag: 'ENB_VSX', condition: 'TARGET_VSX' },
  power7: { token: 'power7', enableTag: 'ENB_P7', condition: 'TARGET_POPCNTD' },
  'power7-64': { token: 'power7-64', enableTag: 'ENB_P7_64', condition: 'TARGET_POPCNTD && TARGET_POWERPC64' },
  power8: { token: 'power8', enableTag: 'ENB_P8', condition: 'TARGET_DIRECT_MOVE' },
  'power8-vector': { token: 'power8-vector', enableTag: 'ENB_P8V', condition: 'TARGET_P8_VECTOR' },
  power9: { token: 'power9', enableTag: 'ENB_P9', condition: 'TARGET_MODULO' },
  'power9-64': { token: 'power9-64', enableTag: 'ENB_P9_64', condition: 'TARGET_MODULO && TARGET_POWERPC64' },
  'power9-vector': { token: 'power9-vector', enableTag: 'ENB_P9V', condition: 'TARGET_P9_VECTOR' },
  'ieee128-hw': { token: 'ieee128-hw', enableTag: 'ENB_IEEE128_HW', condition: 'TARGET_FLOAT128_HW' },
  dfp: { token: 'dfp', enableTag: 'ENB_DFP', condition: 'TARGET_DFP' },
  crypto: { token: 'crypto', enableTag: 'ENB_CRYPTO', condition: 'TARGET_CRYPTO' },
  htm: { token: 'htm', enableTag: 'ENB_HTM', condition: 'TARGET_HTM' },
  power10: { token: 'power10', enableTag: 'ENB_P10', condition: 'TARGET_POWER10' },
  mma: { token: 'mma', enableTag: 'ENB_MMA', condition: 'TARGET_MMA' },
};
