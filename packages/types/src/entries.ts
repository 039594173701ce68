/**
 * Entries parsed from the builtin and overload definition files.
 */

import type { Restriction, TypeDescriptor } from './descriptors.js';

/**
 * A restricted argument of a prototype.
 * `operand` is 1-based, matching the operand numbering of generated tables.
 */
export interface RestrictedOperand {
  operand: number;
  restriction: Restriction;
}

export interface Prototype {
  returnType: TypeDescriptor;
  name: string;
  args: TypeDescriptor[];
  restrictedOperands: RestrictedOperand[];
}

/** Purity modifier written before a builtin prototype */
export type FunctionKind = 'none' | 'const' | 'pure' | 'fpmath';

/**
 * Closed attribute vocabulary. Order matters: an attribute's bit in the
 * generated `bifattrs` mask is `1 << index`.
 */
export const ATTRIBUTE_NAMES = [
  'init',
  'set',
  'extract',
  'nosoft',
  'ldvec',
  'stvec',
  'reve',
  'pred',
  'htm',
  'htmspr',
  'htmcr',
  'mma',
  'no32bit',
  'cpu',
  'ldstmask',
] as const;

export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

export type AttributeSet = ReadonlySet<AttributeName>;

export function isAttributeName(value: string): value is AttributeName {
  return (ATTRIBUTE_NAMES as readonly string[]).includes(value);
}

/**
 * Gating predicate tokens accepted in builtin stanza headers.
 */
export const GATING_TOKENS = [
  'always',
  'power5',
  'power6',
  'altivec',
  'vsx',
  'power7',
  'power7-64',
  'power8',
  'power8-vector',
  'power9',
  'power9-64',
  'power9-vector',
  'ieee128-hw',
  'dfp',
  'crypto',
  'htm',
  'power10',
  'mma',
] as const;

export type GatingToken = (typeof GATING_TOKENS)[number];

export function isGatingToken(value: string): value is GatingToken {
  return (GATING_TOKENS as readonly string[]).includes(value);
}

export interface GatingStanza {
  token: GatingToken;
  /** Generated enable tag, e.g. `ENB_ALTIVEC` */
  enableTag: string;
  /** Build-configuration condition; null when always enabled */
  condition: string | null;
}

export interface BuiltinEntry {
  stanza: GatingStanza;
  kind: FunctionKind;
  proto: Prototype;
  id: string;
  patternName: string;
  attrs: AttributeSet;
  typeDescId: string;
  /** Line of the prototype in the builtin file */
  line: number;
}

export interface OverloadStanza {
  groupId: string;
  externName: string;
  internName: string;
}

export interface OverloadEntry {
  stanza: OverloadStanza;
  proto: Prototype;
  /** Builtin id this overload instance resolves to */
  refId: string;
  typeDescId: string;
  /** Line of the prototype in the overload file */
  line: number;
}
