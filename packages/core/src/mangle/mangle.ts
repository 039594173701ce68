/**
 * Function-type mangling.
 *
 * A type-descriptor id names the shape of a prototype: return fragment,
 * `_ftype`, then one `_<fragment>` per argument (`_v` when there are none).
 * Restrictions, names and pointee types do not take part, so prototypes of
 * the same shape share one id.
 *
 *   int f ();              si_ftype_v
 *   vsi f (vsi, const int<5>);  v4si_ftype_v4si_si
 *   void f (unsigned int *);    v_ftype_pv
 */

import type { TypeDescriptor } from '@bifgen/types';
import { InternalError } from '../errors/GeneratorError.js';
import { PIXEL_MODE, SCALAR_MODES, VECTOR_MODES } from './modes.js';

export const FTYPE_INFIX = '_ftype';

/** Fragment used for pointers of any pointee type */
export const POINTER_FRAGMENT = 'pv';
export const VOID_FRAGMENT = 'v';
export const OPAQUE_FRAGMENT = 'opaque';

/**
 * Mangled fragment of one type.
 */
export function typeFragment(type: TypeDescriptor): string {
  if (type.isPointer) {
    return POINTER_FRAGMENT;
  }
  if (type.isVoid) {
    return VOID_FRAGMENT;
  }
  if (type.isOpaque) {
    return OPAQUE_FRAGMENT;
  }

  const sign = type.isUnsigned ? 'u' : '';
  if (!type.isVector) {
    return sign + SCALAR_MODES[type.base];
  }

  const bool = type.isBool ? 'b' : '';
  if (type.isPixel) {
    return `${sign}${bool}v${PIXEL_MODE}`;
  }
  const mode = VECTOR_MODES[type.base];
  if (mode === undefined) {
    throw new InternalError(`no vector mode for base type '${type.base}'`);
  }
  return `${sign}${bool}v${mode}`;
}

/**
 * Type-descriptor id of a return type and argument list.
 */
export function mangle(returnType: TypeDescriptor, args: readonly TypeDescriptor[]): string {
  const argPart = args.length === 0 ? `_${VOID_FRAGMENT}` : args.map((arg) => `_${typeFragment(arg)}`).join('');
  return typeFragment(returnType) + FTYPE_INFIX + argPart;
}

/**
 * Recover the fragments of a type-descriptor id.
 *
 * Fragments never contain '_', so the id splits unambiguously.
 */
export function splitTypeDescId(id: string): { returnFragment: string; argFragments: string[] } {
  const infixAt = id.indexOf(`${FTYPE_INFIX}_`);
  if (infixAt <= 0) {
    throw new InternalError(`malformed type-descriptor id '${id}'`);
  }
  const returnFragment = id.slice(0, infixAt);
  const rest = id.slice(infixAt + FTYPE_INFIX.length + 1).split('_');
  const argFragments = rest.length === 1 && rest[0] === VOID_FRAGMENT ? [] : rest;
  if (argFragments.some((fragment) => fragment === '')) {
    throw new InternalError(`malformed type-descriptor id '${id}'`);
  }
  return { returnFragment, argFragments };
}
