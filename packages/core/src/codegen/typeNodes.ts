import { InternalError } from '../errors/GeneratorError.js';
import { OPAQUE_FRAGMENT, POINTER_FRAGMENT, VOID_FRAGMENT } from '../mangle/mangle.js';

/** Type nodes of the scalar modes; integral ones also have `unsigned_` forms */
const SCALAR_TYPE_NODES: Readonly<Record<string, { node: string; integral: boolean }>> = {
  qi: { node: 'intQI_type_node', integral: true },
  hi: { node: 'intHI_type_node', integral: true },
  si: { node: 'intSI_type_node', integral: true },
  di: { node: 'intDI_type_node', integral: true },
  ti: { node: 'intTI_type_node', integral: true },
  sf: { node: 'float_type_node', integral: false },
  df: { node: 'double_type_node', integral: false },
  tf: { node: 'float128_type_node', integral: false },
  sd: { node: 'dfloat32_type_node', integral: false },
  dd: { node: 'dfloat64_type_node', integral: false },
  td: { node: 'dfloat128_type_node', integral: false },
  if: { node: 'ibm128_float_type_node', integral: false },
};

const VECTOR_FRAGMENT = /^(u?)(b?)v(p?)(\d+[a-z]{2})$/;

/**
 * Name of the back-end type node a mangled fragment stands for.
 *
 *   si      intSI_type_node
 *   usi     unsigned_intSI_type_node
 *   v4si    V4SI_type_node
 *   bv16qi  bool_V16QI_type_node
 *   vp8hi   pixel_V8HI_type_node
 */
export function typeNodeForFragment(fragment: string): string {
  switch (fragment) {
    case VOID_FRAGMENT:
      return 'void_type_node';
    case POINTER_FRAGMENT:
      return 'ptr_type_node';
    case OPAQUE_FRAGMENT:
      return 'opaque_V4SI_type_node';
  }

  const vector = VECTOR_FRAGMENT.exec(fragment);
  if (vector !== null) {
    const [, unsigned, bool, pixel, mode] = vector;
    const qualifier = pixel ? 'pixel_' : bool ? 'bool_' : unsigned ? 'unsigned_' : '';
    return `${qualifier}V${mode.toUpperCase()}_type_node`;
  }

  const unsigned = fragment.startsWith('u');
  const scalar = SCALAR_TYPE_NODES[unsigned ? fragment.slice(1) : fragment];
  if (scalar === undefined || (unsigned && !scalar.integral)) {
    throw new InternalError(`unknown type fragment '${fragment}'`);
  }
  return unsigned ? `unsigned_${scalar.node}` : scalar.node;
}
