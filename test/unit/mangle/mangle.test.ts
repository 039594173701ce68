/**
 * Mangling Tests
 *
 * Type fragments, type-descriptor ids and their decomposition.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  InternalError,
  emptyTypeDescriptor,
  mangle,
  parsePrototype,
  splitTypeDescId,
  typeFragment,
  type TypeDescriptor,
} from '@bifgen/core';
import { lineContext } from '../../helpers/parserContext.js';

function mangleLine(prototype: string): string {
  const proto = parsePrototype(lineContext(prototype));
  return mangle(proto.returnType, proto.args);
}

function argFragment(type: string): string {
  return mangleLine(`void f (${type});`).replace('v_ftype_', '');
}

describe('mangle', () => {
  it('should use _v for an empty argument list', () => {
    assert.strictEqual(mangleLine('int f ();'), 'si_ftype_v');
  });

  it('should join one fragment per argument', () => {
    assert.strictEqual(mangleLine('int f (int);'), 'si_ftype_si');
    assert.strictEqual(mangleLine('vsi f (vsi, const int<5>);'), 'v4si_ftype_v4si_si');
    assert.strictEqual(mangleLine('double f (double, float);'), 'df_ftype_df_sf');
  });

  it('should give prototypes of the same shape the same id', () => {
    assert.strictEqual(mangleLine('int a (int);'), mangleLine('signed int b (const int<0,7>);'));
  });

  it('should collapse every pointer to pv', () => {
    assert.strictEqual(mangleLine('void f (const char *);'), 'v_ftype_pv');
    assert.strictEqual(mangleLine('void f (vsi *);'), 'v_ftype_pv');
    assert.strictEqual(mangleLine('void * f (unsigned long long *);'), 'pv_ftype_pv');
  });

  describe('fragments', () => {
    it('should mangle scalar modes', () => {
      assert.strictEqual(argFragment('char'), 'qi');
      assert.strictEqual(argFragment('unsigned short'), 'uhi');
      assert.strictEqual(argFragment('unsigned int'), 'usi');
      assert.strictEqual(argFragment('long long'), 'di');
      assert.strictEqual(argFragment('__int128'), 'ti');
      assert.strictEqual(argFragment('_Float128'), 'tf');
      assert.strictEqual(argFragment('_Decimal32'), 'sd');
      assert.strictEqual(argFragment('_Decimal128'), 'td');
      assert.strictEqual(argFragment('__ibm128'), 'if');
    });

    it('should mangle vector modes with sign and bool prefixes', () => {
      assert.strictEqual(argFragment('vsc'), 'v16qi');
      assert.strictEqual(argFragment('vuc'), 'uv16qi');
      assert.strictEqual(argFragment('vbi'), 'bv4si');
      assert.strictEqual(argFragment('vull'), 'uv2di');
      assert.strictEqual(argFragment('vbq'), 'bv1ti');
      assert.strictEqual(argFragment('vd'), 'v2df');
    });

    it('should mangle pixel and opaque vectors', () => {
      assert.strictEqual(argFragment('vp'), 'vp8hi');
      assert.strictEqual(argFragment('vop'), 'opaque');
    });

    it('should reject vectors of types without a vector mode', () => {
      const type: TypeDescriptor = { ...emptyTypeDescriptor(), isVector: true, base: 'decimal32' };

      assert.throws(() => typeFragment(type), {
        name: 'InternalError',
        message: "no vector mode for base type 'decimal32'",
      });
    });
  });
});

describe('splitTypeDescId', () => {
  it('should recover return and argument fragments', () => {
    assert.deepStrictEqual(splitTypeDescId('v4si_ftype_v4si_si'), {
      returnFragment: 'v4si',
      argFragments: ['v4si', 'si'],
    });
  });

  it('should read _v as no arguments', () => {
    assert.deepStrictEqual(splitTypeDescId('si_ftype_v'), { returnFragment: 'si', argFragments: [] });
  });

  it('should keep a void return fragment', () => {
    assert.deepStrictEqual(splitTypeDescId('v_ftype_pv'), { returnFragment: 'v', argFragments: ['pv'] });
  });

  it('should reject ids without the ftype infix', () => {
    assert.throws(() => splitTypeDescId('si_si'), InternalError);
    assert.throws(() => splitTypeDescId('_ftype_si'), InternalError);
    assert.throws(() => splitTypeDescId('si_ftype_si__si'), InternalError);
  });
});
