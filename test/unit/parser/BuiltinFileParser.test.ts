/**
 * BuiltinFileParser Tests
 *
 * Stanza headers, two-line entries, attribute sets and registry updates.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ExitCode,
  ParseError,
  SymbolRegistry,
  parseBuiltinFile,
  type BuiltinParseResult,
} from '@bifgen/core';
import { contextFor } from '../../helpers/parserContext.js';

const SAMPLE = [
  '; builtins',
  '[always]',
  '  const int __builtin_foo (int);',
  '    FOO foo_insn {}',
  '',
  '[altivec]',
  '  pure vsi __builtin_bar (vsi, const int<4>);',
  '    BAR bar_insn {set, pred}',
  '  fpmath double __builtin_baz (double);',
  '',
  '    BAZ baz_insn { nosoft }',
  '  vsi __builtin_qux (vsi, const int<4>);',
  '    QUX qux_insn {}',
  '',
].join('\n');

function parse(source: string): BuiltinParseResult & { builtinIds: SymbolRegistry; typeDescIds: SymbolRegistry } {
  const builtinIds = new SymbolRegistry('builtin ids');
  const typeDescIds = new SymbolRegistry('type descriptors');
  const result = parseBuiltinFile(contextFor(source), { builtinIds, typeDescIds });
  return { ...result, builtinIds, typeDescIds };
}

function assertBuiltinError(source: string, message: string, line: number, column: number): void {
  assert.throws(
    () => parse(source),
    (err: unknown) => {
      assert.ok(err instanceof ParseError);
      assert.strictEqual(err.message, message);
      assert.strictEqual(err.exitCode, ExitCode.ParseBuiltin);
      assert.strictEqual(err.format(), `test.def:${line}:${column}: ${message}`);
      return true;
    },
  );
}

describe('parseBuiltinFile', () => {
  describe('entries', () => {
    it('should parse every entry in file order', () => {
      const result = parse(SAMPLE);

      assert.deepStrictEqual(
        result.entries.map((e) => e.id),
        ['FOO', 'BAR', 'BAZ', 'QUX'],
      );
      assert.strictEqual(result.stanzaCount, 2);
    });

    it('should record kind, pattern, stanza and prototype line', () => {
      const [foo, bar, baz, qux] = parse(SAMPLE).entries;

      assert.strictEqual(foo.kind, 'const');
      assert.strictEqual(foo.patternName, 'foo_insn');
      assert.strictEqual(foo.stanza.token, 'always');
      assert.strictEqual(foo.stanza.condition, null);
      assert.strictEqual(foo.line, 3);

      assert.strictEqual(bar.kind, 'pure');
      assert.strictEqual(bar.stanza.enableTag, 'ENB_ALTIVEC');
      assert.deepStrictEqual([...bar.attrs], ['set', 'pred']);
      assert.strictEqual(bar.line, 7);

      assert.strictEqual(baz.kind, 'fpmath');
      assert.deepStrictEqual([...baz.attrs], ['nosoft']);
      assert.strictEqual(baz.line, 9);

      assert.strictEqual(qux.kind, 'none');
      assert.strictEqual(qux.attrs.size, 0);
    });

    it('should mangle each prototype', () => {
      const [foo, bar, baz] = parse(SAMPLE).entries;

      assert.strictEqual(foo.typeDescId, 'si_ftype_si');
      assert.strictEqual(bar.typeDescId, 'v4si_ftype_v4si_si');
      assert.strictEqual(baz.typeDescId, 'df_ftype_df');
    });

    it('should register builtin ids and shared type descriptors once', () => {
      const result = parse(SAMPLE);

      assert.deepStrictEqual(result.builtinIds.toArray(), ['BAR', 'BAZ', 'FOO', 'QUX']);
      assert.deepStrictEqual(result.typeDescIds.toArray(), ['df_ftype_df', 'si_ftype_si', 'v4si_ftype_v4si_si']);
    });

    it('should accept an empty or comment-only file', () => {
      assert.strictEqual(parse('').entries.length, 0);
      assert.strictEqual(parse('; nothing here\n\n').stanzaCount, 0);
    });

    it('should accept gating tokens with padding and hyphens', () => {
      const [entry] = parse('[ power7-64 ]\nint f (int);\nF f_insn {}\n').entries;

      assert.strictEqual(entry.stanza.enableTag, 'ENB_P7_64');
      assert.strictEqual(entry.stanza.condition, 'TARGET_POPCNTD && TARGET_POWERPC64');
    });
  });

  describe('stanza headers', () => {
    it('should reject entries before the first header', () => {
      assertBuiltinError('int f (int);\n', 'ill-formed stanza header', 1, 1);
    });

    it('should reject unknown gating tokens', () => {
      assertBuiltinError('[power42]\n', "unrecognized stanza 'power42'", 1, 2);
    });

    it('should reject an empty header', () => {
      assertBuiltinError('[]\n', 'no expression found in stanza header', 1, 2);
    });

    it('should reject an unclosed header', () => {
      assertBuiltinError('[vsx x]\n', 'ill-formed stanza header', 1, 6);
    });

    it('should reject text after the header', () => {
      assertBuiltinError('[vsx] x\n', 'garbage after stanza header', 1, 7);
    });
  });

  describe('second entry line', () => {
    it('should reject duplicate builtin ids at the id', () => {
      assertBuiltinError('[always]\nint f (int);\nFOO p {}\nint g (int);\n  FOO q {}\n', "duplicate function ID 'FOO'", 5, 3);
    });

    it('should report end of file after a prototype', () => {
      assertBuiltinError('[always]\nint f (int);\n; trailing comment\n', 'unexpected end of file', 3, 1);
    });

    it('should require id, pattern and attribute set', () => {
      assertBuiltinError('[always]\nint f (int);\n{}\n', 'missing builtin id', 3, 1);
      assertBuiltinError('[always]\nint f (int);\nF {}\n', 'missing pattern name', 3, 3);
      assertBuiltinError('[always]\nint f (int);\nF p\n', 'missing attribute set', 3, 4);
    });

    it('should reject unknown attributes at their start', () => {
      assertBuiltinError('[always]\nint f (int);\nF p {bogus}\n', "unknown attribute 'bogus'", 3, 6);
    });

    it('should reject malformed attribute lists', () => {
      assertBuiltinError('[always]\nint f (int);\nF p {set\n', "attribute not followed by ',' or '}'", 3, 9);
      assertBuiltinError('[always]\nint f (int);\nF p {set,}\n', "missing attribute after ','", 3, 10);
      assertBuiltinError('[always]\nint f (int);\nF p {,}\n', 'badly terminated attr set', 3, 6);
      assertBuiltinError('[always]\nint f (int);\nF p {} x\n', 'garbage at end of line', 3, 8);
    });

    it('should report prototype errors on the first line', () => {
      assertBuiltinError('[always]\nconst int f (int)\nF p {}\n', 'missing semicolon', 2, 18);
    });

    it('should reject a restriction on the return type after the function kind', () => {
      assertBuiltinError(
        '[always]\nconst const int<5> f (int);\nF p {}\n',
        'restriction not allowed on return type',
        2,
        7,
      );
    });
  });
});
