/**
 * Packaging Tests
 *
 * The installed `bifgen` binary runs on plain Node, so every workspace
 * package must resolve to its compiled output by default and to its
 * TypeScript sources only under the `source` condition.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const ROOT = fileURLToPath(new URL('../../../', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(path: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(join(ROOT, path), 'utf-8'));
  assert.ok(isRecord(parsed), `${path} is not an object`);
  return parsed;
}

const PACKAGES = [
  { dir: 'packages/types', entry: 'index' },
  { dir: 'packages/core', entry: 'index' },
  { dir: 'packages/cli', entry: 'program' },
];

describe('workspace packaging', () => {
  for (const { dir, entry } of PACKAGES) {
    describe(dir, () => {
      const manifest = readJson(`${dir}/package.json`);

      it('should export compiled output by default and sources to tools', () => {
        assert.deepStrictEqual(manifest.exports, {
          '.': {
            types: `./src/${entry}.ts`,
            source: `./src/${entry}.ts`,
            default: `./dist/${entry}.js`,
          },
        });
        assert.strictEqual(manifest.main, `./dist/${entry}.js`);
        assert.ok(existsSync(join(ROOT, dir, 'src', `${entry}.ts`)));
      });

      it('should build src into the exported dist directory', () => {
        const tsconfig = readJson(`${dir}/tsconfig.build.json`);

        assert.deepStrictEqual(tsconfig.compilerOptions, { composite: true, rootDir: 'src', outDir: 'dist' });
      });
    });
  }

  it('should point both bin entries at the compiled CLI', () => {
    assert.deepStrictEqual(readJson('package.json').bin, { bifgen: './packages/cli/dist/cli.js' });
    assert.deepStrictEqual(readJson('packages/cli/package.json').bin, { bifgen: './dist/cli.js' });
    assert.ok(existsSync(join(ROOT, 'packages/cli/src/cli.ts')));
  });

  it('should run the tests against sources and build through project references', () => {
    const scripts = readJson('package.json').scripts;
    assert.ok(isRecord(scripts));

    assert.deepStrictEqual(
      { build: scripts.build, test: String(scripts.test).split(' ').slice(0, 5) },
      {
        build: 'tsc -b packages/cli/tsconfig.build.json',
        test: ['node', '--conditions=source', '--import', 'tsx', '--test'],
      },
    );
  });
});
