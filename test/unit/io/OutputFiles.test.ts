/**
 * OutputFiles Tests
 *
 * Creation, single write per output, and removal of everything created
 * once a run is abandoned.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConsoleLogger, ExitCode, OutputFiles, OutputNotCreatableError, WriteError } from '@bifgen/core';

describe('OutputFiles', () => {
  let dir: string;
  let outputs: OutputFiles;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bifgen-outputs-'));
    outputs = new OutputFiles(new ConsoleLogger('silent'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write and close a created output', () => {
    const path = join(dir, 'decls.h');
    outputs.create('declarations', path);

    outputs.write('declarations', '#define X 1\n');

    assert.strictEqual(readFileSync(path, 'utf-8'), '#define X 1\n');
  });

  it('should report a missing directory as not creatable', () => {
    const path = join(dir, 'missing', 'aliases.h');

    assert.throws(
      () => outputs.create('aliases', path),
      (err: unknown) => {
        assert.ok(err instanceof OutputNotCreatableError);
        assert.strictEqual(err.code, 'ERR_NO_ALIAS_FILE');
        assert.strictEqual(err.exitCode, ExitCode.NoAliasFile);
        return true;
      },
    );
  });

  it('should fail to write an output that was never created', () => {
    assert.throws(
      () => outputs.write('aliases', '#define vec_x __builtin_vec_x\n'),
      (err: unknown) => {
        assert.ok(err instanceof WriteError);
        assert.strictEqual(err.code, 'ERR_WRITE_ALIAS');
        assert.strictEqual(err.exitCode, ExitCode.WriteAliases);
        assert.strictEqual(err.message, "Output to 'aliases' failed: file is not open");
        return true;
      },
    );
  });

  it('should fail a second write to the same output', () => {
    const path = join(dir, 'defs.cc');
    outputs.create('definitions', path);
    outputs.write('definitions', 'int x;\n');

    assert.throws(
      () => outputs.write('definitions', 'int y;\n'),
      (err: unknown) => {
        assert.ok(err instanceof WriteError);
        assert.strictEqual(err.code, 'ERR_WRITE_DEF');
        assert.strictEqual(err.exitCode, ExitCode.WriteDefinitions);
        assert.strictEqual(err.context.filePath, path);
        return true;
      },
    );
    assert.strictEqual(readFileSync(path, 'utf-8'), 'int x;\n');
  });

  it('should remove written and still-open outputs on discard', () => {
    const paths = [join(dir, 'decls.h'), join(dir, 'defs.cc'), join(dir, 'aliases.h')];
    outputs.create('declarations', paths[0]);
    outputs.create('definitions', paths[1]);
    outputs.create('aliases', paths[2]);
    outputs.write('declarations', '/* done */\n');

    outputs.discard();

    for (const path of paths) {
      assert.strictEqual(existsSync(path), false, `${path} should be removed`);
    }
  });

  it('should forget discarded outputs', () => {
    const path = join(dir, 'decls.h');
    outputs.create('declarations', path);
    outputs.discard();

    assert.throws(() => outputs.write('declarations', ''), WriteError);
  });
});
