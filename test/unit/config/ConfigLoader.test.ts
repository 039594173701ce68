/**
 * ConfigLoader Tests
 *
 * Tests:
 * - No config returns defaults
 * - Valid, partial and explicit YAML configs
 * - Invalid YAML falls back to defaults with warnings
 * - Invalid values throw ConfigError naming the file
 * - Version compatibility
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CONFIG_FILE_NAME, ConfigError, DEFAULT_CONFIG, loadConfig, validateVersion } from '@bifgen/core';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Captures warnings from logger during test execution
 */
interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => {
      warnings.push(msg);
    },
  };
}

// =============================================================================
// TESTS: loadConfig
// =============================================================================

describe('loadConfig', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'bifgen-config-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function writeConfig(content: string, name: string = CONFIG_FILE_NAME): string {
    const path = join(testDir, name);
    writeFileSync(path, content);
    return path;
  }

  function assertConfigError(content: string, message: string): void {
    const path = writeConfig(content);
    assert.throws(
      () => loadConfig(testDir, createLoggerMock()),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.strictEqual(err.message, message);
        assert.strictEqual(err.context.filePath, path);
        return true;
      },
    );
  }

  describe('defaults', () => {
    it('should return defaults when no config file exists', () => {
      const logger = createLoggerMock();

      assert.deepStrictEqual(loadConfig(testDir, logger), DEFAULT_CONFIG);
      assert.deepStrictEqual(logger.warnings, []);
    });

    it('should return defaults for an empty or comment-only file', () => {
      writeConfig('# nothing configured yet\n');

      assert.deepStrictEqual(loadConfig(testDir, createLoggerMock()), DEFAULT_CONFIG);
    });

    it('should hand out defaults that share no arrays', () => {
      const first = loadConfig(testDir, createLoggerMock());
      first.baseTypes.pop();

      const second = loadConfig(testDir, createLoggerMock());
      assert.notStrictEqual(second.baseTypes, DEFAULT_CONFIG.baseTypes);
      assert.strictEqual(second.baseTypes.length, 12);
      assert.strictEqual(DEFAULT_CONFIG.baseTypes.length, 12);
    });

    it('should copy the default base types into a partial config', () => {
      writeConfig('prefix: demo\n');

      assert.notStrictEqual(loadConfig(testDir, createLoggerMock()).baseTypes, DEFAULT_CONFIG.baseTypes);
    });

    it('should default to the rs6000 prefix and two restricted operands', () => {
      assert.strictEqual(DEFAULT_CONFIG.prefix, 'rs6000');
      assert.strictEqual(DEFAULT_CONFIG.maxRestrictedOperands, 2);
      assert.strictEqual(DEFAULT_CONFIG.baseTypes.length, 12);
    });
  });

  describe('valid YAML', () => {
    it('should read every field and drop duplicate base types', () => {
      writeConfig(
        ['prefix: demo', 'maxRestrictedOperands: 1', 'baseTypes: [char, int, int]', 'registrySoftLimit: 5000', ''].join('\n'),
      );

      assert.deepStrictEqual(loadConfig(testDir, createLoggerMock()), {
        prefix: 'demo',
        maxRestrictedOperands: 1,
        baseTypes: ['char', 'int'],
        registrySoftLimit: 5000,
      });
    });

    it('should merge a partial config with defaults', () => {
      writeConfig('maxRestrictedOperands: 3\n');

      assert.deepStrictEqual(loadConfig(testDir, createLoggerMock()), { ...DEFAULT_CONFIG, maxRestrictedOperands: 3 });
    });

    it('should warn about unknown keys', () => {
      writeConfig('prefix: demo\ncolour: blue\n');
      const logger = createLoggerMock();

      assert.strictEqual(loadConfig(testDir, logger).prefix, 'demo');
      assert.deepStrictEqual(logger.warnings, ['Unknown config key "colour" ignored']);
    });

    it('should read an explicit config path relative to the project', () => {
      writeConfig('prefix: explicit\n', 'other.yaml');

      assert.strictEqual(loadConfig(testDir, createLoggerMock(), 'other.yaml').prefix, 'explicit');
    });
  });

  describe('invalid YAML', () => {
    it('should warn and fall back to defaults', () => {
      const path = writeConfig('prefix: [unclosed\n');
      const logger = createLoggerMock();

      assert.deepStrictEqual(loadConfig(testDir, logger), DEFAULT_CONFIG);
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0].startsWith(`Failed to parse ${path}: `));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });
  });

  describe('invalid values', () => {
    it('should reject a missing explicit config file', () => {
      assert.throws(() => loadConfig(testDir, createLoggerMock(), 'absent.yaml'), {
        code: 'ERR_CONFIG_NOT_FOUND',
        message: `Config file not found: ${join(testDir, 'absent.yaml')}`,
      });
    });

    it('should reject a non-mapping document', () => {
      const path = join(testDir, CONFIG_FILE_NAME);
      assertConfigError('- prefix\n', `Config error: ${path} must contain a mapping`);
    });

    it('should reject prefixes that are not C identifiers', () => {
      assertConfigError('prefix: 9lives\n', 'Config error: prefix "9lives" is not a C identifier');
    });

    it('should bound maxRestrictedOperands', () => {
      assertConfigError('maxRestrictedOperands: 0\n', 'Config error: maxRestrictedOperands must be between 1 and 8, got 0');
      assertConfigError('maxRestrictedOperands: 9\n', 'Config error: maxRestrictedOperands must be between 1 and 8, got 9');
      assertConfigError('maxRestrictedOperands: 1.5\n', 'Config error: maxRestrictedOperands must be an integer, got 1.5');
    });

    it('should reject unknown or empty base type lists', () => {
      assertConfigError(
        'baseTypes: [int, quad]\n',
        'Config error: baseTypes[1] must be one of char, short, int, longlong, float, double, int128, float128, decimal32, decimal64, decimal128, ibm128, got "quad"',
      );
      assertConfigError('baseTypes: []\n', 'Config error: baseTypes cannot be empty');
      assertConfigError('baseTypes: int\n', 'Config error: baseTypes must be an array, got string');
    });

    it('should reject a non-positive registry soft limit', () => {
      assertConfigError('registrySoftLimit: 0\n', 'Config error: registrySoftLimit must be a positive integer, got 0');
    });
  });
});

// =============================================================================
// TESTS: validateVersion
// =============================================================================

describe('validateVersion', () => {
  it('should pass when no version is given', () => {
    assert.doesNotThrow(() => validateVersion(undefined, '0.1.0'));
  });

  it('should ignore pre-release tags', () => {
    assert.doesNotThrow(() => validateVersion('0.1.0', '0.1.0-beta'));
  });

  it('should reject a different schema version', () => {
    assert.throws(() => validateVersion('0.2.0', '0.1.0'), {
      message: 'Config error: config version "0.2.0" is not compatible with bifgen 0.1.0. Expected "0.1.0".',
    });
  });

  it('should reject non-string and empty versions', () => {
    assert.throws(() => validateVersion(1, '0.1.0'), ConfigError);
    assert.throws(() => validateVersion('  ', '0.1.0'), { message: 'Config error: version cannot be empty' });
  });
});
