import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import { BASE_TYPES, isBaseType, type BaseType } from '@bifgen/types';
import { ConfigError } from '../errors/GeneratorError.js';
import { GENERATOR_VERSION, getSchemaVersion } from '../version.js';

/**
 * bifgen configuration schema.
 *
 * YAML Location: bifgen.config.yaml in the working directory, or the file
 * passed with --config.
 *
 * Example bifgen.config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * prefix: rs6000
 * # Older generators allowed a single restricted operand
 * maxRestrictedOperands: 1
 * # Drop the decimal and extended-precision types
 * baseTypes: [char, short, int, longlong, float, double, int128]
 * ```
 */
export interface GeneratorConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  /**
   * Identifier prefix for generated code: `rs6000` yields
   * `RS6000_BIF_*`, `rs6000_builtin_info`, ...
   */
  prefix: string;

  /** Most restricted (`const int<...>`) operands one prototype may carry */
  maxRestrictedOperands: number;

  /** Element kinds the type grammar accepts */
  baseTypes: BaseType[];

  /**
   * Registry size above which a warning is logged.
   * Nothing is rejected; this only flags runaway input.
   */
  registrySoftLimit?: number;
}

export const CONFIG_FILE_NAME = 'bifgen.config.yaml';

/** Largest accepted maxRestrictedOperands */
export const MAX_RESTRICTED_OPERANDS_LIMIT = 8;

export const DEFAULT_CONFIG: GeneratorConfig = {
  prefix: 'rs6000',
  maxRestrictedOperands: 2,
  baseTypes: [...BASE_TYPES],
};

/** A copy of DEFAULT_CONFIG that shares no arrays with it */
export function defaultConfig(): GeneratorConfig {
  return { ...DEFAULT_CONFIG, baseTypes: [...DEFAULT_CONFIG.baseTypes] };
}

const KNOWN_KEYS = new Set(['version', 'prefix', 'maxRestrictedOperands', 'baseTypes', 'registrySoftLimit']);

/**
 * Load bifgen config.
 *
 * Priority:
 * 1. explicitPath (--config), which must exist
 * 2. bifgen.config.yaml in projectPath
 * 3. defaultConfig()
 *
 * YAML syntax errors log a warning and fall back to defaults.
 * Invalid values THROW ConfigError.
 *
 * @param projectPath - Directory searched for bifgen.config.yaml
 * @param logger - Optional logger for warnings (defaults to console)
 * @param explicitPath - Config file given on the command line
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console,
  explicitPath?: string,
): GeneratorConfig {
  let configPath: string;
  if (explicitPath !== undefined) {
    configPath = resolve(projectPath, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(
        `Config file not found: ${configPath}`,
        'ERR_CONFIG_NOT_FOUND',
        { filePath: configPath },
        'Check the --config path',
      );
    }
  } else {
    configPath = join(projectPath, CONFIG_FILE_NAME);
    if (!existsSync(configPath)) {
      return defaultConfig();
    }
  }

  let parsed: unknown;
  try {
    const content = readFileSync(configPath, 'utf-8');
    parsed = parseYAML(content);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${configPath}: ${error.message}`);
    logger.warn('Using default configuration');
    return defaultConfig();
  }

  // Empty file or comments only
  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Config error: ${configPath} must contain a mapping`, 'ERR_CONFIG_INVALID', {
      filePath: configPath,
    });
  }

  const raw: Record<string, unknown> = { ...parsed };

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Unknown config key "${key}" ignored`);
    }
  }

  try {
    validateVersion(raw.version);
    return {
      ...(typeof raw.version === 'string' ? { version: raw.version } : {}),
      prefix: validatePrefix(raw.prefix) ?? DEFAULT_CONFIG.prefix,
      maxRestrictedOperands: validateMaxRestrictedOperands(raw.maxRestrictedOperands) ?? DEFAULT_CONFIG.maxRestrictedOperands,
      baseTypes: validateBaseTypes(raw.baseTypes) ?? [...DEFAULT_CONFIG.baseTypes],
      ...optionalSoftLimit(validateRegistrySoftLimit(raw.registrySoftLimit)),
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(err.message, err.code, { filePath: configPath }, err.suggestion);
    }
    throw err;
  }
}

function optionalSoftLimit(limit: number | undefined): { registrySoftLimit?: number } {
  return limit === undefined ? {} : { registrySoftLimit: limit };
}

/**
 * Validate config version compatibility with the running bifgen version.
 * If config has no version field, validation passes silently.
 *
 * @param configVersion - Version value from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to GENERATOR_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? GENERATOR_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with bifgen ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_INVALID',
      {},
      'Update the version field or remove it',
    );
  }
}

/**
 * Validate the identifier prefix. Returns undefined when absent.
 */
export function validatePrefix(prefix: unknown): string | undefined {
  if (prefix === undefined || prefix === null) {
    return undefined;
  }
  if (typeof prefix !== 'string') {
    throw new ConfigError(`Config error: prefix must be a string, got ${typeof prefix}`);
  }
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(prefix)) {
    throw new ConfigError(`Config error: prefix "${prefix}" is not a C identifier`);
  }
  return prefix;
}

/**
 * Validate the restricted-operand limit. Returns undefined when absent.
 */
export function validateMaxRestrictedOperands(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`Config error: maxRestrictedOperands must be an integer, got ${JSON.stringify(value)}`);
  }
  if (value < 1 || value > MAX_RESTRICTED_OPERANDS_LIMIT) {
    throw new ConfigError(
      `Config error: maxRestrictedOperands must be between 1 and ${MAX_RESTRICTED_OPERANDS_LIMIT}, got ${value}`,
    );
  }
  return value;
}

/**
 * Validate the base-type vocabulary. Returns undefined when absent.
 */
export function validateBaseTypes(value: unknown): BaseType[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`Config error: baseTypes must be an array, got ${typeof value}`);
  }
  if (value.length === 0) {
    throw new ConfigError('Config error: baseTypes cannot be empty');
  }

  const result: BaseType[] = [];
  for (let i = 0; i < value.length; i++) {
    const entry: unknown = value[i];
    if (!isBaseType(entry)) {
      throw new ConfigError(
        `Config error: baseTypes[${i}] must be one of ${BASE_TYPES.join(', ')}, got ${JSON.stringify(entry)}`,
      );
    }
    if (!result.includes(entry)) {
      result.push(entry);
    }
  }
  return result;
}

/**
 * Validate the registry soft limit. Returns undefined when absent.
 */
export function validateRegistrySoftLimit(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Config error: registrySoftLimit must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}
