/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  defaultConfig,
  CONFIG_FILE_NAME,
  MAX_RESTRICTED_OPERANDS_LIMIT,
  validateVersion,
  validatePrefix,
  validateMaxRestrictedOperands,
  validateBaseTypes,
  validateRegistrySoftLimit,
} from './ConfigLoader.js';
export type { GeneratorConfig } from './ConfigLoader.js';
