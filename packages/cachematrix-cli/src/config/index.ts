/**
 * Configuration module exports.
 */

export {
  type CliConfig,
  type PartialCliConfig,
  type OutputConfig,
  type OutputFormat,
  DEFAULT_CONFIG,
} from './types.js';

export {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  parseConfigObject,
  parseFormat,
  parseInteger,
  parseNumber,
  parseVariantList,
} from './loader.js';
