/**
 * Config module exports
 */

export {
  configSchema,
  scanConfigSchema,
  outputFormatSchema,
  type Config,
  type ScanConfig,
  type OutputFormat,
} from './schema.js';

export {
  CONFIG_FILE_NAMES,
  PACKAGE_JSON_KEY,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
