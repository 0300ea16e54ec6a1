/**
 * Config module exports
 */

export {
  configSchema,
  lexiconConfigSchema,
  paraphraseConfigSchema,
  thresholdsConfigSchema,
  bulkConfigSchema,
  type Config,
  type LexiconConfig,
  type ParaphraseConfig,
  type ThresholdsConfig,
  type BulkConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  CONFIG_FILE_NAMES,
} from './loader.js';
