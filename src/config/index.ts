/**
 * Config module exports
 */

export {
  configSchema,
  pluginOptionsSchema,
  watchConfigSchema,
  type Config,
  type PluginOptions,
  type WatchConfig,
} from './schema.js';

export {
  CONFIG_NAMES,
  PACKAGE_CONFIG_KEY,
  loadConfig,
  validateConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type ResolvedConfig,
} from './loader.js';
