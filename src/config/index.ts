export { loadConfigFromFile, parseConfigText, parseConfigDocument, ConfigLoadError } from './loader.js';
export type { LoadedConfig } from './loader.js';
export { normalizeConfig, normalizeConsumer, normalizeRule, normalizeParameters } from './normalize.js';
export { ConfigService, FileConfigSource, StaticConfigSource } from './config-service.js';
export type { ConfigSource, ConfigServiceOptions } from './config-service.js';
export { TtlCache } from './cache.js';
export {
  loadSettings,
  resetSettingsCache,
  findSettingsFile,
  parseSettings,
  applyEnv,
  DEFAULT_SETTINGS,
  SETTINGS_FILENAME,
} from './settings.js';
export type { Settings } from './settings.js';
