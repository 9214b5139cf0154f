export { ConfigSchema, ConfigDefaults, LOG_LEVELS, type RawConfig, type Config, type LogLevel } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  initConfig,
  CONFIG_TEMPLATE,
  PORT_ENV,
  HOST_ENV,
  type LoadConfigOptions,
  type LoadConfigResult,
  type InitConfigResult,
  ConfigError,
} from './loader.js';
export { parseDuration, parseDurationValue, formatDuration, isDurationString } from './duration.js';
