export {
  AIConfig,
  FillmarkConfig,
  ConfigOverrides,
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_IGNORED_DIRS,
  DEFAULT_IGNORED_FILES,
  mergeConfig,
  validateConfig,
} from './Config';

export {
  CONFIG_FILENAME,
  LoadConfigOptions,
  loadConfig,
  parseConfigDocument,
  configFromEnv,
} from './ConfigLoader';
