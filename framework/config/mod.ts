/**
 * Configuration
 */

export {
  Config,
  ConfigError,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  type ConfigOptions,
} from './config.ts';
