/**
 * Configuration Management Module
 *
 * Main API for loading and validating the client configuration.
 *
 * @example
 * ```typescript
 * import { getConfig, reloadConfig } from './config';
 *
 * // Get current configuration (cached)
 * const config = getConfig();
 * console.log(config.calls.defaultTimeoutMs);
 *
 * // Reload configuration from disk and environment
 * const freshConfig = reloadConfig();
 * ```
 */

// Schema exports
export {
  type BusConfig,
  type CallConfig,
  type ReactorConfig,
  type DispatchConfig,
  type LoggingConfig,
  type BuslinkConfig,
  type ValidatedBuslinkConfig,
  BusConfigSchema,
  CallConfigSchema,
  ReactorConfigSchema,
  DispatchConfigSchema,
  LoggingConfigSchema,
  BuslinkConfigSchema,
} from './schema';

// Default configuration
export { DEFAULT_CONFIG } from './defaults';

// Loader functions
export {
  CONFIG_DIR,
  CONFIG_FILE,
  loadConfig,
  getConfig,
  reloadConfig,
  clearConfigCache,
  loadConfigFile,
  loadEnvironmentConfig,
  validateConfigFile,
  deepMerge,
  deepClone,
  formatValidationErrors,
  type ConfigFragment,
  type LoadConfigOptions,
} from './loader';
