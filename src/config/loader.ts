/**
 * Configuration File Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Project-local config (.buslink/config.yml)
 * 3. Global user config (~/.buslink/config.yml)
 * 4. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { BuslinkConfigSchema, type BuslinkConfig } from './schema';
import { DEFAULT_CONFIG } from './defaults';

/**
 * Loosely-typed configuration fragment, as read from YAML or the environment
 */
export type ConfigFragment = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Directory holding the project-local .buslink/ (default: process.cwd()) */
  cwd?: string;
  /** Home directory holding the global .buslink/ (default: os.homedir()) */
  homeDir?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_DIR = '.buslink';
export const CONFIG_FILE = 'config.yml';

/**
 * Cached configuration to avoid repeated file system access
 */
let cachedConfig: BuslinkConfig | null = null;

/**
 * Load and merge configuration from all sources.
 *
 * @returns Complete configuration with all required fields
 * @throws {Error} If configuration validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): BuslinkConfig {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;

  let config: ConfigFragment = deepClone(toFragment(DEFAULT_CONFIG));

  const globalConfig = loadConfigFile(path.join(homeDir, CONFIG_DIR, CONFIG_FILE));
  if (globalConfig) {
    config = deepMerge(config, globalConfig);
  }

  const projectConfig = loadConfigFile(path.join(cwd, CONFIG_DIR, CONFIG_FILE));
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  const envConfig = loadEnvironmentConfig(env);
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  try {
    const validated = BuslinkConfigSchema.parse(config);
    cachedConfig = validated;
    return validated;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatValidationErrors(error));
    }
    throw error;
  }
}

/**
 * Get cached configuration or load if not cached.
 */
export function getConfig(): BuslinkConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  return loadConfig();
}

/**
 * Reload configuration, clearing cache and re-reading all sources.
 */
export function reloadConfig(options: LoadConfigOptions = {}): BuslinkConfig {
  cachedConfig = null;
  return loadConfig(options);
}

/**
 * Clear cached configuration. Useful for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Parsed configuration object or null if the file doesn't exist or is empty
 * @throws {Error} If YAML parsing fails or the document is not a mapping
 */
export function loadConfigFile(filePath: string): ConfigFragment | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new Error(
        `YAML parsing error in ${filePath}:\n` +
          `  Line ${error.mark?.line ?? '?'}: ${error.message}`
      );
    }
    throw error;
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return null;
  }

  if (!isFragment(parsed)) {
    throw new Error(`Invalid configuration file: ${filePath} - expected object`);
  }

  return parsed;
}

/**
 * Load configuration from environment variables:
 * - BUSLINK_BUS_ADDRESS (or DBUS_SESSION_BUS_ADDRESS)
 * - BUSLINK_CALL_TIMEOUT_MS ("none" disables the timeout)
 * - BUSLINK_POLL_TIMEOUT_MS
 * - BUSLINK_UNKNOWN_METHOD
 * - BUSLINK_LOG_LEVEL
 * - BUSLINK_NO_COLOR
 *
 * @returns Partial configuration, or null if no variable is set
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): ConfigFragment | null {
  const bus: ConfigFragment = {};
  const calls: ConfigFragment = {};
  const reactor: ConfigFragment = {};
  const dispatch: ConfigFragment = {};
  const logging: ConfigFragment = {};

  const address = env.BUSLINK_BUS_ADDRESS ?? env.DBUS_SESSION_BUS_ADDRESS;
  if (address) {
    bus.address = address;
  }

  if (env.BUSLINK_CALL_TIMEOUT_MS) {
    calls.defaultTimeoutMs =
      env.BUSLINK_CALL_TIMEOUT_MS === 'none' ? null : parseInteger(env.BUSLINK_CALL_TIMEOUT_MS);
  }

  if (env.BUSLINK_POLL_TIMEOUT_MS) {
    reactor.defaultPollTimeoutMs = parseInteger(env.BUSLINK_POLL_TIMEOUT_MS);
  }

  if (env.BUSLINK_UNKNOWN_METHOD) {
    dispatch.unknownMethod = env.BUSLINK_UNKNOWN_METHOD;
  }

  if (env.BUSLINK_LOG_LEVEL) {
    logging.level = env.BUSLINK_LOG_LEVEL;
  }
  if (env.BUSLINK_NO_COLOR !== undefined) {
    logging.noColor = env.BUSLINK_NO_COLOR === 'true';
  }

  const config: ConfigFragment = {};
  for (const [key, section] of Object.entries({ bus, calls, reactor, dispatch, logging })) {
    if (Object.keys(section).length > 0) {
      config[key] = section;
    }
  }

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Primitive values in source override target
 * - undefined in source is skipped; null overrides
 */
export function deepMerge(target: ConfigFragment, source: ConfigFragment): ConfigFragment {
  const result: ConfigFragment = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isFragment(sourceValue) && isFragment(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Deep clone a JSON-compatible fragment.
 */
export function deepClone(fragment: ConfigFragment): ConfigFragment {
  const cloned: unknown = JSON.parse(JSON.stringify(fragment));
  return isFragment(cloned) ? cloned : {};
}

/**
 * Format Zod validation errors into human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((issue) => {
    const issuePath = issue.path.join('.');
    return `  • ${issuePath}: ${issue.message}`;
  });

  return `Configuration validation failed:\n${errors.join('\n')}`;
}

/**
 * Validate a configuration file without loading it.
 */
export function validateConfigFile(filePath: string): { valid: boolean; errors?: string } {
  try {
    const fragment = loadConfigFile(filePath);
    if (!fragment) {
      return { valid: false, errors: 'Configuration file not found' };
    }

    BuslinkConfigSchema.parse(deepMerge(toFragment(DEFAULT_CONFIG), fragment));
    return { valid: true };
  } catch (error) {
    if (error instanceof ZodError) {
      return { valid: false, errors: formatValidationErrors(error) };
    }
    if (error instanceof Error) {
      return { valid: false, errors: error.message };
    }
    return { valid: false, errors: 'Unknown validation error' };
  }
}

function isFragment(value: unknown): value is ConfigFragment {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFragment(config: BuslinkConfig): ConfigFragment {
  return { ...config };
}

function parseInteger(value: string): number | string {
  const parsed = Number(value);
  // Leave unparseable values as strings so validation names the field
  return Number.isInteger(parsed) ? parsed : value;
}
