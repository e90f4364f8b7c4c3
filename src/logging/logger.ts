/**
 * Logging Infrastructure
 *
 * Process-wide winston logger used for handler failures, reactor lifecycle
 * and dropped replies:
 * - Levels error, warn, info, debug
 * - Colored console output unless noColor is set
 * - Level and color taken from the logging section of the configuration
 *   when the embedding application does not call initLogger()
 */

import winston from 'winston';
import chalk from 'chalk';
import { getConfig } from '../config';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  verbose?: boolean;
}

/**
 * Console line format: `[time] LEVEL [scope]: message`
 */
const consoleFormat = (noColor: boolean) => winston.format.printf(({ level, message, timestamp, scope }) => {
  const scopeText = typeof scope === 'string' ? ` [${scope}]` : '';

  if (noColor) {
    return `[${timestamp}] ${level.toUpperCase()}${scopeText}: ${message}`;
  }

  const colorMap: Record<string, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.blue,
    debug: chalk.gray,
  };

  const colorFn = colorMap[level] || ((text: string) => text);
  const levelText = colorFn(level.toUpperCase());
  const timeText = chalk.gray(`[${timestamp}]`);

  return `${timeText} ${levelText}${chalk.cyan(scopeText)}: ${message}`;
});

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const {
    level = 'info',
    noColor = false,
    verbose = false,
  } = options;

  const effectiveLevel = verbose ? 'debug' : level;

  return winston.createLogger({
    level: effectiveLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.errors({ stack: true }),
    ),
    transports: [
      new winston.transports.Console({
        format: consoleFormat(noColor),
      }),
    ],
  });
}

// Process-wide sink, initialized once by the embedding application
let globalLogger: winston.Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions = {}): winston.Logger {
  globalLogger = createLogger(options);
  return globalLogger;
}

/**
 * Get the global logger instance, creating one from the loaded
 * configuration on first use
 */
export function getLogger(): winston.Logger {
  if (!globalLogger) {
    const { level, noColor } = getConfig().logging;
    globalLogger = createLogger({ level, noColor });
  }
  return globalLogger;
}

/**
 * Drop the global logger so the next getLogger() rebuilds it. Useful for testing.
 */
export function resetLogger(): void {
  globalLogger = null;
}

/**
 * Child logger tagged with a scope (e.g. "reactor", "dispatch")
 */
export function scopedLogger(scope: string): winston.Logger {
  return getLogger().child({ scope });
}

export const log = {
  error: (message: string, ...args: unknown[]) => getLogger().error(message, ...args),
  warn: (message: string, ...args: unknown[]) => getLogger().warn(message, ...args),
  info: (message: string, ...args: unknown[]) => getLogger().info(message, ...args),
  debug: (message: string, ...args: unknown[]) => getLogger().debug(message, ...args),
};
