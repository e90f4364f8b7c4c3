/**
 * Configuration Schema Definition
 *
 * TypeScript interfaces and Zod schemas for runtime validation of the bus
 * client configuration.
 */

import { z } from 'zod';

/**
 * Bus Configuration
 */
export interface BusConfig {
  /**
   * Address of the bus to connect to. Falls back to the session bus
   * address from the environment when unset.
   *
   * @default undefined
   * @example "unix:path=/run/user/1000/bus"
   */
  address?: string;
}

/**
 * Call Configuration
 *
 * Controls the call façade's reply expectations.
 */
export interface CallConfig {
  /**
   * Milliseconds a call waits for its reply before failing with NoReply.
   * null disables the timeout.
   *
   * @default 25000
   * @example 5000
   */
  defaultTimeoutMs: number | null;
}

/**
 * Reactor Configuration
 */
export interface ReactorConfig {
  /**
   * Poll timeout used by the polling reactor when no timer is armed.
   *
   * @default 4000
   * @minimum 1
   */
  defaultPollTimeoutMs: number;
}

/**
 * Dispatch Configuration
 */
export interface DispatchConfig {
  /**
   * What to do with a method call no handler chain matched:
   * - "reply": answer with org.freedesktop.DBus.Error.UnknownMethod
   * - "ignore": send nothing and let the caller time out
   *
   * @default "reply"
   */
  unknownMethod: 'reply' | 'ignore';
}

/**
 * Logging Configuration
 */
export interface LoggingConfig {
  /**
   * @default "info"
   * @example "debug"
   */
  level: 'debug' | 'info' | 'warn' | 'error';

  /**
   * Disable colored console output.
   *
   * @default false
   */
  noColor: boolean;
}

/**
 * Complete client configuration
 */
export interface BuslinkConfig {
  bus: BusConfig;
  calls: CallConfig;
  reactor: ReactorConfig;
  dispatch: DispatchConfig;
  logging: LoggingConfig;
}

/**
 * Zod Schema for Bus Configuration
 */
export const BusConfigSchema = z.object({
  address: z.string().min(1, { message: 'bus address must be a non-empty string' }).optional(),
});

/**
 * Zod Schema for Call Configuration
 */
export const CallConfigSchema = z.object({
  defaultTimeoutMs: z
    .number()
    .int()
    .positive({ message: 'defaultTimeoutMs must be a positive integer or null' })
    .nullable(),
});

/**
 * Zod Schema for Reactor Configuration
 */
export const ReactorConfigSchema = z.object({
  defaultPollTimeoutMs: z.number().int().positive({
    message: 'defaultPollTimeoutMs must be a positive integer',
  }),
});

/**
 * Zod Schema for Dispatch Configuration
 */
export const DispatchConfigSchema = z.object({
  unknownMethod: z.enum(['reply', 'ignore']),
});

/**
 * Zod Schema for Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']),
  noColor: z.boolean(),
});

/**
 * Complete Configuration Schema
 */
export const BuslinkConfigSchema = z.object({
  bus: BusConfigSchema,
  calls: CallConfigSchema,
  reactor: ReactorConfigSchema,
  dispatch: DispatchConfigSchema,
  logging: LoggingConfigSchema,
});

export type ValidatedBuslinkConfig = z.infer<typeof BuslinkConfigSchema>;
