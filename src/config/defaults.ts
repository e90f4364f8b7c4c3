/**
 * Default Configuration Values
 */

import type { BuslinkConfig } from './schema';

/**
 * Defaults:
 * - 25s call timeout (the bus library's own default)
 * - 4s reactor poll bound when no timer is armed
 * - UnknownMethod replies for unmatched calls
 * - Info-level colored logging
 */
export const DEFAULT_CONFIG: BuslinkConfig = {
  bus: {
    address: undefined,
  },
  calls: {
    defaultTimeoutMs: 25000,
  },
  reactor: {
    defaultPollTimeoutMs: 4000,
  },
  dispatch: {
    unknownMethod: 'reply',
  },
  logging: {
    level: 'info',
    noColor: false,
  },
};
