/**
 * Default configuration values
 */

import type { TapConfig } from './schema.js';

/**
 * Defaults for the optional tap settings; `engine` and `logfile` have none
 */
export const DEFAULT_TAP_CONFIG: Omit<TapConfig, 'engine' | 'logfile'> = {
  engineArgs: [],
  engineStderr: 'ignore',
  shutdownGraceMs: 1000,
};
