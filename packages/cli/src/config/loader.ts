/**
 * Configuration loading from files and environment variables
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_TAP_CONFIG } from './defaults.js';
import type { TapCliOptions, TapConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialTapConfig } from './validation.js';

export const CONFIG_SEARCH_PLACES = [
  'config.json',
  '.ucitaprc',
  '.ucitaprc.json',
  '.ucitaprc.yaml',
  'ucitap.config.json',
];

/**
 * Environment variable mapping
 * Maps env var names to config keys
 */
const ENV_VAR_MAP = {
  UCITAP_ENGINE: 'engine',
  UCITAP_LOGFILE: 'logfile',
  UCITAP_SHUTDOWN_GRACE_MS: 'shutdownGraceMs',
} as const satisfies Record<string, keyof TapConfig>;

export interface LoadConfigOptions {
  /** Directory searched for a config file (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from environment variables
 *
 * Values are passed through as strings except for numeric keys, so that
 * validation reports a bad number instead of silently dropping it.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envVar, key] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value === undefined || value === '') continue;
    config[key] = key === 'shutdownGraceMs' ? Number(value) : value;
  }

  return config;
}

/**
 * Load configuration from a config file using cosmiconfig
 * @returns null when searching found no file
 * @throws ConfigError if an explicit file is missing or any file cannot be parsed
 */
export async function loadConfigFile(
  configPath: string | undefined,
  cwd: string = process.cwd(),
): Promise<PartialTapConfig | null> {
  const explorer = cosmiconfig('ucitap', { searchPlaces: CONFIG_SEARCH_PLACES });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(cwd);
  } catch (error) {
    const where = configPath ? resolveAbsolutePath(configPath) : cwd;
    throw new ConfigError(
      `Cannot read configuration from ${where}${error instanceof Error ? `: ${error.message}` : ''}`,
      'Check that the file exists and contains valid JSON or YAML',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. Environment variables
 * 2. Config file
 * 3. Default values
 */
export async function loadConfig(
  cliOptions: TapCliOptions,
  options: LoadConfigOptions = {},
): Promise<TapConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config, options.cwd);
  const envConfig = loadEnvConfig(options.env);

  return validateConfig({
    ...DEFAULT_TAP_CONFIG,
    ...fileConfig,
    ...envConfig,
  });
}
