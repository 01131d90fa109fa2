/**
 * Tap command implementation
 */

import { runProxy, type ProxyOptions } from '@ucitap/proxy';

import { loadConfig, type LoadConfigOptions } from '../config/loader.js';
import type { TapCliOptions } from '../config/schema.js';

export type TapRunOverrides = LoadConfigOptions & Pick<ProxyOptions, 'input' | 'output' | 'spawnEngine'>;

/**
 * Load the configuration and run one proxy session
 * @returns the engine's exit status
 */
export async function runTap(
  options: TapCliOptions,
  overrides: TapRunOverrides = {},
): Promise<number> {
  const { cwd, env, ...streams } = overrides;
  const loadOptions: LoadConfigOptions = {};
  if (cwd !== undefined) loadOptions.cwd = cwd;
  if (env !== undefined) loadOptions.env = env;

  const config = await loadConfig(options, loadOptions);

  return runProxy({
    ...streams,
    engine: config.engine,
    engineArgs: config.engineArgs,
    logfile: config.logfile,
    engineStderr: config.engineStderr,
    shutdownGraceMs: config.shutdownGraceMs,
  });
}

/**
 * Main tap command handler
 *
 * Prints nothing: stdout carries the engine's output to the GUI.
 */
export async function tapCommand(options: TapCliOptions): Promise<void> {
  process.exitCode = await runTap(options);
}
