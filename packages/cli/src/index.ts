/**
 * @ucitap/cli - command-line front ends for the tap and the converter
 */

export {
  VERSION,
  createTapProgram,
  createConvertProgram,
  parseTapOptions,
  parseConvertOptions,
} from './cli.js';

export { runTap, tapCommand, type TapRunOverrides } from './commands/tap.js';
export {
  convertLog,
  convertCommand,
  defaultOutputPath,
  STDOUT_PATH,
  type ConvertContext,
  type ConvertResult,
} from './commands/convert.js';

export * from './config/index.js';
export * from './errors/index.js';
export * from './progress/index.js';
