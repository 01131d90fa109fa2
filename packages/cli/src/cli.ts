/**
 * CLI definitions using Commander.js
 */

import { Command } from 'commander';
import type { ZodEnum } from 'zod';

import type { ConvertCliOptions, TapCliOptions } from './config/schema.js';
import { emitPolicySchema, fenFormatSchema } from './config/validation.js';
import { OptionError } from './errors/cli-errors.js';

export const VERSION = '0.1.0';

/**
 * Emit policy descriptions for help text
 */
const EMIT_HELP = `Which info lines become records:
    every-pv - Every info line carrying a PV [default]
    bestmove - The last main-line PV before each bestmove`;

/**
 * FEN format descriptions for help text
 */
const FEN_HELP = `FEN style in the output:
    full - All six fields [default]
    epd  - Placement, side to move, castling, en passant`;

/**
 * Create the `ucitap` program
 */
export function createTapProgram(): Command {
  return new Command()
    .name('ucitap')
    .description(
      'Run a UCI engine behind a transparent tap that logs both directions of the conversation',
    )
    .version(VERSION)
    .option('-c, --config <file>', 'Path to config file (default: search the working directory)')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { tapCommand } = await import('./commands/tap.js');
      await tapCommand(parseTapOptions(options));
    });
}

/**
 * Create the `ucitap2json` program
 */
export function createConvertProgram(): Command {
  return new Command()
    .name('ucitap2json')
    .description('Replay a ucitap log and write the analysed positions as JSON')
    .version(VERSION)
    .requiredOption('-l, --log <file>', 'Tap log to replay')
    .option('-o, --output <file>', 'Output file, or - for stdout (default: <log name>.json)')
    .option('-c, --compress', 'Compress the output with gzip (<log name>.json.gz)')
    .option('--emit <policy>', EMIT_HELP, 'every-pv')
    .option('--fen <format>', FEN_HELP, 'full')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('-q, --quiet', 'Suppress progress output')
    .action(async (options: Record<string, unknown>) => {
      const { convertCommand } = await import('./commands/convert.js');
      await convertCommand(options);
    });
}

function parseChoice<T extends [string, ...string[]]>(
  option: string,
  schema: ZodEnum<T>,
  value: unknown,
): T[number] {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new OptionError(
      option,
      `expected one of ${schema.options.join(', ')}, got "${String(value)}"`,
    );
  }
  return parsed.data;
}

/**
 * Parse `ucitap` options from the command options object
 */
export function parseTapOptions(options: Record<string, unknown>): TapCliOptions {
  const result: TapCliOptions = {};

  const config = options['config'];
  if (typeof config === 'string') result.config = config;

  return result;
}

/**
 * Parse `ucitap2json` options from the command options object
 */
export function parseConvertOptions(options: Record<string, unknown>): ConvertCliOptions {
  const log = options['log'];
  if (typeof log !== 'string' || log === '') {
    throw new OptionError('--log', 'a log file is required');
  }

  const result: ConvertCliOptions = {
    log,
    compress: options['compress'] === true,
    emit: parseChoice('--emit', emitPolicySchema, options['emit'] ?? 'every-pv'),
    fen: parseChoice('--fen', fenFormatSchema, options['fen'] ?? 'full'),
  };

  const output = options['output'];
  if (typeof output === 'string') result.output = output;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;
  if (options['quiet'] === true) result.quiet = true;

  return result;
}
