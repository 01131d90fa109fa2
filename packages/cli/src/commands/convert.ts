/**
 * Convert command implementation
 */

import { constants, createReadStream } from 'node:fs';
import { access, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import * as readline from 'node:readline';
import type { Writable } from 'node:stream';
import { promisify } from 'node:util';
import { gzip } from 'node:zlib';

import { replayStream, serializeRecords, type ReplayResult } from '@ucitap/core';

import { VERSION, parseConvertOptions } from '../cli.js';
import type { ConvertCliOptions } from '../config/schema.js';
import { InputError, OutputError, resolveAbsolutePath } from '../errors/index.js';
import { formatCount, formatFileSize } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

const gzipAsync = promisify(gzip);

/** `-o -` writes to stdout */
export const STDOUT_PATH = '-';

export interface ConvertContext {
  reporter?: ProgressReporter;
  /** Directory the default output file is placed in (default: process.cwd()) */
  cwd?: string;
  /** Destination for `-o -` (default: process.stdout) */
  stdout?: Writable;
}

export interface ConvertResult extends ReplayResult {
  /** Absolute output path, or `-` for stdout */
  outputPath: string;
  bytesWritten: number;
}

/**
 * Default output file: the log's file name stem with `.json`, or
 * `.json.gz` when compressing
 */
export function defaultOutputPath(
  logPath: string,
  compress: boolean,
  cwd: string = process.cwd(),
): string {
  const stem = path.parse(logPath).name;
  return path.join(cwd, `${stem}.json${compress ? '.gz' : ''}`);
}

async function openLog(logPath: string): Promise<readline.Interface> {
  try {
    await access(logPath, constants.R_OK);
  } catch {
    throw new InputError(
      `Log file not found or not readable: ${resolveAbsolutePath(logPath)}`,
      'Check the --log path and try again',
    );
  }

  return readline.createInterface({
    input: createReadStream(logPath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });
}

function writeToStream(stream: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (error) => (error ? reject(error) : resolve()));
  });
}

async function writeOutput(
  data: Buffer,
  outputPath: string,
  stdout: Writable,
): Promise<void> {
  try {
    if (outputPath === STDOUT_PATH) {
      await writeToStream(stdout, data);
    } else {
      await writeFile(outputPath, data);
    }
  } catch (error) {
    throw new OutputError(
      `Failed to write output: ${outputPath === STDOUT_PATH ? 'stdout' : outputPath}`,
      error instanceof Error ? error.message : 'unknown error',
    );
  }
}

/**
 * Replay a tap log and write its records as JSON
 */
export async function convertLog(
  options: ConvertCliOptions,
  context: ConvertContext = {},
): Promise<ConvertResult> {
  const reporter = context.reporter ?? new ProgressReporter({ silent: true });
  const outputPath =
    options.output === undefined
      ? defaultOutputPath(options.log, options.compress, context.cwd)
      : options.output === STDOUT_PATH
        ? STDOUT_PATH
        : resolveAbsolutePath(options.output);

  const lines = await openLog(options.log);

  reporter.startStep(`Parsing UCI log: ${options.log}`);
  let result: ReplayResult;
  try {
    result = await replayStream(lines, {
      emit: options.emit,
      fen: options.fen,
      onProgress: (stats) => reporter.updateReplay(stats),
    });
  } catch (error) {
    reporter.failStep('Parsing failed');
    throw new InputError(
      `Failed to read log file: ${options.log}`,
      error instanceof Error ? error.message : undefined,
    );
  } finally {
    lines.close();
  }
  reporter.completeStep(
    `Parsed ${formatCount(result.stats.linesRead)} lines, ${formatCount(result.records.length)} records`,
  );

  const json = Buffer.from(serializeRecords(result.records), 'utf-8');
  const data = options.compress ? await gzipAsync(json) : json;

  reporter.startStep(`Writing ${outputPath === STDOUT_PATH ? 'stdout' : outputPath}`);
  try {
    await writeOutput(data, outputPath, context.stdout ?? process.stdout);
  } catch (error) {
    reporter.failStep('Write failed');
    throw error;
  }
  reporter.completeStep(`Wrote ${formatFileSize(data.length)}`);

  return { ...result, outputPath, bytesWritten: data.length };
}

/**
 * Main convert command handler
 */
export async function convertCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseConvertOptions(rawOptions);
  const reporter = new ProgressReporter({
    color: !options.noColor,
    silent: options.quiet ?? false,
  });

  try {
    reporter.printHeader('ucitap2json', VERSION);
    const result = await convertLog(options, { reporter });
    reporter.printSummary(result.stats, result.outputPath === STDOUT_PATH ? 'stdout' : result.outputPath);
  } finally {
    reporter.stop();
  }
}
