/**
 * Progress reporter with ora spinners
 *
 * Everything goes to stderr so that JSON written to stdout stays clean.
 */

import type { ReplayStats } from '@ucitap/core';
import chalk from 'chalk';
import ora, { type Ora, type Color } from 'ora';

import {
  formatCount,
  formatDuration,
  formatProblemCounts,
  replaySummaryRows,
} from './formatters.js';
import type { ColorFunctions, ProgressReporterOptions } from './types.js';

export type { ProgressReporterOptions } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Progress reporter for the converter
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(name: string, version: string): void {
    if (this.silent) return;
    console.error(this.c.bold(`${name} v${version}`));
    console.error('');
  }

  /**
   * Start a spinner step
   */
  startStep(text: string): void {
    if (this.startTime === 0) this.startTime = Date.now();
    if (this.silent) return;

    this.spinner?.stop();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; stream: NodeJS.WriteStream; color?: Color } = {
      text,
      prefixText: ' ',
      stream: process.stderr,
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Show the running line count while replaying
   */
  updateReplay(stats: ReplayStats): void {
    if (this.silent || !this.spinner) return;
    this.spinner.text = `Parsing log... ${formatCount(stats.linesRead)} lines`;
  }

  /**
   * Complete the current step successfully
   */
  completeStep(text: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      console.error(` ${this.c.green('✓')} ${text}`);
    }
  }

  /**
   * Fail the current step
   */
  failStep(error: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.fail(error);
      this.spinner = null;
    } else {
      console.error(` ${this.c.red('✗')} ${error}`);
    }
  }

  /**
   * Print the final summary
   *
   * Silent mode still reports the desynced and skipped counts.
   */
  printSummary(stats: ReplayStats, outputLocation: string): void {
    if (this.silent) {
      console.error(formatProblemCounts(stats));
      return;
    }

    const totalTime = this.startTime === 0 ? 0 : Date.now() - this.startTime;

    console.error('');
    console.error(this.c.bold('Summary:'));
    for (const [label, value] of replaySummaryRows(stats)) {
      const isProblem = label !== 'Lines read' && label !== 'Records written' && value !== '0';
      console.error(`  ${label}: ${isProblem ? this.c.yellow(value) : value}`);
    }
    console.error(`  Output: ${this.c.cyan(outputLocation)}`);
    console.error(`  Total time: ${formatDuration(totalTime)}`);
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
