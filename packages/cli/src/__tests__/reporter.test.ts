/**
 * Progress reporter tests
 */

import { createReplayStats } from '@ucitap/core';
import { describe, it, expect, vi, afterEach } from 'vitest';

import { ProgressReporter } from '../progress/reporter.js';

describe('ProgressReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const stats = { ...createReplayStats(), linesRead: 20, recordsEmitted: 4, desyncedPvs: 2 };

  it('should print the problem counts even when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ProgressReporter({ silent: true, color: false }).printSummary(stats, 'out.json');

    expect(error.mock.calls).toEqual([['Desynced PVs: 2, skipped info lines: 0']]);
  });

  it('should print the full summary otherwise', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ProgressReporter({ color: false }).printSummary(stats, 'out.json');

    const printed = error.mock.calls.map(([line]) => String(line));
    expect(printed.slice(0, 7)).toEqual([
      '',
      'Summary:',
      '  Lines read: 20',
      '  Records written: 4',
      '  Desynced PVs: 2',
      '  Skipped info lines: 0',
      '  Output: out.json',
    ]);
    expect(printed[7]).toBe('  Total time: 0ms');
  });

  it('should print nothing else when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const reporter = new ProgressReporter({ silent: true });
    reporter.printHeader('ucitap2json', '0.1.0');
    reporter.startStep('Parsing');
    reporter.completeStep('Parsed');

    expect(error).not.toHaveBeenCalled();
  });
});
