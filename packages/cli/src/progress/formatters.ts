/**
 * Output formatting utilities
 */

import type { ReplayStats } from '@ucitap/core';

/**
 * Format a count with thousands separators
 */
export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Summary rows for a finished replay, as label/value pairs
 *
 * Desynced and skipped counts are always listed; the other problem
 * counters only when non-zero.
 */
export function replaySummaryRows(stats: ReplayStats): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ['Lines read', formatCount(stats.linesRead)],
    ['Records written', formatCount(stats.recordsEmitted)],
    ['Desynced PVs', formatCount(stats.desyncedPvs)],
    ['Skipped info lines', formatCount(stats.skippedInfoLines)],
  ];

  const optional: Array<[string, number]> = [
    ['Invalid positions', stats.invalidPositions],
    ['Unrecognized lines', stats.unrecognizedLines],
  ];
  for (const [label, count] of optional) {
    if (count > 0) rows.push([label, formatCount(count)]);
  }

  return rows;
}

/**
 * One-line desync report, printed even in quiet mode
 */
export function formatProblemCounts(stats: ReplayStats): string {
  return `Desynced PVs: ${formatCount(stats.desyncedPvs)}, skipped info lines: ${formatCount(stats.skippedInfoLines)}`;
}
