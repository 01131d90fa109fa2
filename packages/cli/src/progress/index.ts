/**
 * Progress module exports
 */

export { ProgressReporter, type ProgressReporterOptions } from './reporter.js';
export {
  formatCount,
  formatDuration,
  formatFileSize,
  formatProblemCounts,
  replaySummaryRows,
} from './formatters.js';
export type { ColorFn, ColorFunctions } from './types.js';
