/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress progress output; the summary still reports desynced and skipped counts */
  silent?: boolean;
  /** Use colored output (default: true) */
  color?: boolean;
}
