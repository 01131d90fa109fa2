/**
 * Configuration and option types for the ucitap CLIs
 */

/**
 * What happens to the engine's stderr
 */
export type EngineStderr = 'ignore' | 'inherit';

/**
 * Which info lines become records
 */
export type EmitPolicy = 'every-pv' | 'bestmove';

/**
 * FEN style in the converter output
 */
export type FenFormat = 'full' | 'epd';

/**
 * Tap configuration, read from the config file and environment
 */
export interface TapConfig {
  /** Engine executable path */
  engine: string;
  /** Log file path, appended to */
  logfile: string;
  /** Extra arguments for the engine */
  engineArgs: string[];
  engineStderr: EngineStderr;
  /** Milliseconds the engine gets to exit after the GUI closes its input */
  shutdownGraceMs: number;
}

/**
 * Options for `ucitap`
 */
export interface TapCliOptions {
  config?: string;
}

/**
 * Options for `ucitap2json`
 */
export interface ConvertCliOptions {
  /** Tap log to replay */
  log: string;
  /** Output path, or `-` for stdout (default: `<log stem>.json`) */
  output?: string;
  /** Gzip the output */
  compress: boolean;
  emit: EmitPolicy;
  fen: FenFormat;
  noColor?: boolean;
  quiet?: boolean;
}
