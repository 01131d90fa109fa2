/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { TapConfig } from './schema.js';

export const engineStderrSchema = z.enum(['ignore', 'inherit']);

export const emitPolicySchema = z.enum(['every-pv', 'bestmove']);

export const fenFormatSchema = z.enum(['full', 'epd']);

/**
 * Complete tap configuration schema
 */
export const tapConfigSchema = z.object({
  engine: z.string().min(1),
  logfile: z.string().min(1),
  engineArgs: z.array(z.string()),
  engineStderr: engineStderrSchema,
  shutdownGraceMs: z.number().int().min(0).max(60000),
});

/**
 * Schema for config file contents (all fields optional)
 */
export const partialTapConfigSchema = tapConfigSchema.partial();

export type PartialTapConfig = z.infer<typeof partialTapConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Set "engine" and "logfile" in config.json or pass another file with --config',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): TapConfig {
  const result = tapConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate config file contents
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialTapConfig {
  const result = partialTapConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
