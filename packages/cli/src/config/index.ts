/**
 * Configuration module exports
 */

export type {
  TapConfig,
  TapCliOptions,
  ConvertCliOptions,
  EngineStderr,
  EmitPolicy,
  FenFormat,
} from './schema.js';

export { DEFAULT_TAP_CONFIG } from './defaults.js';

export {
  tapConfigSchema,
  partialTapConfigSchema,
  engineStderrSchema,
  emitPolicySchema,
  fenFormatSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialTapConfig,
} from './validation.js';

export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  CONFIG_SEARCH_PLACES,
  type LoadConfigOptions,
} from './loader.js';
