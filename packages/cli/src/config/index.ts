/**
 * Configuration module exports
 */

// Schema types
export type {
  OutputFormat,
  EngineOptionConfig,
  EngineConfigSchema,
  OutputConfigSchema,
  InspectConfigSchema,
  KnightlineConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_INSPECT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  engineOptionSchema,
  outputFormatSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';
export type { PartialKnightlineConfig } from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, formatConfig } from './loader.js';
