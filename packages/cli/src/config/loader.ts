/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, KnightlineConfig } from './schema.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
  type PartialKnightlineConfig,
} from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, string> = {
  // Engine
  KNIGHTLINE_ENGINE_NAME: 'engine.name',
  KNIGHTLINE_ENGINE_AUTHOR: 'engine.author',

  // Output
  KNIGHTLINE_FORMAT: 'output.format',
  KNIGHTLINE_COLOR: 'output.color',

  // Inspection
  KNIGHTLINE_REPLAY: 'inspect.replayMoves',
  KNIGHTLINE_REPORT_UNKNOWN: 'inspect.reportUnknown',
  KNIGHTLINE_STRICT: 'inspect.strict',
};

/** Config paths holding booleans */
const BOOLEAN_PATHS = new Set([
  'output.color',
  'inspect.replayMoves',
  'inspect.reportUnknown',
  'inspect.strict',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep clone a configuration
 */
function cloneConfig(config: KnightlineConfig): KnightlineConfig {
  return {
    engine: { ...config.engine, options: config.engine.options.map((option) => ({ ...option })) },
    output: { ...config.output },
    inspect: { ...config.inspect },
  };
}

/**
 * Deep merge a partial configuration into a complete one
 * Source values override target values; engine options are replaced as a whole
 */
function deepMerge(target: KnightlineConfig, source: PartialKnightlineConfig): KnightlineConfig {
  const result = cloneConfig(target);

  if (source.engine) {
    result.engine = { ...result.engine, ...source.engine };
  }

  if (source.output) {
    result.output = { ...result.output, ...source.output };
  }

  if (source.inspect) {
    result.inspect = { ...result.inspect, ...source.inspect };
  }

  return result;
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastPart] = value;
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, path: string): unknown {
  if (BOOLEAN_PATHS.has(path)) {
    return value.toLowerCase() === 'true' || value === '1';
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialKnightlineConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Returns null when no config file is found. A file that exists but cannot
 * be read or does not validate is an error.
 */
async function loadConfigFile(configPath?: string): Promise<PartialKnightlineConfig | null> {
  const explorer = cosmiconfig('knightline', {
    searchPlaces: [
      'package.json',
      '.knightlinerc',
      '.knightlinerc.json',
      '.knightlinerc.yaml',
      '.knightlinerc.yml',
      'knightline.config.js',
      'knightline.config.cjs',
    ],
  });

  const pending = configPath ? explorer.load(configPath) : explorer.search();
  const result = await pending.catch((error: unknown) => {
    throw new ConfigError(
      `Failed to load config file${configPath ? `: ${configPath}` : ''}`,
      error instanceof Error ? error.message : String(error),
    );
  });

  if (!result || result.isEmpty) {
    return null;
  }

  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialKnightlineConfig {
  const config: PartialKnightlineConfig = {};

  if (options.format !== undefined) {
    config.output = { ...config.output, format: options.format };
  }

  if (options.noColor) {
    config.output = { ...config.output, color: false };
  }

  if (options.replay !== undefined) {
    config.inspect = { ...config.inspect, replayMoves: options.replay };
  }

  if (options.reportUnknown !== undefined) {
    config.inspect = { ...config.inspect, reportUnknown: options.reportUnknown };
  }

  if (options.strict !== undefined) {
    config.inspect = { ...config.inspect, strict: options.strict };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<KnightlineConfig> {
  let config = cloneConfig(DEFAULT_CONFIG);

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: KnightlineConfig): string {
  return JSON.stringify(config, null, 2);
}

export { ConfigValidationError };
