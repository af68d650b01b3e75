/**
 * Default configuration values
 */

import type {
  EngineConfigSchema,
  InspectConfigSchema,
  KnightlineConfig,
  OutputConfigSchema,
} from './schema.js';

/**
 * Default engine identity, announced by `knightline handshake`
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfigSchema = {
  name: 'Knightline 0.1.0',
  author: 'The Knightline developers',
  options: [
    { type: 'spin', name: 'Hash', default: 16, min: 1, max: 1024 },
    { type: 'check', name: 'Ponder', default: false },
    { type: 'button', name: 'Clear Hash' },
  ],
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  format: 'text',
  color: true,
};

/**
 * Default inspection configuration
 */
export const DEFAULT_INSPECT_CONFIG: InspectConfigSchema = {
  replayMoves: false,
  reportUnknown: false,
  strict: false,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: KnightlineConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
  inspect: DEFAULT_INSPECT_CONFIG,
};
