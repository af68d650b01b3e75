/**
 * Configuration schema types for the Knightline CLI
 */

/**
 * How inspection results are printed
 */
export type OutputFormat = 'text' | 'json';

/**
 * Engine option announced during the handshake
 *
 * Mirrors the option kinds of the protocol; `name` becomes the option id.
 */
export type EngineOptionConfig =
  | { type: 'check'; name: string; default: boolean }
  | { type: 'spin'; name: string; default: number; min: number; max: number }
  | { type: 'combo'; name: string; default: string; vars: string[] }
  | { type: 'button'; name: string }
  | { type: 'string'; name: string; default: string };

/**
 * Engine identity and options
 */
export interface EngineConfigSchema {
  /** Sent as `id name` */
  name: string;
  /** Sent as `id author` */
  author: string;
  /** Sent as one `option` line each, in order */
  options: EngineOptionConfig[];
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  format: OutputFormat;
  color: boolean;
}

/**
 * Transcript inspection configuration
 */
export interface InspectConfigSchema {
  /** Replay `position` moves on a board and print the resulting FEN */
  replayMoves: boolean;
  /** Report lines whose verb is not a known command instead of skipping them */
  reportUnknown: boolean;
  /** Stop at the first malformed command */
  strict: boolean;
}

/**
 * Complete configuration
 */
export interface KnightlineConfig {
  engine: EngineConfigSchema;
  output: OutputConfigSchema;
  inspect: InspectConfigSchema;
}

/**
 * Options accepted on the command line
 */
export interface CliOptions {
  input?: string;
  config?: string;
  format?: OutputFormat;
  replay?: boolean;
  reportUnknown?: boolean;
  strict?: boolean;
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  showConfig?: boolean;
}
