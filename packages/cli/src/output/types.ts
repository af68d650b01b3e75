/**
 * Shared output types
 */

/**
 * Color functions for terminal output
 */
export interface ColorFunctions {
  bold: (text: string) => string;
  dim: (text: string) => string;
  green: (text: string) => string;
  red: (text: string) => string;
  yellow: (text: string) => string;
  cyan: (text: string) => string;
}

/**
 * Reporter options
 */
export interface ReporterOptions {
  /** Suppress diagnostics (results are still printed) */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print a line for every input line, including skipped ones */
  verbose?: boolean;
  /** Print tokens and classification for every input line (implies verbose) */
  debug?: boolean;
}

/**
 * Counts reported at the end of an inspection
 */
export interface InspectionStats {
  total: number;
  parsed: number;
  ignored: number;
  failed: number;
  /** Position commands whose moves could not be replayed */
  replayFailures: number;
}
