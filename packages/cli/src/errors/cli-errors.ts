/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

import type { AnyParsingError } from '@knightline/uci';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Malformed command line in strict inspection mode
 */
export class ProtocolError extends CliError {
  constructor(
    public readonly lineNumber: number,
    public readonly parsingError: AnyParsingError,
  ) {
    super(parsingError.message, 'Run without --strict to report every malformed line', 2);
    this.name = 'ProtocolError';
  }

  override format(): string {
    const lines = [
      `Protocol Error (line ${this.lineNumber}, ${this.parsingError.kind}): ${this.message}`,
    ];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}
