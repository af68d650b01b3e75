/**
 * Console reporter for CLI output
 *
 * Results go to stdout so they can be piped; diagnostics go to stderr.
 */

import chalk from 'chalk';

import type { ColorFunctions, InspectionStats, ReporterOptions } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Reporter for CLI output
 */
export class Reporter {
  private readonly silent: boolean;
  private readonly verbose: boolean;
  private readonly debugEnabled: boolean;

  readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.debugEnabled = options.debug ?? false;
    // debug implies verbose
    this.verbose = options.verbose ?? this.debugEnabled;
    this.c = createColorFns(options.color ?? true);
  }

  /**
   * Print a result line to stdout
   */
  result(text: string): void {
    console.log(text);
  }

  /**
   * Print an informational message
   */
  info(message: string): void {
    if (this.silent) return;
    console.error(this.c.dim(message));
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    if (this.silent) return;
    console.error(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Display an error message
   */
  error(message: string): void {
    console.error(this.c.red(`✗ ${message}`));
  }

  /**
   * Print a message only in verbose mode
   */
  detail(message: string): void {
    if (this.silent || !this.verbose) return;
    console.error(this.c.dim(message));
  }

  /**
   * Print a message only in debug mode
   */
  debug(message: string): void {
    if (!this.debugEnabled) return;
    console.error(`${this.c.cyan('[debug]')} ${message}`);
  }

  /**
   * Print the inspection summary
   */
  summary(stats: InspectionStats): void {
    if (this.silent) return;

    const parts = [
      `${stats.total} lines`,
      this.c.green(`${stats.parsed} parsed`),
      `${stats.ignored} ignored`,
      stats.failed > 0 ? this.c.red(`${stats.failed} failed`) : `${stats.failed} failed`,
    ];
    if (stats.replayFailures > 0) {
      parts.push(this.c.yellow(`${stats.replayFailures} not replayable`));
    }

    console.error('');
    console.error(this.c.bold('Summary: ') + parts.join(', '));
  }
}
