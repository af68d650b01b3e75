/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';

import type { CliOptions } from './config/schema.js';
import { outputFormatSchema } from './config/validation.js';
import { InputError } from './errors/cli-errors.js';

export const VERSION = '0.1.0';

/**
 * Inspection help text
 */
const INSPECT_HELP = `Parse a transcript of driver commands, one per line.
    Recognized commands are printed with their payload, malformed ones as errors.
    Lines with an unknown verb are skipped unless --report-unknown is given.`;

/**
 * Output format descriptions for help text
 */
const FORMAT_HELP = `Output format:
    text - One readable line per command [default]
    json - One JSON record per command`;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('knightline')
    .description('UCI protocol toolkit - inspect driver commands and render engine messages')
    .version(VERSION);

  program
    .command('inspect')
    .description(INSPECT_HELP)
    .option('-i, --input <file>', 'Transcript file (default: stdin)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-f, --format <format>', FORMAT_HELP)
    .option('--replay', 'Replay position moves on a board and print the resulting FEN')
    .option('--report-unknown', 'Report lines whose verb is not a known command')
    .option('--strict', 'Stop at the first malformed command (exit code 2)')
    .option('--verbose', 'Also report skipped lines')
    .option('--debug', 'Print tokens and classification for every line')
    .option('-q, --quiet', 'Only print results, no warnings or summary')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      const { inspectCommand } = await import('./commands/inspect.js');
      await inspectCommand(options);
    });

  program
    .command('handshake')
    .description('Print the reply to `uci`: id name, id author, options and uciok')
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .action(async (options: Record<string, unknown>) => {
      const { handshakeCommand } = await import('./commands/handshake.js');
      await handshakeCommand(options);
    });

  program
    .command('bestmove')
    .description('Print a bestmove message')
    .argument('<move>', 'Move in long algebraic notation, e.g. e2e4')
    .action(async (move: string) => {
      const { bestMoveCommand } = await import('./commands/messages.js');
      bestMoveCommand(move);
    });

  program
    .command('ready')
    .description('Print the reply to `isready`')
    .action(async () => {
      const { readyCommand } = await import('./commands/messages.js');
      readyCommand();
    });

  return program;
}

function readString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function readBoolean(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 *
 * @throws InputError if --format is not a known format
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = readString(options, 'input');
  if (input !== undefined) result.input = input;
  const config = readString(options, 'config');
  if (config !== undefined) result.config = config;

  const format = readString(options, 'format');
  if (format !== undefined) {
    const parsed = outputFormatSchema.safeParse(format);
    if (!parsed.success) {
      throw new InputError(`Unknown output format: ${format}`, 'Use --format text or --format json');
    }
    result.format = parsed.data;
  }

  const replay = readBoolean(options, 'replay');
  if (replay !== undefined) result.replay = replay;
  const reportUnknown = readBoolean(options, 'reportUnknown');
  if (reportUnknown !== undefined) result.reportUnknown = reportUnknown;
  const strict = readBoolean(options, 'strict');
  if (strict !== undefined) result.strict = strict;
  const verbose = readBoolean(options, 'verbose');
  if (verbose !== undefined) result.verbose = verbose;
  const debug = readBoolean(options, 'debug');
  if (debug !== undefined) result.debug = debug;
  const quiet = readBoolean(options, 'quiet');
  if (quiet !== undefined) result.quiet = quiet;
  const showConfig = readBoolean(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
