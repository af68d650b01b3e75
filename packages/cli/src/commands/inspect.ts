/**
 * Inspect command implementation
 */

import * as fs from 'node:fs';
import * as readline from 'node:readline';
import type { Readable } from 'node:stream';

import { parseCliOptions } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { InputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { TranscriptInspector } from '../inspect/inspector.js';
import { Reporter } from '../output/reporter.js';
import type { InspectionStats } from '../output/types.js';

/**
 * Open the transcript from a file or stdin
 */
function openInput(inputPath: string | undefined): Readable {
  if (inputPath) {
    const absolutePath = resolveAbsolutePath(inputPath);
    if (!fs.existsSync(absolutePath)) {
      throw new InputError(
        `Input file not found: ${absolutePath}`,
        'Check the file path and try again',
      );
    }
    return fs.createReadStream(absolutePath, { encoding: 'utf-8' });
  }

  // Check if stdin is a TTY (no piped input)
  if (process.stdin.isTTY) {
    throw new InputError(
      'No input provided',
      'Provide a transcript with --input or pipe command lines to stdin',
    );
  }
  return process.stdin;
}

/**
 * Feed every line of a stream to the inspector
 */
export async function inspectStream(
  input: Readable,
  inspector: TranscriptInspector,
): Promise<InspectionStats> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      inspector.handle(line);
    }
  } finally {
    rl.close();
  }

  return inspector.getStats();
}

/**
 * Main inspect command handler
 */
export async function inspectCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfig(config));
      return;
    }

    const reporter = new Reporter({
      silent: options.quiet ?? false,
      color: config.output.color,
      verbose: options.verbose ?? false,
      debug: options.debug ?? false,
    });
    const inspector = new TranscriptInspector(
      { ...config.inspect, format: config.output.format },
      reporter,
    );

    const input = openInput(options.input);
    reporter.info(
      `Inspecting ${options.input ? resolveAbsolutePath(options.input) : 'stdin'}`,
    );
    const stats = await inspectStream(input, inspector);
    reporter.summary(stats);
  } catch (error) {
    handleError(error);
  }
}
