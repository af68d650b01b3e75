/**
 * Transcript inspection: parse command lines one at a time and report the
 * outcome of each
 */

import {
  classify,
  isParsingError,
  parseTokens,
  tokenize,
  type AnyParsingError,
  type Command,
} from '@knightline/uci';

import type { InspectConfigSchema, OutputFormat } from '../config/schema.js';
import { ProtocolError } from '../errors/cli-errors.js';
import {
  formatCommand,
  formatJsonRecord,
  formatParsingError,
  formatReplay,
} from '../output/formatters.js';
import type { Reporter } from '../output/reporter.js';
import type { InspectionStats } from '../output/types.js';
import { IllegalMoveError, InvalidFenError } from '../replay/errors.js';
import { replayPosition, type ReplayResult } from '../replay/position-replay.js';

/**
 * Outcome of inspecting one line
 */
export type LineOutcome =
  | {
      status: 'parsed';
      lineNumber: number;
      command: Command;
      replay?: ReplayResult;
      replayError?: string;
    }
  | { status: 'failed'; lineNumber: number; error: AnyParsingError }
  /** Blank line (verb undefined) or a verb that is not a known command */
  | { status: 'ignored'; lineNumber: number; verb: string | undefined };

export interface InspectorOptions extends InspectConfigSchema {
  format: OutputFormat;
}

/**
 * Replay a position command, turning board rejections into a message
 */
function tryReplay(command: Command): Pick<
  Extract<LineOutcome, { status: 'parsed' }>,
  'replay' | 'replayError'
> {
  if (command.type !== 'position') {
    return {};
  }
  try {
    return { replay: replayPosition(command.payload) };
  } catch (error) {
    if (error instanceof IllegalMoveError || error instanceof InvalidFenError) {
      return { replayError: error.message };
    }
    throw error;
  }
}

/**
 * Parse one tokenized line into an outcome
 *
 * Parsing errors become a `failed` outcome; anything else propagates.
 */
export function inspectTokens(
  tokens: readonly string[],
  lineNumber: number,
  replayMoves: boolean,
): LineOutcome {
  let command: Command | undefined;
  try {
    command = parseTokens(tokens);
  } catch (error) {
    if (isParsingError(error)) {
      return { status: 'failed', lineNumber, error };
    }
    throw error;
  }

  if (command === undefined) {
    return { status: 'ignored', lineNumber, verb: tokens[0] };
  }

  return {
    status: 'parsed',
    lineNumber,
    command,
    ...(replayMoves ? tryReplay(command) : {}),
  };
}

/**
 * Stateful inspector over a transcript, one line at a time
 */
export class TranscriptInspector {
  private lineNumber = 0;
  private readonly stats: InspectionStats = {
    total: 0,
    parsed: 0,
    ignored: 0,
    failed: 0,
    replayFailures: 0,
  };

  constructor(
    private readonly options: InspectorOptions,
    private readonly reporter: Reporter,
  ) {}

  /**
   * Inspect the next line of the transcript
   *
   * @throws ProtocolError in strict mode when the line is malformed
   */
  handle(line: string): LineOutcome {
    this.lineNumber++;
    const tokens = tokenize(line);
    this.reporter.debug(
      `line ${this.lineNumber}: tokens=${JSON.stringify(tokens)} type=${classify(tokens) ?? 'none'}`,
    );

    const outcome = inspectTokens(tokens, this.lineNumber, this.options.replayMoves);
    this.record(outcome);

    if (outcome.status === 'failed' && this.options.strict) {
      throw new ProtocolError(outcome.lineNumber, outcome.error);
    }

    this.print(outcome);
    return outcome;
  }

  /**
   * Counts for all lines handled so far
   */
  getStats(): InspectionStats {
    return { ...this.stats };
  }

  private record(outcome: LineOutcome): void {
    this.stats.total++;
    switch (outcome.status) {
      case 'parsed':
        this.stats.parsed++;
        if (outcome.replayError !== undefined) this.stats.replayFailures++;
        break;
      case 'failed':
        this.stats.failed++;
        break;
      case 'ignored':
        this.stats.ignored++;
        break;
    }
  }

  private print(outcome: LineOutcome): void {
    if (this.options.format === 'json') {
      this.printJson(outcome);
    } else {
      this.printText(outcome);
    }
  }

  private printText(outcome: LineOutcome): void {
    const { lineNumber } = outcome;
    switch (outcome.status) {
      case 'parsed':
        this.reporter.result(`${lineNumber}: ${formatCommand(outcome.command)}`);
        if (outcome.replay) {
          this.reporter.result(formatReplay(outcome.replay));
        }
        if (outcome.replayError !== undefined) {
          this.reporter.warn(`line ${lineNumber}: ${outcome.replayError}`);
        }
        break;
      case 'failed':
        this.reporter.error(formatParsingError(lineNumber, outcome.error));
        break;
      case 'ignored':
        if (outcome.verb !== undefined && this.options.reportUnknown) {
          this.reporter.warn(`line ${lineNumber}: ignoring unknown command '${outcome.verb}'`);
        } else {
          this.reporter.detail(`line ${lineNumber}: skipped`);
        }
        break;
    }
  }

  private printJson(outcome: LineOutcome): void {
    const line = outcome.lineNumber;
    switch (outcome.status) {
      case 'parsed':
        this.reporter.result(
          formatJsonRecord({
            line,
            status: 'parsed',
            command: outcome.command,
            ...(outcome.replay ? { replay: outcome.replay } : {}),
            ...(outcome.replayError !== undefined ? { replayError: outcome.replayError } : {}),
          }),
        );
        break;
      case 'failed':
        this.reporter.result(
          formatJsonRecord({
            line,
            status: 'failed',
            error: { kind: outcome.error.kind, message: outcome.error.message },
          }),
        );
        break;
      case 'ignored':
        if (outcome.verb !== undefined && this.options.reportUnknown) {
          this.reporter.result(formatJsonRecord({ line, status: 'ignored', verb: outcome.verb }));
        }
        break;
    }
  }
}
