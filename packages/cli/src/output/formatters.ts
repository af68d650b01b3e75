/**
 * Formatting of inspection results
 */

import type { AnyParsingError, Command } from '@knightline/uci';

import type { ReplayResult } from '../replay/position-replay.js';

/**
 * Render a parsed command as `type key=value ...`
 *
 * @example
 * formatCommand({ type: 'go', payload: { movetime: 500n, infinite: false } });
 * // => 'go movetime=500 infinite=false'
 */
export function formatCommand(command: Command): string {
  switch (command.type) {
    case 'uci':
    case 'isready':
    case 'ucinewgame':
    case 'stop':
    case 'quit':
      return command.type;
    case 'debug':
      return `debug enabled=${command.enabled}`;
    case 'setoption':
      return `setoption name=${JSON.stringify(command.payload.name)} value=${JSON.stringify(command.payload.value)}`;
    case 'go':
      return `go movetime=${command.payload.movetime} infinite=${command.payload.infinite}`;
    case 'position':
      return `position fen=${JSON.stringify(command.payload.fen)} moves=[${command.payload.moves.join(' ')}]`;
  }
}

/**
 * Render a parse failure with its line number
 */
export function formatParsingError(lineNumber: number, error: AnyParsingError): string {
  return `line ${lineNumber}: ${error.message}`;
}

/**
 * Render a replayed position
 */
export function formatReplay(replay: ReplayResult): string {
  const line = replay.san.length > 0 ? replay.san.join(' ') : '(no moves)';
  return `  => ${replay.fen} after ${line}`;
}

/**
 * JSON record for one inspected line
 */
export type JsonRecord =
  | {
      line: number;
      status: 'parsed';
      command: Command;
      replay?: ReplayResult;
      replayError?: string;
    }
  | { line: number; status: 'failed'; error: { kind: string; message: string } }
  | { line: number; status: 'ignored'; verb: string };

/**
 * Render one JSON record on a single line
 *
 * Bigints (such as `go` movetime) are written as decimal strings.
 */
export function formatJsonRecord(record: JsonRecord): string {
  return JSON.stringify(record, (_key: string, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
}
