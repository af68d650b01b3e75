import {
  parseDebug,
  parseGo,
  parseIsReady,
  parsePosition,
  parseQuit,
  parseSetOption,
  parseStop,
  parseUci,
  parseUciNewGame,
} from '../parser/index.js';
import type {
  GoCommandPayload,
  PositionCommandPayload,
  SetOptionCommandPayload,
} from '../parser/index.js';

import { classify } from './command-type.js';
import { tokenize } from './tokenizer.js';

/**
 * A parsed driver command, keyed by its type
 */
export type Command =
  | { readonly type: 'uci' }
  | { readonly type: 'debug'; readonly enabled: boolean }
  | { readonly type: 'isready' }
  | { readonly type: 'setoption'; readonly payload: SetOptionCommandPayload }
  | { readonly type: 'ucinewgame' }
  | { readonly type: 'position'; readonly payload: PositionCommandPayload }
  | { readonly type: 'go'; readonly payload: GoCommandPayload }
  | { readonly type: 'stop' }
  | { readonly type: 'quit' };

/**
 * Parse an already tokenized command
 *
 * @returns the parsed command, or undefined if the verb is not recognized
 * @throws ParsingError if the verb is recognized but the command is malformed
 */
export function parseTokens(tokens: readonly string[]): Command | undefined {
  const type = classify(tokens);

  switch (type) {
    case undefined:
      return undefined;
    case 'uci':
      parseUci(tokens);
      return { type };
    case 'debug':
      return { type, enabled: parseDebug(tokens) };
    case 'isready':
      parseIsReady(tokens);
      return { type };
    case 'setoption':
      return { type, payload: parseSetOption(tokens) };
    case 'ucinewgame':
      parseUciNewGame(tokens);
      return { type };
    case 'position':
      return { type, payload: parsePosition(tokens) };
    case 'go':
      return { type, payload: parseGo(tokens) };
    case 'stop':
      parseStop(tokens);
      return { type };
    case 'quit':
      parseQuit(tokens);
      return { type };
  }
}

/**
 * Tokenize, classify and parse one input line
 *
 * @example
 * parseCommand('go movetime 1000');
 * // => { type: 'go', payload: { movetime: 1000n, infinite: false } }
 */
export function parseCommand(line: string): Command | undefined {
  return parseTokens(tokenize(line));
}
