import { InvalidCommandTypeError, InvalidLengthError } from '../errors.js';

/**
 * Validate a command made of exactly one literal token
 *
 * @throws InvalidLengthError if there is not exactly one token
 * @throws InvalidCommandTypeError if the token differs from `literal`
 */
export function parseSingleToken(tokens: readonly string[], literal: string): void {
  const [first] = tokens;
  if (tokens.length !== 1 || first === undefined) {
    throw new InvalidLengthError(1, 1, tokens.length);
  }

  if (first !== literal) {
    throw new InvalidCommandTypeError(literal, first);
  }
}

/** Parse a `uci` command */
export function parseUci(tokens: readonly string[]): void {
  parseSingleToken(tokens, 'uci');
}

/** Parse an `isready` command */
export function parseIsReady(tokens: readonly string[]): void {
  parseSingleToken(tokens, 'isready');
}

/** Parse a `ucinewgame` command */
export function parseUciNewGame(tokens: readonly string[]): void {
  parseSingleToken(tokens, 'ucinewgame');
}

/** Parse a `stop` command */
export function parseStop(tokens: readonly string[]): void {
  parseSingleToken(tokens, 'stop');
}

/** Parse a `quit` command */
export function parseQuit(tokens: readonly string[]): void {
  parseSingleToken(tokens, 'quit');
}
