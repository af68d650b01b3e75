import {
  InvalidCommandTypeError,
  InvalidLengthError,
  UnknownTokenError,
  UNBOUNDED_LENGTH,
} from '../errors.js';

/**
 * Payload of a `go` command
 */
export interface GoCommandPayload {
  /** Search time in milliseconds, 0n when not given */
  readonly movetime: bigint;
  /** Search until `stop` is received */
  readonly infinite: boolean;
}

const UNSIGNED_INTEGER = /^\+?\d+$/;

/** Largest unsigned 64-bit value */
export const MAX_U64 = 0xffffffffffffffffn;

/**
 * Parse an unsigned 64-bit integer argument
 *
 * Returns undefined for anything with a sign other than "+", any non-digit,
 * or a value above 2^64 - 1.
 */
function parseUnsigned(token: string): bigint | undefined {
  if (!UNSIGNED_INTEGER.test(token)) {
    return undefined;
  }
  const value = BigInt(token.replace(/^\+/, ''));
  return value <= MAX_U64 ? value : undefined;
}

/**
 * Parse a `go [movetime <ms>] [infinite]` command
 *
 * Only `movetime` and `infinite` are recognized. Any other keyword, including
 * the remaining protocol search limits, is rejected.
 *
 * @throws ParsingError if the command is malformed
 */
export function parseGo(tokens: readonly string[]): GoCommandPayload {
  const [command] = tokens;
  if (tokens.length < 2 || command === undefined) {
    throw new InvalidLengthError(2, UNBOUNDED_LENGTH, tokens.length);
  }

  if (command !== 'go') {
    throw new InvalidCommandTypeError('go', command);
  }

  let movetime = 0n;
  let infinite = false;

  for (let i = 1; i < tokens.length; i++) {
    const keyword = tokens[i];
    if (keyword === undefined) break;

    switch (keyword) {
      case 'movetime': {
        const argument = tokens[++i];
        if (argument === undefined) {
          throw new UnknownTokenError(keyword);
        }
        const parsed = parseUnsigned(argument);
        if (parsed === undefined) {
          throw new UnknownTokenError(argument);
        }
        movetime = parsed;
        break;
      }
      case 'infinite':
        infinite = true;
        break;
      default:
        throw new UnknownTokenError(keyword);
    }
  }

  return { movetime, infinite };
}
