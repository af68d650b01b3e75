import {
  InvalidCommandTypeError,
  InvalidLengthError,
  UnknownTokenError,
  UNBOUNDED_LENGTH,
} from '../errors.js';

/**
 * Payload of a `setoption` command
 */
export interface SetOptionCommandPayload {
  /** Option identifier as sent by the driver */
  readonly name: string;
  /** Option value, empty when the `value` segment was omitted */
  readonly value: string;
}

/**
 * Parse a `setoption name <id> [value <v>]` command
 *
 * Keywords may repeat; the last occurrence wins. Whether the option exists
 * is not checked here.
 *
 * @throws ParsingError if the command is malformed
 */
export function parseSetOption(tokens: readonly string[]): SetOptionCommandPayload {
  const [command] = tokens;
  if (tokens.length < 3 || command === undefined) {
    throw new InvalidLengthError(3, UNBOUNDED_LENGTH, tokens.length);
  }

  if (command !== 'setoption') {
    throw new InvalidCommandTypeError('setoption', command);
  }

  let name = '';
  let value = '';

  for (let i = 1; i < tokens.length; i++) {
    const keyword = tokens[i];
    if (keyword === undefined) break;

    if (keyword !== 'name' && keyword !== 'value') {
      throw new UnknownTokenError(keyword);
    }

    const argument = tokens[++i];
    if (argument === undefined) {
      throw new UnknownTokenError(keyword);
    }

    if (keyword === 'name') {
      name = argument;
    } else {
      value = argument;
    }
  }

  return { name, value };
}
