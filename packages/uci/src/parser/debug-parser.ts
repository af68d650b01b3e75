import { InvalidCommandTypeError, InvalidLengthError, UnknownTokenError } from '../errors.js';

/**
 * Parse a `debug on|off` command
 *
 * @returns true for "on", false for "off"
 * @throws ParsingError if the command is malformed
 */
export function parseDebug(tokens: readonly string[]): boolean {
  const [command, mode] = tokens;
  if (tokens.length !== 2 || command === undefined || mode === undefined) {
    throw new InvalidLengthError(2, 2, tokens.length);
  }

  if (command !== 'debug') {
    throw new InvalidCommandTypeError('debug', command);
  }

  switch (mode) {
    case 'on':
      return true;
    case 'off':
      return false;
    default:
      throw new UnknownTokenError(mode);
  }
}
