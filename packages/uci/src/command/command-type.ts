/**
 * Command types a driver can send to the engine
 */
export type CommandType =
  | 'uci'
  | 'debug'
  | 'isready'
  | 'setoption'
  | 'ucinewgame'
  | 'position'
  | 'go'
  | 'stop'
  | 'quit';

/**
 * All command types, in protocol order
 */
export const COMMAND_TYPES: readonly CommandType[] = [
  'uci',
  'debug',
  'isready',
  'setoption',
  'ucinewgame',
  'position',
  'go',
  'stop',
  'quit',
];

const COMMAND_TYPE_SET: ReadonlySet<string> = new Set(COMMAND_TYPES);

/**
 * Check whether a token is one of the known command literals
 */
export function isCommandType(token: string): token is CommandType {
  return COMMAND_TYPE_SET.has(token);
}

/**
 * Determine the command type from the first token
 *
 * Returns undefined for an empty token list or an unknown verb. Unknown
 * verbs are not an error: callers are expected to ignore them.
 */
export function classify(tokens: readonly string[]): CommandType | undefined {
  const first = tokens[0];
  if (first === undefined) {
    return undefined;
  }
  return isCommandType(first) ? first : undefined;
}
