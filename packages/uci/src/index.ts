/**
 * @knightline/uci - UCI protocol codec
 *
 * This package handles:
 * - Tokenizing and classifying driver command lines
 * - Parsing the nine driver commands into typed payloads
 * - Building engine messages (id, option, info, bestmove, ...)
 *
 * It performs no I/O and keeps no state; transport and engine behaviour
 * belong to the caller.
 */

export const VERSION = '0.1.0';

// Tokenizing and classification
export { tokenize } from './command/tokenizer.js';
export { classify, isCommandType, COMMAND_TYPES } from './command/command-type.js';
export type { CommandType } from './command/command-type.js';
export { parseCommand, parseTokens } from './command/command.js';
export type { Command } from './command/command.js';

// Command parsers
export {
  parseSingleToken,
  parseUci,
  parseIsReady,
  parseUciNewGame,
  parseStop,
  parseQuit,
  parseDebug,
  parseSetOption,
  parseGo,
  MAX_U64,
  parsePosition,
  STARTING_FEN,
  isValidFen,
  isValidMove,
} from './parser/index.js';
export type {
  SetOptionCommandPayload,
  GoCommandPayload,
  PositionCommandPayload,
} from './parser/index.js';

// Message builders
export {
  buildNameMsg,
  buildAuthorMsg,
  buildUciOkMsg,
  buildReadyOkMsg,
  buildBestMoveMsg,
  buildInfoMsg,
  buildOptionMsg,
  createCheckOption,
  createSpinOption,
  createComboOption,
  createButtonOption,
  createStringOption,
} from './message/index.js';
export type { MoveInfo, MoveInfoKind, Score, OptionMsg, OptionType } from './message/index.js';

// Error types
export {
  ParsingError,
  InvalidCommandTypeError,
  InvalidLengthError,
  UnknownTokenError,
  UNBOUNDED_LENGTH,
  isParsingError,
} from './errors.js';
export type { AnyParsingError, ParsingErrorKind } from './errors.js';
