/**
 * Command parsers, one per command type
 */

export {
  parseSingleToken,
  parseUci,
  parseIsReady,
  parseUciNewGame,
  parseStop,
  parseQuit,
} from './single-token.js';
export { parseDebug } from './debug-parser.js';
export { parseSetOption } from './setoption-parser.js';
export type { SetOptionCommandPayload } from './setoption-parser.js';
export { MAX_U64, parseGo } from './go-parser.js';
export type { GoCommandPayload } from './go-parser.js';
export { parsePosition } from './position-parser.js';
export type { PositionCommandPayload } from './position-parser.js';
export { STARTING_FEN, isValidFen, isValidMove } from './grammar.js';
