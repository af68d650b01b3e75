import {
  InvalidCommandTypeError,
  InvalidLengthError,
  UnknownTokenError,
  UNBOUNDED_LENGTH,
} from '../errors.js';

import { STARTING_FEN, isValidFen, isValidMove } from './grammar.js';

/**
 * Payload of a `position` command
 */
export interface PositionCommandPayload {
  /** Position to set up, `startpos` already expanded */
  readonly fen: string;
  /** Moves to play from that position, in long algebraic notation */
  readonly moves: readonly string[];
}

/** Number of tokens in a `fen <f1> ... <f6>` segment */
const FEN_SEGMENT_LENGTH = 7;

/**
 * Build the FEN candidate from the position segment
 */
function resolveFen(segment: readonly string[]): string {
  const [first] = segment;
  if (segment.length === 1 && first !== undefined) {
    return first === 'startpos' ? STARTING_FEN : first;
  }

  if (segment.length === FEN_SEGMENT_LENGTH) {
    // segment[0] is the "fen" keyword
    return segment.slice(1).join(' ');
  }

  throw new InvalidLengthError(FEN_SEGMENT_LENGTH, FEN_SEGMENT_LENGTH, segment.length);
}

/**
 * Parse a `position {startpos | fen <f1>..<f6>} [moves <m1> ...]` command
 *
 * The FEN grammar is applied to whatever candidate the position segment
 * produces, so a bare token other than `startpos` is rejected.
 *
 * @throws ParsingError if the command is malformed
 */
export function parsePosition(tokens: readonly string[]): PositionCommandPayload {
  const [command] = tokens;
  if (tokens.length < 2 || command === undefined) {
    throw new InvalidLengthError(2, UNBOUNDED_LENGTH, tokens.length);
  }

  if (command !== 'position') {
    throw new InvalidCommandTypeError('position', command);
  }

  const rest = tokens.slice(1);
  const movesIndex = rest.indexOf('moves');
  const positionSegment = movesIndex === -1 ? rest : rest.slice(0, movesIndex);
  const moves = movesIndex === -1 ? [] : rest.slice(movesIndex + 1);

  const fen = resolveFen(positionSegment);
  if (!isValidFen(fen)) {
    throw new UnknownTokenError(fen);
  }

  const invalidMove = moves.find((move) => !isValidMove(move));
  if (invalidMove !== undefined) {
    throw new UnknownTokenError(invalidMove);
  }

  return { fen, moves };
}
