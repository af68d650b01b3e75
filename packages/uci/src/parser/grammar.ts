/**
 * Notation grammars shared by the position parser
 */

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

// placement, side to move, castling, en passant, half-move clock, full-move number
const FEN_PATTERN =
  /^(([pnbrqkPNBRQK1-8]{1,8})\/?){8}\s+(b|w)\s+(-|K?Q?k?q)\s+(-|[a-h][3-6])\s+(\d+)\s+(\d+)\s*$/;

const MOVE_PATTERN = /^[a-h][1-8][a-h][1-8][rnbqRNBQ]?$/;

/**
 * Check a FEN string against the notation grammar
 *
 * Only the textual shape is checked; whether the position is reachable or
 * legal is up to the board implementation.
 */
export function isValidFen(fen: string): boolean {
  return FEN_PATTERN.test(fen);
}

/**
 * Check a move in long algebraic notation (e.g. "e2e4", "e7e8q")
 */
export function isValidMove(move: string): boolean {
  return MOVE_PATTERN.test(move);
}
