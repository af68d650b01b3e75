import { Chess } from 'chess.js';

import type { PositionCommandPayload } from '@knightline/uci';

import { IllegalMoveError, InvalidFenError } from './errors.js';

/**
 * Result of replaying a `position` command on a board
 */
export interface ReplayResult {
  /** Position after all moves were played */
  fen: string;
  /** The moves in Standard Algebraic Notation */
  san: string[];
}

/**
 * Split a long algebraic move into chess.js move fields
 *
 * Promotion letters are accepted in either case on the wire; chess.js
 * expects lowercase.
 */
function toMoveFields(move: string): { from: string; to: string; promotion?: string } {
  const from = move.slice(0, 2);
  const to = move.slice(2, 4);
  const promotion = move.slice(4, 5).toLowerCase();
  return promotion ? { from, to, promotion } : { from, to };
}

/**
 * Play the moves of a parsed `position` command on a chess.js board
 *
 * @throws InvalidFenError if the board rejects the FEN
 * @throws IllegalMoveError if a move is not legal in its position
 */
export function replayPosition(payload: PositionCommandPayload): ReplayResult {
  let chess: Chess;
  try {
    chess = new Chess(payload.fen);
  } catch {
    throw new InvalidFenError(payload.fen);
  }

  const san: string[] = [];
  for (const move of payload.moves) {
    const fenBefore = chess.fen();
    try {
      san.push(chess.move(toMoveFields(move)).san);
    } catch {
      // chess.js throws Error for illegal moves, wrap in our custom error
      throw new IllegalMoveError(move, fenBefore);
    }
  }

  return { fen: chess.fen(), san };
}
