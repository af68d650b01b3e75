/**
 * Single message commands
 */

import { buildBestMoveMsg, buildReadyOkMsg, isValidMove } from '@knightline/uci';

import { InputError, handleError } from '../errors/index.js';
import { Reporter } from '../output/reporter.js';

/**
 * Render `bestmove <move>` after checking the move notation
 *
 * @throws InputError if the move is not in long algebraic notation
 */
export function renderBestMove(move: string): string {
  if (!isValidMove(move)) {
    throw new InputError(
      `Not a move in long algebraic notation: ${move}`,
      'Use from-square and to-square with an optional promotion piece, e.g. e2e4 or e7e8q',
    );
  }
  return buildBestMoveMsg(move);
}

/**
 * Bestmove command handler
 */
export function bestMoveCommand(move: string): void {
  try {
    new Reporter().result(renderBestMove(move));
  } catch (error) {
    handleError(error);
  }
}

/**
 * Ready command handler
 */
export function readyCommand(): void {
  new Reporter().result(buildReadyOkMsg());
}
