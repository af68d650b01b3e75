/**
 * Error thrown when a FEN string is rejected by the board
 */
export class InvalidFenError extends Error {
  constructor(public readonly fen: string) {
    super(`Invalid FEN: ${fen}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(
    public readonly move: string,
    public readonly fen: string,
  ) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}
