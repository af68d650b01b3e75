/**
 * Single-line messages with a fixed shape
 *
 * None of the returned strings carry a line terminator.
 */

/** Build `id name <name>` */
export function buildNameMsg(name: string): string {
  return `id name ${name}`;
}

/** Build `id author <author>` */
export function buildAuthorMsg(author: string): string {
  return `id author ${author}`;
}

/** Build `uciok`, the reply that ends the `uci` handshake */
export function buildUciOkMsg(): string {
  return 'uciok';
}

/** Build `readyok`, the reply to `isready` */
export function buildReadyOkMsg(): string {
  return 'readyok';
}

/** Build `bestmove <move>` */
export function buildBestMoveMsg(move: string): string {
  return `bestmove ${move}`;
}
