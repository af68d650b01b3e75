/**
 * Search score reported by the engine
 */
export type Score =
  /** Centipawns from the engine's point of view */
  | { readonly kind: 'cp'; readonly value: number }
  /** Moves (not plies) until mate; negative when the engine is getting mated */
  | { readonly kind: 'mate'; readonly value: number };

/**
 * One piece of search telemetry carried by an `info` message
 */
export type MoveInfo =
  | { readonly kind: 'depth'; readonly value: number }
  | { readonly kind: 'seldepth'; readonly value: number }
  | { readonly kind: 'time'; readonly value: number }
  | { readonly kind: 'nodes'; readonly value: number }
  | { readonly kind: 'pv'; readonly moves: readonly string[] }
  | {
      readonly kind: 'score';
      readonly score: Score;
      readonly lowerBound: boolean;
      readonly upperBound: boolean;
    }
  | { readonly kind: 'currmove'; readonly move: string }
  | { readonly kind: 'currmovenumber'; readonly value: number }
  | { readonly kind: 'hashfull'; readonly value: number }
  | { readonly kind: 'nps'; readonly value: number }
  | { readonly kind: 'tbhits'; readonly value: number }
  | { readonly kind: 'cpuload'; readonly value: number }
  | { readonly kind: 'custom'; readonly text: string }
  | { readonly kind: 'refutation'; readonly moves: readonly string[] }
  | { readonly kind: 'multipv'; readonly value: number }
  | { readonly kind: 'currline'; readonly task: number; readonly moves: readonly string[] };

export type MoveInfoKind = MoveInfo['kind'];

function formatScore(score: Score, lowerBound: boolean, upperBound: boolean): string {
  let fragment = ` score ${score.kind} ${score.value}`;
  if (lowerBound) fragment += ' lowerbound';
  if (upperBound) fragment += ' upperbound';
  return fragment;
}

type InPlaceMoveInfo = Exclude<MoveInfo, { kind: 'custom' }>;

function formatMoveInfo(info: InPlaceMoveInfo): string {
  switch (info.kind) {
    case 'depth':
    case 'seldepth':
    case 'time':
    case 'nodes':
    case 'currmovenumber':
    case 'hashfull':
    case 'nps':
    case 'tbhits':
    case 'cpuload':
    case 'multipv':
      return ` ${info.kind} ${info.value}`;
    case 'pv':
    case 'refutation':
      return ` ${info.kind} ${info.moves.join(' ')}`;
    case 'score':
      return formatScore(info.score, info.lowerBound, info.upperBound);
    case 'currmove':
      return ` currmove ${info.move}`;
    case 'currline':
      return ` currline ${info.task} ${info.moves.join(' ')}`;
  }
}

/**
 * Build an `info` message
 *
 * Entries are rendered in the order given. A `custom` entry is the exception:
 * its text is held back and emitted once as the trailing `string` fragment,
 * because the rest of the line after `string` is free text. If several
 * custom entries are given, the last one wins.
 */
export function buildInfoMsg(infos: readonly MoveInfo[]): string {
  let msg = 'info';
  let custom: string | undefined;

  for (const info of infos) {
    if (info.kind === 'custom') {
      custom = info.text;
      continue;
    }
    msg += formatMoveInfo(info);
  }

  if (custom !== undefined) {
    msg += ` string ${custom}`;
  }

  return msg;
}
