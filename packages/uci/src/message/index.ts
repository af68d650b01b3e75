/**
 * Message builders, one per outgoing message kind
 */

export {
  buildNameMsg,
  buildAuthorMsg,
  buildUciOkMsg,
  buildReadyOkMsg,
  buildBestMoveMsg,
} from './simple-messages.js';
export { buildInfoMsg } from './info-message.js';
export type { MoveInfo, MoveInfoKind, Score } from './info-message.js';
export {
  buildOptionMsg,
  createCheckOption,
  createSpinOption,
  createComboOption,
  createButtonOption,
  createStringOption,
} from './option-message.js';
export type { OptionMsg, OptionType } from './option-message.js';
