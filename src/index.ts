export { resolveEmojiSet } from './core/emoji-set.js';
export { validate, isCustomizedConventional } from './core/format.js';
export {
  cleanCommitMessage,
  getSubjectLine,
  hasAutosquashPrefix,
  isMergeCommit,
} from './core/commit-message.js';
export { main, RESULT_SUCCESS, RESULT_FAIL } from './core/hook.js';
export { GITMOJIS, DEFAULT_EMOJIS } from './constants/gitmojis.js';
export { MatchMode, FailureReason } from './types/common.js';

export type * from './types/common.js';
