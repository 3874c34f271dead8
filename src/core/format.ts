import { getSubjectLine, isExemptCommit } from './commit-message.js';
import { resolveEmojiSet } from './emoji-set.js';
import {
  FailureReason,
  MatchMode,
  type EmojiSet,
  type ValidationVerdict,
} from '../types/common.js';

const LEADING_WHITESPACE = /^\s/;

type PrefixMatch =
  | { kind: 'match'; emoji: string; description: string }
  | { kind: 'bare' } // emoji present, but no separated description after it
  | { kind: 'none' };

const matchEmojiPrefix = (line: string, emoji: string): PrefixMatch => {
  if (!line.startsWith(emoji)) return { kind: 'none' };

  const rest = line.slice(emoji.length);
  const description = rest.trim();
  if (!LEADING_WHITESPACE.test(rest) || description.length === 0) return { kind: 'bare' };

  return { kind: 'match', emoji, description };
};

/**
 * Checks the subject line of `message` against `<emoji> <description>`.
 *
 * Emojis are tried in `emojiSet` order and the first one followed by
 * whitespace and a description wins. The body is not inspected. In lenient
 * mode autosquash (`fixup!`, `squash!`, `amend!`) and `Merge` commits pass
 * without an emoji.
 */
export const validate = (
  message: string,
  emojiSet: EmojiSet,
  mode: MatchMode = MatchMode.LENIENT
): ValidationVerdict => {
  const subject = getSubjectLine(message);

  if (mode === MatchMode.LENIENT && isExemptCommit(subject)) {
    return { matched: true, emoji: '', description: '' };
  }

  let reason: FailureReason = FailureReason.NO_EMOJI_PREFIX;

  for (const emoji of emojiSet) {
    const result = matchEmojiPrefix(subject, emoji);
    if (result.kind === 'match') {
      return { matched: true, emoji: result.emoji, description: result.description };
    }
    if (result.kind === 'bare') reason = FailureReason.EMPTY_DESCRIPTION;
  }

  return { matched: false, reason };
};

/**
 * Returns true if `message` follows Customized Conventional Commits
 * formatting, accepting the built-in GitMoji set plus `emojis`.
 */
export const isCustomizedConventional = (message: string, emojis: readonly string[] = []): boolean =>
  validate(message, resolveEmojiSet(emojis), MatchMode.LENIENT).matched;
