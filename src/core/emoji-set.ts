import { DEFAULT_EMOJIS } from '../constants/gitmojis.js';
import type { EmojiSet } from '../types/common.js';

/**
 * Builds the accepted emoji set: the built-in GitMoji glyphs followed by
 * `extraEmojis`, without empty strings and keeping the first occurrence of
 * each duplicate. Order is significant: the matcher tries emojis in this order.
 */
export const resolveEmojiSet = (
  extraEmojis: readonly string[] = [],
  builtIn: EmojiSet = DEFAULT_EMOJIS
): EmojiSet => {
  const seen = new Set<string>();
  const resolved: string[] = [];

  for (const emoji of [...builtIn, ...extraEmojis]) {
    if (emoji.length === 0 || seen.has(emoji)) continue;
    seen.add(emoji);
    resolved.push(emoji);
  }

  return Object.freeze(resolved);
};
