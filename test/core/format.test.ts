import { describe, it, expect } from 'vitest';
import { isCustomizedConventional, validate } from '../../src/core/format.js';
import { resolveEmojiSet } from '../../src/core/emoji-set.js';
import { DEFAULT_EMOJIS } from '../../src/constants/gitmojis.js';
import { FailureReason, MatchMode } from '../../src/types/common.js';

const noEmoji = { matched: false, reason: FailureReason.NO_EMOJI_PREFIX };
const emptyDescription = { matched: false, reason: FailureReason.EMPTY_DESCRIPTION };
const exempt = { matched: true, emoji: '', description: '' };

describe('validate', () => {
  describe('emoji grammar', () => {
    it('rejects a message without an emoji', () => {
      expect(validate('add a new feature', DEFAULT_EMOJIS, MatchMode.LENIENT)).toEqual(noEmoji);
    });

    it('captures the emoji and description', () => {
      expect(validate('✨ Add a new feature', DEFAULT_EMOJIS, MatchMode.LENIENT)).toEqual({
        matched: true,
        emoji: '✨',
        description: 'Add a new feature',
      });
    });

    it('accepts every built-in emoji', () => {
      for (const emoji of DEFAULT_EMOJIS) {
        expect(validate(`${emoji} Update the parser`, DEFAULT_EMOJIS)).toEqual({
          matched: true,
          emoji,
          description: 'Update the parser',
        });
      }
    });

    it('trims the description and the message', () => {
      expect(validate('\n\n  ✨   Add a new feature  \n', DEFAULT_EMOJIS)).toEqual({
        matched: true,
        emoji: '✨',
        description: 'Add a new feature',
      });
    });

    it('accepts any whitespace as the separator', () => {
      expect(validate('🐛\tFix crash on start', DEFAULT_EMOJIS)).toEqual({
        matched: true,
        emoji: '🐛',
        description: 'Fix crash on start',
      });
    });

    it('reports a missing description after the emoji', () => {
      for (const mode of [MatchMode.LENIENT, MatchMode.STRICT]) {
        expect(validate('🔖 ', DEFAULT_EMOJIS, mode)).toEqual(emptyDescription);
        expect(validate('🔖', DEFAULT_EMOJIS, mode)).toEqual(emptyDescription);
      }
    });

    it('reports a missing description when no whitespace follows the emoji', () => {
      expect(validate('✨Add a new feature', DEFAULT_EMOJIS)).toEqual(emptyDescription);
    });

    it('requires the emoji at the start of the line', () => {
      expect(validate('Add ✨ feature', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('does not accept shortcodes', () => {
      expect(validate(':sparkles: Add a new feature', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('matches the exact glyph including variation selectors', () => {
      expect(validate('⚡️ Speed up startup', DEFAULT_EMOJIS)).toEqual({
        matched: true,
        emoji: '⚡️',
        description: 'Speed up startup',
      });
      expect(validate('\u26A1 Speed up startup', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('handles empty and whitespace-only messages', () => {
      expect(validate('', DEFAULT_EMOJIS)).toEqual(noEmoji);
      expect(validate('   \n\t\n', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('handles malformed strings', () => {
      expect(validate('\uD800 lone surrogate', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });
  });

  describe('body', () => {
    it('ignores the body', () => {
      expect(validate('✨ Add feature\n\nLonger body text.', DEFAULT_EMOJIS, MatchMode.LENIENT)).toEqual({
        matched: true,
        emoji: '✨',
        description: 'Add feature',
      });
      expect(validate('✨ Add feature\nbody without a blank line', DEFAULT_EMOJIS).matched).toBe(true);
      expect(validate('✨ Add feature\r\n\r\nBody\r\n', DEFAULT_EMOJIS)).toEqual({
        matched: true,
        emoji: '✨',
        description: 'Add feature',
      });
    });

    it('only looks at the first line for the emoji', () => {
      expect(validate('Add feature\n\n✨ Body', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('ignores git comments and the verbose diff', () => {
      const scissors = `# ${'-'.repeat(24)} >8 ${'-'.repeat(24)}`;
      const message = `# Please enter the commit message\n✨ Add feature\n\n${scissors}\ndiff --git a/x b/x\n`;

      expect(validate(message, DEFAULT_EMOJIS)).toEqual({
        matched: true,
        emoji: '✨',
        description: 'Add feature',
      });
      expect(validate(`${scissors}\n✨ Add feature\n`, DEFAULT_EMOJIS)).toEqual(noEmoji);
    });
  });

  describe('match modes', () => {
    const generated = [
      'fixup! broken commit',
      'squash! ✨ Add feature',
      'amend! ✨ Add feature',
      "Merge branch 'main' into feature",
      'Merge pull request #7 from someone/branch',
    ];

    it('exempts generated commits in lenient mode', () => {
      for (const message of generated) {
        expect(validate(message, DEFAULT_EMOJIS, MatchMode.LENIENT)).toEqual(exempt);
      }
    });

    it('defaults to lenient mode', () => {
      expect(validate('fixup! broken commit', DEFAULT_EMOJIS)).toEqual(exempt);
    });

    it('applies the emoji grammar to generated commits in strict mode', () => {
      for (const message of generated) {
        expect(validate(message, DEFAULT_EMOJIS, MatchMode.STRICT)).toEqual(noEmoji);
      }
    });

    it('matches the exemption prefixes case-sensitively', () => {
      expect(validate('merge branch main', DEFAULT_EMOJIS)).toEqual(noEmoji);
      expect(validate('FIXUP! broken commit', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('treats Merge as a plain prefix', () => {
      expect(validate('Merged feature branch', DEFAULT_EMOJIS, MatchMode.LENIENT)).toEqual(exempt);
      expect(validate('Mergeable queue entry', DEFAULT_EMOJIS, MatchMode.LENIENT)).toEqual(exempt);
      expect(validate('Merged feature branch', DEFAULT_EMOJIS, MatchMode.STRICT)).toEqual(noEmoji);
    });

    it('accepts regular commits in strict mode', () => {
      expect(validate('✨ Add feature', DEFAULT_EMOJIS, MatchMode.STRICT).matched).toBe(true);
    });
  });

  describe('emoji precedence', () => {
    it('takes the first emoji in set order that matches', () => {
      expect(validate('🚧 WIP parser', ['🚧', '🚧 WIP'])).toEqual({
        matched: true,
        emoji: '🚧',
        description: 'WIP parser',
      });
      expect(validate('🚧 WIP parser', ['🚧 WIP', '🚧'])).toEqual({
        matched: true,
        emoji: '🚧 WIP',
        description: 'parser',
      });
    });

    it('moves on when an earlier emoji is only a textual prefix', () => {
      expect(validate('🔥🔥 Burn it all', ['🔥', '🔥🔥'])).toEqual({
        matched: true,
        emoji: '🔥🔥',
        description: 'Burn it all',
      });
    });
  });

  describe('custom emojis', () => {
    it('accepts extras on top of the built-in set', () => {
      const emojiSet = resolveEmojiSet(['🦄']);

      expect(validate('🦄 Add magic', emojiSet).matched).toBe(true);
      expect(validate('✨ Add feature', emojiSet).matched).toBe(true);
      expect(validate('🦄 Add magic', DEFAULT_EMOJIS)).toEqual(noEmoji);
    });

    it('accepts a built-in emoji whether or not it is repeated as an extra', () => {
      expect(validate('🔖 Use latest versions', resolveEmojiSet(['🔖'])).matched).toBe(true);
      expect(validate('🔖 Use latest versions', resolveEmojiSet([])).matched).toBe(true);
    });
  });

  it('returns the same verdict for the same input', () => {
    const first = validate('🔖 ', DEFAULT_EMOJIS, MatchMode.STRICT);
    const second = validate('🔖 ', DEFAULT_EMOJIS, MatchMode.STRICT);

    expect(second).toEqual(first);
  });
});

describe('isCustomizedConventional', () => {
  it('validates against the built-in set in lenient mode', () => {
    expect(isCustomizedConventional('✨ Add a new feature')).toBe(true);
    expect(isCustomizedConventional('add a new feature')).toBe(false);
    expect(isCustomizedConventional('fixup! broken commit')).toBe(true);
  });

  it('accepts extra emojis', () => {
    expect(isCustomizedConventional('🦄 Add magic')).toBe(false);
    expect(isCustomizedConventional('🦄 Add magic', ['🦄'])).toBe(true);
  });
});
