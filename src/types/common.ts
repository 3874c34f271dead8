export enum MatchMode {
  LENIENT = 'lenient',
  STRICT = 'strict',
}

export enum FailureReason {
  NO_EMOJI_PREFIX = 'NO_EMOJI_PREFIX',
  EMPTY_DESCRIPTION = 'EMPTY_DESCRIPTION',
}

export type EmojiSet = readonly string[];

export interface GitmojiEntry {
  emoji: string;
  code: string;
  description: string;
}

export interface MatchedVerdict {
  matched: true;
  emoji: string; // empty for exempted commits
  description: string;
}

export interface UnmatchedVerdict {
  matched: false;
  reason: FailureReason;
}

export type ValidationVerdict = MatchedVerdict | UnmatchedVerdict;

export interface HookConfig {
  emojis: string[];
  strict?: boolean;
  verbose?: boolean;
  color?: boolean;
}
