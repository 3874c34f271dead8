/**
 * Git-related constants
 */

// Prefixes `git commit --fixup/--squash` and `--fixup=amend:` write for autosquash
export const AUTOSQUASH_PREFIXES = ['amend!', 'fixup!', 'squash!'] as const;

export const MERGE_PREFIX = 'Merge';

// Everything below this line is dropped by git when using `git commit --verbose`
export const SCISSORS_PATTERN = /^# -{24} >8 -{24}\r?\n[\s\S]*$/m;

export const COMMENT_PATTERN = /^#.*(?:\r?\n)?/gm;

export const LINE_BREAK = /\r?\n/;
