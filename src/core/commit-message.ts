import {
  AUTOSQUASH_PREFIXES,
  COMMENT_PATTERN,
  LINE_BREAK,
  MERGE_PREFIX,
  SCISSORS_PATTERN,
} from '../constants/git.js';

/**
 * Removes what git itself strips before recording a commit: the diff below
 * the `--verbose` scissors line and every `#` comment line.
 */
export const cleanCommitMessage = (message: string): string =>
  message.replace(SCISSORS_PATTERN, '').replace(COMMENT_PATTERN, '');

export const getSubjectLine = (message: string): string => {
  const [subject = ''] = cleanCommitMessage(message).trim().split(LINE_BREAK);
  return subject.trim();
};

// See https://git-scm.com/docs/git-rebase#Documentation/git-rebase.txt---autosquash
export const hasAutosquashPrefix = (line: string): boolean =>
  AUTOSQUASH_PREFIXES.some((prefix) => line.startsWith(prefix));

// Merge branch, Merge pull request, Merge remote-tracking branch, Merge tag ...
export const isMergeCommit = (line: string): boolean => line.startsWith(MERGE_PREFIX);

export const isExemptCommit = (line: string): boolean =>
  hasAutosquashPrefix(line) || isMergeCommit(line);
