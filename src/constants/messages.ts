// User-facing text constants
export const FAIL_MESSAGES = {
  BAD_COMMIT: '[Bad commit message] >>',
  NOT_FOLLOWING_FORMAT: 'Your commit message does not follow Customized Conventional Commits formatting',
  PATTERN_INTRO: 'Customized Conventional Commit messages follow a pattern like:',
  PATTERN: '<emoji> <description>',
  PATTERN_BODY: 'optional extended body',
  EXAMPLES: 'Examples:',
  CORRECT_ERRORS: 'Please correct the following errors:',
  RUN: 'Run:',
  EDIT_AND_RETRY: 'to edit the commit message and retry the commit.',
  FULL_LIST: 'For a complete list of GitMoji emojis, visit:',
} as const;

export const GUIDANCE_MESSAGES = {
  NO_EMOJI_PREFIX: 'Expected GitMoji emoji at the start. Examples:',
  EMPTY_DESCRIPTION: "Expected description after the emoji (e.g., 'Fix authentication bug')",
} as const;

export const HELP_MESSAGES = {
  DESCRIPTION: 'Check a git commit message for Customized Conventional Commits formatting using GitMoji.',
  EMOJI_ARGS: 'Optional additional GitMoji emojis to accept, followed by a file containing a git commit message',
  STRICT: 'Force commit to strictly follow Customized Conventional Commits formatting. Disallows fixup! and merge commits.',
  VERBOSE: 'Print more verbose error output.',
  NO_COLOR: 'Disable color in output.',
  CONFIG: 'Path to a JSON config file (defaults to .gitmojirc.json in the working directory)',
  USE_VERBOSE_PREFIX: 'Use the',
  USE_VERBOSE_SUFFIX: 'arg for more information',
} as const;

export const ENCODING_MESSAGES = {
  TITLE: '[Bad commit message encoding]',
  NOT_DECODED: "validate-commit-message couldn't decode your commit message.",
  UTF8_ASSUMED: 'UTF-8 encoding is assumed, please configure git to write commit messages in UTF-8.',
  SEE: 'See',
  DOCS_URL: 'https://git-scm.com/docs/git-commit/#_discussion',
  FOR_MORE: 'for more.',
} as const;

export const WARNING_MESSAGES = {
  INVALID_CONFIG: 'Invalid config data, using defaults:',
  FAILED_TO_LOAD_CONFIG: 'Failed to load config, using defaults:',
} as const;
