// UI and display constants
export const UI_CONSTANTS = {
  CLI_NAME: 'validate-commit-message',
  GITMOJI_URL: 'https://gitmoji.dev/',
  EMOJI_SAMPLE_SIZE: 10,
  INDENT: '    ',

  EXAMPLE_MESSAGES: [
    '🔖 Use latest versions of all items',
    '⚡️ Slightly upsize build storage',
    '🔧 Update enabled items directory',
  ],
} as const;

export const RESULT = {
  SUCCESS: 0,
  FAIL: 1,
} as const;
