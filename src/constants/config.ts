import type { HookConfig } from '../types/common.js';

export const CONFIG_FILE = '.gitmojirc.json';

export const DEFAULT_CONFIG: HookConfig = {
  emojis: [],
};
