import { readFileSync } from 'fs';
import { GitmojiCatalogSchema } from '../schemas/validation.js';
import type { EmojiSet, GitmojiEntry } from '../types/common.js';

// Catalog from https://gitmoji.dev/, in its published order
const CATALOG_URL = new URL('../../data/gitmojis.json', import.meta.url);

const loadCatalog = (): readonly GitmojiEntry[] => {
  const raw: unknown = JSON.parse(readFileSync(CATALOG_URL, 'utf-8'));
  return Object.freeze(GitmojiCatalogSchema.parse(raw).map((entry) => Object.freeze(entry)));
};

export const GITMOJIS: readonly GitmojiEntry[] = loadCatalog();

export const DEFAULT_EMOJIS: EmojiSet = Object.freeze(GITMOJIS.map((entry) => entry.emoji));
