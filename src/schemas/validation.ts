import { z } from 'zod';
import type { SetRequired } from 'type-fest';
import type { HookConfig } from '../types/common.js';

// Base validation schemas
export const EmojiSchema = z.string().min(1, 'Emoji must be a non-empty string');

export const GitmojiEntrySchema = z.object({
  emoji: EmojiSchema,
  code: z.string().regex(/^:[a-z0-9_+-]+:$/, 'Shortcode must look like :name:'),
  description: z.string().min(1, 'Description is required'),
});

export const GitmojiCatalogSchema = z
  .array(GitmojiEntrySchema)
  .min(1, 'Catalog must contain at least one emoji')
  .refine(
    (entries) => new Set(entries.map((entry) => entry.emoji)).size === entries.length,
    'Catalog contains duplicate emojis'
  );

// Configuration file schema
export const HookConfigSchema = z
  .object({
    emojis: z.array(EmojiSchema).default([]),
    strict: z.boolean().optional(),
    verbose: z.boolean().optional(),
    color: z.boolean().optional(),
  })
  .strict();

// Parsed command-line options
export const HookOptionsSchema = z.object({
  strict: z.boolean().default(false),
  verbose: z.boolean().default(false),
  color: z.boolean().default(true),
  config: z.string().min(1, 'Config path must be a non-empty string').optional(),
});

// `[emoji...] <input>`: every positional but the last is an extra emoji
export const HookArgumentsSchema = z
  .array(z.string())
  .min(1, 'A file containing a git commit message is required')
  .transform((args) => ({
    emojis: args.slice(0, -1),
    inputFile: args[args.length - 1],
  }));

export const PackageJsonSchema = z.object({
  version: z.string(),
});

export type ResolvedHookConfig = SetRequired<HookConfig, 'strict' | 'verbose' | 'color'>;

export type ValidatedHookOptions = z.infer<typeof HookOptionsSchema>;

export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
