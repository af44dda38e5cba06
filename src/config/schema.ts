/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { DEFAULT_CACHE_FILE } from '../cache/cache-store.js';
import { DEFAULT_PREFIX, DEFAULT_SKIP_DIRS } from '../extractor/index.js';

// Extension options handed to a plugin, merged under annotation options
export const pluginOptionsSchema = z.record(z.string(), z.string());

export const watchConfigSchema = z.object({
  debounceMs: z.number().int().min(0).default(300),
});

export const configSchema = z.object({
  prefix: z
    .string()
    .min(1)
    .refine(prefix => !/\s/.test(prefix), 'prefix must not contain whitespace')
    .default(DEFAULT_PREFIX),
  cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
  skipDirs: z.array(z.string().min(1)).default([...DEFAULT_SKIP_DIRS]),
  plugins: z.record(z.string(), pluginOptionsSchema).default({}),
  watch: watchConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type PluginOptions = z.infer<typeof pluginOptionsSchema>;
export type WatchConfig = z.infer<typeof watchConfigSchema>;
