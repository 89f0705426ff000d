/**
 * Cache Configuration
 *
 * Explicit configuration passed into every cache component.
 * Cache components never read the environment themselves; `loadCacheConfig`
 * is the single place where environment variables are translated.
 */

import path from "path";
import { z } from "zod";

export const DEFAULT_DATA_DIR = "/tmp/lyrics-cache";
export const DEFAULT_COMPRESSION_LEVEL = 6;
export const DEFAULT_NOT_FOUND_TTL_SECONDS = 300;

export interface CacheConfig {
  /** SQLite file backing the lyrics cache */
  lyricsDbPath: string;
  /** Directory holding one JSON file per cached vocabulary record */
  vocabCacheDir: string;
  /** zlib level, 0-9 */
  compressionLevel: number;
  /** How long a "no lyrics found" answer is remembered in memory; 0 disables */
  notFoundTtlSeconds: number;
  clock: () => Date;
}

export interface CacheConfigOverrides extends Partial<CacheConfig> {
  dataDir?: string;
}

const compressionLevelSchema = z.number().int().min(0).max(9);
const ttlSchema = z.number().int().min(0);

/**
 * Build a config, filling paths under `dataDir` when not given
 */
export function createCacheConfig(overrides: CacheConfigOverrides = {}): CacheConfig {
  const dataDir = overrides.dataDir ?? DEFAULT_DATA_DIR;

  return {
    lyricsDbPath: overrides.lyricsDbPath ?? path.join(dataDir, "lyrics_cache.db"),
    vocabCacheDir: overrides.vocabCacheDir ?? path.join(dataDir, "vocab_cache"),
    compressionLevel: compressionLevelSchema.parse(
      overrides.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL
    ),
    notFoundTtlSeconds: ttlSchema.parse(overrides.notFoundTtlSeconds ?? DEFAULT_NOT_FOUND_TTL_SECONDS),
    clock: overrides.clock ?? (() => new Date()),
  };
}

const envSchema = z.object({
  CACHE_DATA_DIR: z.string().min(1).optional(),
  LYRICS_CACHE_DB: z.string().min(1).optional(),
  VOCAB_CACHE_DIR: z.string().min(1).optional(),
  LYRICS_COMPRESSION_LEVEL: z.coerce.number().pipe(compressionLevelSchema).optional(),
  LYRICS_NOT_FOUND_TTL: z.coerce.number().pipe(ttlSchema).optional(),
});

/**
 * Read configuration from environment variables
 */
export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const parsed = envSchema.parse(env);

  return createCacheConfig({
    dataDir: parsed.CACHE_DATA_DIR,
    lyricsDbPath: parsed.LYRICS_CACHE_DB,
    vocabCacheDir: parsed.VOCAB_CACHE_DIR,
    compressionLevel: parsed.LYRICS_COMPRESSION_LEVEL,
    notFoundTtlSeconds: parsed.LYRICS_NOT_FOUND_TTL,
  });
}
