/**
 * Public surface of the lyrics content cache.
 *
 * Typical use:
 *
 *   const { lyrics, vocabulary } = createCacheServices();
 *   const result = await lyrics.fetchLyrics("Lemon", "Kenshi Yonezu");
 */

import { CacheConfig, loadCacheConfig } from "./lib/config";
import { LyricsProvider, createLrclibProvider } from "./lib/lyrics-provider";
import { LyricsService, createLyricsService } from "./lib/lyrics-service";
import { VocabularyService, createVocabularyService } from "./lib/vocab-service";

export * from "./lib/cache-errors";
export * from "./lib/cache-key";
export * from "./lib/compression";
export * from "./lib/config";
export * from "./lib/content-cache";
export * from "./lib/eviction";
export * from "./lib/language";
export * from "./lib/lyrics-provider";
export * from "./lib/lyrics-service";
export * from "./lib/lyrics-store";
export * from "./lib/read-through";
export * from "./lib/record-store";
export * from "./lib/vocab-service";
export * from "./lib/vocabulary";
export { runCacheEviction } from "./workers/cache-eviction-worker";
export type { CacheEvictionResult, EvictionTargets } from "./workers/cache-eviction-worker";

export interface CacheServices {
  lyrics: LyricsService;
  vocabulary: VocabularyService;
}

/**
 * Both services over one configuration; defaults come from the environment
 * and the LRCLIB provider
 */
export function createCacheServices(
  config: CacheConfig = loadCacheConfig(),
  provider: LyricsProvider = createLrclibProvider()
): CacheServices {
  return {
    lyrics: createLyricsService({ config, provider }),
    vocabulary: createVocabularyService({ config }),
  };
}
