/**
 * Cache Eviction Worker
 *
 * Bounds both content caches. Scheduling is external (cron or similar);
 * run this module directly for a one-off pass:
 *
 *   node dist/server/workers/cache-eviction-worker.js
 *
 * Pattern:
 * 1. Evict the lyrics cache (age, then count)
 * 2. Evict the vocabulary cache, even if step 1 failed
 * 3. Log and return both reports
 */

import { loadCacheConfig } from "../lib/config";
import { EvictionOptions, EvictionReport } from "../lib/eviction";
import { LyricsService, createLyricsService } from "../lib/lyrics-service";
import { VocabularyService, createVocabularyService } from "../lib/vocab-service";
import { createLrclibProvider } from "../lib/lyrics-provider";

export interface EvictionTargets {
  lyrics: Pick<LyricsService, "evictLyricsCache">;
  vocabulary: Pick<VocabularyService, "evictVocabularyCache">;
}

export interface CacheEvictionResult {
  lyrics: EvictionReport;
  vocabulary: EvictionReport;
}

function logReport(cache: string, report: EvictionReport): void {
  if (report.success) {
    const { stats } = report;
    console.log(
      `[cache-eviction-worker] ${cache}: ${stats.initialCount} -> ${stats.finalCount} entries ` +
        `(${stats.deletedOld} expired, ${stats.deletedExcess} over limit)`
    );
  } else {
    console.error(`[cache-eviction-worker] ${cache} eviction failed (${report.reason}): ${report.error}`);
  }
}

/**
 * Run one eviction pass over both caches
 */
export async function runCacheEviction(
  targets: EvictionTargets,
  options: EvictionOptions = {}
): Promise<CacheEvictionResult> {
  console.log(`[cache-eviction-worker] Starting eviction pass`);

  const lyrics = await targets.lyrics.evictLyricsCache(options.maxEntries, options.maxAgeDays);
  logReport("lyrics", lyrics);

  const vocabulary = await targets.vocabulary.evictVocabularyCache(options.maxEntries, options.maxAgeDays);
  logReport("vocabulary", vocabulary);

  return { lyrics, vocabulary };
}

if (require.main === module) {
  const config = loadCacheConfig();
  runCacheEviction({
    lyrics: createLyricsService({ config, provider: createLrclibProvider() }),
    vocabulary: createVocabularyService({ config }),
  })
    .then((result) => {
      process.exitCode = result.lyrics.success && result.vocabulary.success ? 0 : 1;
    })
    .catch((error: unknown) => {
      console.error(`[cache-eviction-worker] Eviction pass crashed:`, error);
      process.exitCode = 1;
    });
}
