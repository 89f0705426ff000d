/**
 * Eviction Manager
 *
 * Bounds a content cache by age, then by count. Not run automatically;
 * an external scheduler calls it.
 *
 * Order:
 * 1. Delete entries created more than maxAgeDays ago
 * 2. If still above maxEntries, delete least recently accessed entries
 *    (ties by insertion order) until exactly maxEntries remain
 */

import { z } from "zod";
import { CacheError, FailureReason, errorMessage, toFailureReason } from "./cache-errors";
import { ContentCache } from "./content-cache";

export const DEFAULT_MAX_ENTRIES = 1000;
export const DEFAULT_MAX_AGE_DAYS = 90;

export interface EvictionOptions {
  maxEntries?: number;
  maxAgeDays?: number;
}

export interface EvictionStats {
  initialCount: number;
  deletedOld: number;
  deletedExcess: number;
  finalCount: number;
  totalBytes: number;
}

export type EvictionReport =
  | { success: true; stats: EvictionStats }
  | { success: false; reason: FailureReason; error: string };

const evictionOptionsSchema = z.object({
  maxEntries: z.number().int().min(0).default(DEFAULT_MAX_ENTRIES),
  maxAgeDays: z.number().int().min(0).default(DEFAULT_MAX_AGE_DAYS),
});

export async function evictCache<V>(store: ContentCache<V>, options: EvictionOptions = {}): Promise<EvictionStats> {
  const parsed = evictionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new CacheError("INVALID_ARGUMENT", `Invalid eviction options: ${parsed.error.issues[0]?.message}`);
  }
  const { maxEntries, maxAgeDays } = parsed.data;

  const initialCount = await store.count();
  if (initialCount === 0) {
    return { initialCount: 0, deletedOld: 0, deletedExcess: 0, finalCount: 0, totalBytes: 0 };
  }

  const deletedOld = await store.deleteOlderThan(maxAgeDays);
  const deletedExcess = await store.deleteLeastRecentlyAccessedExcess(maxEntries);

  const stats: EvictionStats = {
    initialCount,
    deletedOld,
    deletedExcess,
    finalCount: await store.count(),
    totalBytes: await store.totalBytes(),
  };

  console.log(
    `[eviction] ${store.kind} cache: ${stats.initialCount} -> ${stats.finalCount} entries ` +
      `(${deletedOld} expired, ${deletedExcess} over limit), ${stats.totalBytes} bytes`
  );

  return stats;
}

/**
 * Run an eviction and report its outcome instead of throwing
 */
export async function runEviction<V>(store: ContentCache<V>, options: EvictionOptions = {}): Promise<EvictionReport> {
  try {
    return { success: true, stats: await evictCache(store, options) };
  } catch (error) {
    console.error(`[eviction] ${store.kind} cache eviction failed: ${errorMessage(error)}`);
    return { success: false, reason: toFailureReason(error), error: errorMessage(error) };
  }
}
