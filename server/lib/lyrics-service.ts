/**
 * Lyrics Service
 *
 * Read-through lyrics cache: SQLite store, zlib+base64 payloads, an
 * external provider on a miss, and a short-lived in-memory memo of
 * "nothing found" answers.
 *
 * Invariants:
 * - Never throws to the caller; every outcome is a structured result
 * - A mock fetch never reads or writes the not-found memo
 * - Cache failures degrade to a provider call
 */

import NodeCache from "node-cache";
import { CacheConfig } from "./config";
import { CacheListing, ContentCache, DeleteResult, EntryMetadata } from "./content-cache";
import { CompressedText, CompressionStats, compressText, decompressText, formatCompressionStats } from "./compression";
import { FailureReason, errorMessage, getFailureMessage, toFailureReason } from "./cache-errors";
import { NormalizedKey, describeKey, keyString } from "./cache-key";
import { createLyricsStore } from "./lyrics-store";
import { LyricsProvider } from "./lyrics-provider";
import { LoadResult, createReadThroughCache } from "./read-through";
import { detectLanguage } from "./language";
import { EvictionReport, runEviction } from "./eviction";

export const MOCK_SOURCE = "mock_data";

export interface LyricsMetadata extends EntryMetadata {
  title: string;
  artist: string;
  source: string;
  fetchedAt: string;
  language: string;
  isMock?: boolean;
}

export interface LyricsCacheInfo {
  fromCache: boolean;
  cachedAt?: string;
  compression?: CompressionStats;
  language?: string;
  /** False when the fetched lyrics could not be written to the cache */
  stored?: boolean;
  writeError?: string;
  recoveredFrom?: FailureReason;
  isMock?: boolean;
}

export interface FetchLyricsResult {
  success: boolean;
  lyrics?: string;
  metadata?: EntryMetadata;
  cacheInfo?: LyricsCacheInfo;
  reason?: FailureReason;
  error?: string;
}

export interface ListLyricsResult {
  success: boolean;
  entries: CacheListing[];
  count: number;
  error?: string;
}

export interface LyricsServiceOptions {
  config: CacheConfig;
  provider: LyricsProvider;
  /** Defaults to a SQLite store at config.lyricsDbPath */
  store?: ContentCache<CompressedText>;
}

export interface LyricsService {
  fetchLyrics(song: string, artist?: string | null, allowMock?: boolean): Promise<FetchLyricsResult>;
  listCachedLyrics(): Promise<ListLyricsResult>;
  evictLyricsCache(maxEntries?: number, maxAgeDays?: number): Promise<EvictionReport>;
  deleteCachedLyrics(song: string, artist?: string | null): Promise<DeleteResult>;
}

/**
 * Deterministic stand-in lyrics, long enough to exercise compression
 */
export function mockLyrics(song: string, artist?: string | null): string {
  const chorus = `[Chorus]\nThis is the ${song} chorus\nSing it back to me\nThis is the ${song} chorus\nOne more time`;

  return [
    `[Mock Lyrics for: ${artist || "Unknown"} - ${song}]`,
    "",
    "[00:00] Verse 1",
    "Placeholder words stand in for the real thing",
    "Line after line to give the codec some text",
    "",
    `[00:15] ${chorus}`,
    "",
    "[00:30] Verse 2",
    "A second verse repeats the shape of the first",
    "So the cache has something realistic to hold",
    "",
    `[00:45] ${chorus}`,
    "",
    "[01:00] Bridge",
    "A bridge that changes nothing at all",
    "",
    `[01:15] ${chorus}`,
  ].join("\n");
}

export function createLyricsService(options: LyricsServiceOptions): LyricsService {
  const { config, provider } = options;
  const store = options.store ?? createLyricsStore({ dbPath: config.lyricsDbPath, clock: config.clock });

  const readThrough = createReadThroughCache<string, CompressedText>({
    name: "lyrics-cache",
    store,
    encode: (text) => compressText(text, config.compressionLevel),
    decode: (stored) => decompressText(stored.encoded),
  });

  // checkperiod 0: expired entries are dropped on read, no timer is left running
  const notFound = new NodeCache({ stdTTL: config.notFoundTtlSeconds, checkperiod: 0, useClones: false });

  function rememberNotFound(key: NormalizedKey): void {
    if (config.notFoundTtlSeconds > 0) {
      notFound.set(keyString(key), true);
    }
  }

  function loader(song: string, artist: string | null, allowMock: boolean) {
    return async (key: NormalizedKey): Promise<LoadResult<string>> => {
      const fetchedAt = config.clock().toISOString();

      if (allowMock) {
        console.log(`[lyrics-service] Using mock lyrics for ${describeKey(key)}`);
        const lyrics = mockLyrics(song, artist);
        const metadata: LyricsMetadata = {
          title: song,
          artist: artist || "Unknown",
          source: MOCK_SOURCE,
          fetchedAt,
          language: detectLanguage(lyrics),
          isMock: true,
        };
        return { status: "found", value: lyrics, metadata };
      }

      if (notFound.has(keyString(key))) {
        console.log(`[lyrics-service] Recently found no lyrics for ${describeKey(key)}, skipping ${provider.name}`);
        return { status: "not_found" };
      }

      const found = await provider.findLyrics(song, artist);
      if (!found) {
        rememberNotFound(key);
        return { status: "not_found" };
      }

      const metadata: LyricsMetadata = {
        title: song,
        artist: artist || "Unknown",
        source: found.source,
        fetchedAt,
        language: detectLanguage(found.lyrics),
      };
      return { status: "found", value: found.lyrics, metadata };
    };
  }

  async function fetchLyrics(
    song: string,
    artist: string | null = null,
    allowMock: boolean = false
  ): Promise<FetchLyricsResult> {
    const title = song.trim();
    const byArtist = artist?.trim() || null;

    const result = await readThrough.fetch({ primary: title, secondary: byArtist }, loader(title, byArtist, allowMock), {
      variant: allowMock ? "mock" : provider.name,
    });

    if (!result.success) {
      const error =
        result.reason === "NOT_FOUND" ? getFailureMessage(result.reason).userMessage : `Error fetching lyrics: ${result.error}`;
      const failure: FetchLyricsResult = { success: false, reason: result.reason, error };
      if (result.recoveredFrom) {
        failure.cacheInfo = { fromCache: false, recoveredFrom: result.recoveredFrom };
      }
      return failure;
    }

    const { provenance, metadata } = result;
    const language = typeof metadata.language === "string" ? metadata.language : detectLanguage(result.value);

    if (provenance.fromCache) {
      return {
        success: true,
        lyrics: result.value,
        metadata,
        cacheInfo: {
          fromCache: true,
          cachedAt: provenance.cachedAt,
          compression: provenance.stored.stats,
          language,
          isMock: metadata.source === MOCK_SOURCE,
        },
      };
    }

    notFound.del(keyString(result.key));
    const cacheInfo: LyricsCacheInfo = {
      fromCache: false,
      language,
      stored: provenance.stored !== null,
      isMock: allowMock,
    };
    if (provenance.stored) {
      cacheInfo.compression = provenance.stored.stats;
      console.log(`[lyrics-service] Cached ${describeKey(result.key)}: ${formatCompressionStats(provenance.stored.stats)}`);
    }
    if (provenance.writeError) {
      cacheInfo.writeError = provenance.writeError;
    }
    if (provenance.recoveredFrom) {
      cacheInfo.recoveredFrom = provenance.recoveredFrom;
    }

    return { success: true, lyrics: result.value, metadata, cacheInfo };
  }

  async function listCachedLyrics(): Promise<ListLyricsResult> {
    try {
      const entries = await store.list();
      return { success: true, entries, count: entries.length };
    } catch (error) {
      console.error(`[lyrics-service] Failed to list cached lyrics: ${errorMessage(error)}`);
      return { success: false, entries: [], count: 0, error: errorMessage(error) };
    }
  }

  async function evictLyricsCache(maxEntries?: number, maxAgeDays?: number): Promise<EvictionReport> {
    return runEviction(store, { maxEntries, maxAgeDays });
  }

  async function deleteCachedLyrics(song: string, artist: string | null = null): Promise<DeleteResult> {
    try {
      return { success: true, deleted: await store.delete({ primary: song, secondary: artist }) };
    } catch (error) {
      console.error(`[lyrics-service] Failed to delete cached lyrics (${toFailureReason(error)}): ${errorMessage(error)}`);
      return { success: false, deleted: false, error: errorMessage(error) };
    }
  }

  return {
    fetchLyrics,
    listCachedLyrics,
    evictLyricsCache,
    deleteCachedLyrics,
  };
}
