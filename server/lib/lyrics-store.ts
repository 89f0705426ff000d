/**
 * Lyrics Store (raw-text backend)
 *
 * Compressed lyrics in a single SQLite table, one row per normalized
 * (song, artist). Every call opens its own connection and closes it before
 * returning.
 *
 * Invariants:
 * - At most one row per normalized key (unique index + update in place)
 * - A missing artist only matches rows whose artist is NULL
 * - A hit refreshes accessedAt; a rewrite keeps createdAt
 * - Reads never create the database file
 */

import { z } from "zod";
import { and, asc, count, desc, eq, inArray, isNull, lt, sql } from "drizzle-orm";
import { cacheDbExists, withCacheDb, CacheDb } from "../db";
import { lyricsCache, LyricsCacheRow } from "../../drizzle/schema";
import { CacheKey, NormalizedKey, normalizeCacheKey } from "./cache-key";
import { COMPRESSION_ALGORITHM, CompressedText } from "./compression";
import { StoreError, errorMessage } from "./cache-errors";
import {
  CacheListing,
  CacheRecord,
  ContentCache,
  DAY_MS,
  EntryMetadata,
  entryMetadataSchema,
} from "./content-cache";

export interface LyricsStoreOptions {
  dbPath: string;
  clock?: () => Date;
}

function keyCondition(key: NormalizedKey) {
  return and(
    eq(lyricsCache.song, key.primary),
    key.secondary === null ? isNull(lyricsCache.artist) : eq(lyricsCache.artist, key.secondary)
  );
}

const compressionInfoSchema = z.object({
  originalSizeBytes: z.number(),
  compressedSizeBytes: z.number(),
  encodedSizeBytes: z.number(),
  ratio: z.number(),
  algorithm: z.literal(COMPRESSION_ALGORITHM),
  level: z.number().int(),
});

/**
 * Factory for the SQLite-backed lyrics cache
 */
export function createLyricsStore(options: LyricsStoreOptions): ContentCache<CompressedText> {
  const { dbPath } = options;
  const clock = options.clock ?? (() => new Date());

  function toRecord(row: LyricsCacheRow): CacheRecord<CompressedText> {
    const metadata: EntryMetadata = row.metadata ? entryMetadataSchema.parse(JSON.parse(row.metadata)) : {};
    if (row.language) {
      metadata.language = row.language;
    }

    return {
      key: { primary: row.song, secondary: row.artist },
      value: {
        encoded: row.compressedLyrics,
        stats: compressionInfoSchema.parse(JSON.parse(row.compressionInfo)),
      },
      metadata,
      createdAt: row.createdAt,
      accessedAt: row.accessedAt,
      location: dbPath,
    };
  }

  /**
   * Run a query, rethrowing driver failures as StoreError
   */
  async function run<T>(operation: string, fn: (db: CacheDb) => T): Promise<T> {
    try {
      return withCacheDb(dbPath, fn);
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(`Lyrics store ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async function get(rawKey: CacheKey): Promise<CacheRecord<CompressedText> | null> {
    const key = normalizeCacheKey(rawKey);
    if (!(await cacheDbExists(dbPath))) {
      return null;
    }

    return run("get", (db) => {
      const row = db.select().from(lyricsCache).where(keyCondition(key)).get();
      if (!row) {
        return null;
      }

      const accessedAt = clock();
      db.update(lyricsCache).set({ accessedAt }).where(eq(lyricsCache.id, row.id)).run();
      return toRecord({ ...row, accessedAt });
    });
  }

  async function put(
    rawKey: CacheKey,
    value: CompressedText,
    metadata: EntryMetadata = {}
  ): Promise<CacheRecord<CompressedText>> {
    const key = normalizeCacheKey(rawKey);
    const now = clock();
    const columns = {
      compressedLyrics: value.encoded,
      compressionInfo: JSON.stringify(value.stats),
      metadata: JSON.stringify(metadata),
      language: typeof metadata.language === "string" ? metadata.language : null,
      sourceUrl: typeof metadata.source === "string" ? metadata.source : null,
      accessedAt: now,
    };

    return run("put", (db) =>
      db.transaction((tx) => {
        const existing = tx.select({ id: lyricsCache.id }).from(lyricsCache).where(keyCondition(key)).get();

        if (existing) {
          tx.update(lyricsCache).set(columns).where(eq(lyricsCache.id, existing.id)).run();
        } else {
          tx.insert(lyricsCache)
            .values({ song: key.primary, artist: key.secondary, createdAt: now, ...columns })
            .run();
        }

        const row = tx.select().from(lyricsCache).where(keyCondition(key)).get();
        if (!row) {
          throw new StoreError(`Row for ${key.primary} vanished during write`);
        }
        return toRecord(row);
      })
    );
  }

  async function remove(rawKey: CacheKey): Promise<boolean> {
    const key = normalizeCacheKey(rawKey);
    if (!(await cacheDbExists(dbPath))) {
      return false;
    }

    return run("delete", (db) => db.delete(lyricsCache).where(keyCondition(key)).run().changes > 0);
  }

  async function list(): Promise<CacheListing[]> {
    if (!(await cacheDbExists(dbPath))) {
      return [];
    }

    const rows = await run("list", (db) =>
      db
        .select({
          song: lyricsCache.song,
          artist: lyricsCache.artist,
          createdAt: lyricsCache.createdAt,
          accessedAt: lyricsCache.accessedAt,
          sizeBytes: sql<number>`length(${lyricsCache.compressedLyrics})`,
        })
        .from(lyricsCache)
        .orderBy(desc(lyricsCache.accessedAt), desc(lyricsCache.id))
        .all()
    );

    return rows.map((row): CacheListing => ({
      primary: row.song,
      secondary: row.artist,
      cachedAt: row.createdAt.toISOString(),
      lastAccessed: row.accessedAt.toISOString(),
      sizeBytes: row.sizeBytes,
      location: dbPath,
      origin: { kind: "parsed" },
    }));
  }

  async function countEntries(): Promise<number> {
    if (!(await cacheDbExists(dbPath))) {
      return 0;
    }
    return run("count", (db) => db.select({ value: count() }).from(lyricsCache).get()?.value ?? 0);
  }

  async function totalBytes(): Promise<number> {
    if (!(await cacheDbExists(dbPath))) {
      return 0;
    }
    return run(
      "size",
      (db) =>
        db
          .select({ value: sql<number>`coalesce(sum(length(${lyricsCache.compressedLyrics})), 0)` })
          .from(lyricsCache)
          .get()?.value ?? 0
    );
  }

  async function deleteOlderThan(maxAgeDays: number): Promise<number> {
    if (!(await cacheDbExists(dbPath))) {
      return 0;
    }

    const cutoff = new Date(clock().getTime() - maxAgeDays * DAY_MS);
    return run("age eviction", (db) => db.delete(lyricsCache).where(lt(lyricsCache.createdAt, cutoff)).run().changes);
  }

  async function deleteLeastRecentlyAccessedExcess(keepCount: number): Promise<number> {
    if (!(await cacheDbExists(dbPath))) {
      return 0;
    }

    return run("count eviction", (db) =>
      db.transaction((tx) => {
        const total = tx.select({ value: count() }).from(lyricsCache).get()?.value ?? 0;
        const excess = total - keepCount;
        if (excess <= 0) {
          return 0;
        }

        const victims = tx
          .select({ id: lyricsCache.id })
          .from(lyricsCache)
          .orderBy(asc(lyricsCache.accessedAt), asc(lyricsCache.id))
          .limit(excess)
          .all()
          .map((row) => row.id);

        return tx.delete(lyricsCache).where(inArray(lyricsCache.id, victims)).run().changes;
      })
    );
  }

  return {
    kind: "sqlite",
    get,
    put,
    delete: remove,
    list,
    count: countEntries,
    totalBytes,
    deleteOlderThan,
    deleteLeastRecentlyAccessedExcess,
  };
}
