import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Lyrics cache table, the raw-text backend of the content cache.
 * One row per normalized (song, artist) pair; artist is null when absent.
 * Columns use camelCase to match both database fields and generated types.
 */
export const lyricsCache = sqliteTable("lyrics_cache", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  /** Normalized (lower-cased, trimmed) song title. */
  song: text("song").notNull(),
  artist: text("artist"),
  /** zlib + base64 encoded lyrics text. */
  compressedLyrics: text("compressedLyrics").notNull(),
  compressionInfo: text("compressionInfo").notNull(), // JSON string
  metadata: text("metadata"), // JSON string
  language: text("language"),
  sourceUrl: text("sourceUrl"),
  createdAt: integer("createdAt", { mode: "timestamp_ms" }).notNull(),
  accessedAt: integer("accessedAt", { mode: "timestamp_ms" }).notNull(),
});

export type LyricsCacheRow = typeof lyricsCache.$inferSelect;
export type InsertLyricsCacheRow = typeof lyricsCache.$inferInsert;

/**
 * DDL applied on every connection. Kept next to the table definition so the
 * two change together.
 */
export const LYRICS_CACHE_DDL = `
CREATE TABLE IF NOT EXISTS lyrics_cache (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  song TEXT NOT NULL,
  artist TEXT,
  compressedLyrics TEXT NOT NULL,
  compressionInfo TEXT NOT NULL,
  metadata TEXT,
  language TEXT,
  sourceUrl TEXT,
  createdAt INTEGER NOT NULL,
  accessedAt INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_lyrics_cache_key ON lyrics_cache (song, ifnull(artist, ''));
CREATE INDEX IF NOT EXISTS idx_lyrics_cache_accessed ON lyrics_cache (accessedAt);
`;
