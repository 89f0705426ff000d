/**
 * ContentCache: the contract shared by every cache backend
 *
 * Backends:
 * - lyrics-store: one SQLite table, compressed text rows
 * - record-store: one JSON file per key
 *
 * The read-through orchestrator and the eviction manager only see this
 * interface, so either backend can sit behind either call site.
 */

import { z } from "zod";
import type { CacheKey, NormalizedKey } from "./cache-key";

/**
 * Free-form provenance stored next to a payload
 */
export interface EntryMetadata {
  source?: string;
  language?: string;
  [field: string]: unknown;
}

export const entryMetadataSchema = z
  .object({
    source: z.string().optional(),
    language: z.string().optional(),
  })
  .catchall(z.unknown());

export interface CacheRecord<V> {
  key: NormalizedKey;
  value: V;
  metadata: EntryMetadata;
  createdAt: Date;
  accessedAt: Date;
  /** Where the entry lives: database path or file path */
  location: string;
}

/**
 * How a listing row was obtained: from the stored metadata, or guessed from
 * the storage name because the entry could not be read
 */
export type ListingOrigin = { kind: "parsed" } | { kind: "fallbackFromName"; error: string };

export interface CacheListing {
  primary: string;
  secondary: string | null;
  cachedAt: string;
  lastAccessed: string;
  sizeBytes: number;
  location: string;
  origin: ListingOrigin;
}

export interface DeleteResult {
  success: boolean;
  deleted: boolean;
  error?: string;
}

export interface ContentCache<V> {
  /** Backend label used in log lines */
  readonly kind: string;
  /** Probe a key; a hit refreshes the entry's access time */
  get(key: CacheKey): Promise<CacheRecord<V> | null>;
  /** Insert, or replace the payload of an existing entry in place */
  put(key: CacheKey, value: V, metadata?: EntryMetadata): Promise<CacheRecord<V>>;
  delete(key: CacheKey): Promise<boolean>;
  /** Snapshot of all entries, most recently accessed first */
  list(): Promise<CacheListing[]>;
  count(): Promise<number>;
  totalBytes(): Promise<number>;
  /** Delete entries created more than `maxAgeDays` ago; returns the number deleted */
  deleteOlderThan(maxAgeDays: number): Promise<number>;
  /** Delete least recently accessed entries until `keepCount` remain */
  deleteLeastRecentlyAccessedExcess(keepCount: number): Promise<number>;
}

export const DAY_MS = 24 * 60 * 60 * 1000;
