/**
 * Record Store (derived-record backend)
 *
 * One JSON file per key in a flat directory: `{slug}_{hash8}.json`.
 * The file holds the payload plus a `_cacheMetadata` block.
 *
 * Invariants:
 * - Files are replaced with write-to-temp + rename, never written in place
 * - A read touches the file's times, never its content
 * - File mtime is the last-access marker; `cachedAt` is the creation time
 * - One unreadable file never fails a listing
 * - A file whose metadata names another key reads as a miss
 * - Temp files left by an interrupted write are swept with the age phase
 */

import fs from "fs-extra";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { CacheKey, NormalizedKey, keyString, normalizeCacheKey, normalizeKey, storageId } from "./cache-key";
import { StoreError, errorMessage } from "./cache-errors";
import {
  CacheListing,
  CacheRecord,
  ContentCache,
  DAY_MS,
  EntryMetadata,
  entryMetadataSchema,
} from "./content-cache";

export const RECORD_FORMAT_VERSION = "1.0";
export const METADATA_FIELD = "_cacheMetadata";

const RECORD_EXTENSION = ".json";
const TEMP_EXTENSION = ".tmp";
// A younger temp file may belong to a write still in progress
const TEMP_FILE_GRACE_MS = 10 * 60 * 1000;
const STORAGE_NAME_PATTERN = /^(.*)_([0-9a-f]{8})\.json$/;

const metadataBlockSchema = z.object({
  song: z.string(),
  artist: z.string().nullable(),
  cachedAt: z.string().datetime(),
  version: z.string(),
  details: entryMetadataSchema.optional(),
});

export type RecordMetadataBlock = z.infer<typeof metadataBlockSchema>;

export interface RecordStoreOptions<V> {
  dir: string;
  /** Validates the payload part of a file */
  schema: z.ZodType<V, z.ZodTypeDef, unknown>;
  clock?: () => Date;
}

interface RecordFile {
  name: string;
  filePath: string;
  sizeBytes: number;
  modifiedAt: Date;
  block: RecordMetadataBlock | null;
  error?: string;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Factory for a file-per-key cache over payloads of type V
 */
export function createRecordStore<V extends Record<string, unknown>>(
  options: RecordStoreOptions<V>
): ContentCache<V> {
  const { dir, schema } = options;
  const clock = options.clock ?? (() => new Date());

  function recordPath(key: CacheKey): string {
    return path.join(dir, `${storageId(key.primary, key.secondary)}${RECORD_EXTENSION}`);
  }

  /**
   * Split a parsed file into payload and metadata block
   */
  function parseRecord(raw: unknown, filePath: string): { value: V; block: RecordMetadataBlock } {
    if (!isJsonObject(raw)) {
      throw new StoreError(`Cache file ${filePath} does not hold a JSON object`);
    }

    const { [METADATA_FIELD]: rawBlock, ...payload } = raw;
    const block = metadataBlockSchema.safeParse(rawBlock);
    if (!block.success) {
      throw new StoreError(`Cache file ${filePath} has no valid ${METADATA_FIELD} block`);
    }

    const value = schema.safeParse(payload);
    if (!value.success) {
      throw new StoreError(`Cache file ${filePath} holds an invalid payload: ${value.error.message}`);
    }

    return { value: value.data, block: block.data };
  }

  async function readRecord(filePath: string): Promise<{ value: V; block: RecordMetadataBlock }> {
    let raw: unknown;
    try {
      raw = await fs.readJSON(filePath);
    } catch (error) {
      throw new StoreError(`Cache file ${filePath} is unreadable: ${errorMessage(error)}`, { cause: error });
    }
    return parseRecord(raw, filePath);
  }

  /**
   * Set the access marker; a failure is logged, not thrown
   */
  async function touch(filePath: string, at: Date): Promise<void> {
    try {
      await fs.utimes(filePath, at, at);
    } catch (error) {
      console.warn(`[record-store] Failed to touch ${filePath}: ${errorMessage(error)}`);
    }
  }

  function holdsKey(block: RecordMetadataBlock, key: NormalizedKey): boolean {
    if (!block.song.trim()) {
      return false;
    }
    return keyString(normalizeKey(block.song, block.artist)) === keyString(key);
  }

  async function get(key: CacheKey): Promise<CacheRecord<V> | null> {
    const normalized = normalizeCacheKey(key);
    const filePath = recordPath(key);

    if (!(await fs.pathExists(filePath))) {
      return null;
    }

    const { value, block } = await readRecord(filePath);
    if (!holdsKey(block, normalized)) {
      console.warn(`[record-store] ${filePath} holds "${block.song}" by ${block.artist ?? "unknown"}, treating as miss`);
      return null;
    }

    const accessedAt = clock();
    await touch(filePath, accessedAt);

    return {
      key: normalized,
      value,
      metadata: block.details ?? {},
      createdAt: new Date(block.cachedAt),
      accessedAt,
      location: filePath,
    };
  }

  async function put(key: CacheKey, value: V, metadata: EntryMetadata = {}): Promise<CacheRecord<V>> {
    const normalized = normalizeCacheKey(key);
    const filePath = recordPath(key);
    const tempPath = `${filePath}.${uuidv4()}${TEMP_EXTENSION}`;
    const now = clock();

    const block: RecordMetadataBlock = {
      song: key.primary.trim(),
      artist: normalized.secondary === null ? null : (key.secondary ?? "").trim(),
      cachedAt: now.toISOString(),
      version: RECORD_FORMAT_VERSION,
    };
    if (Object.keys(metadata).length > 0) {
      block.details = metadata;
    }

    try {
      await fs.ensureDir(dir);
      await fs.writeJSON(tempPath, { ...value, [METADATA_FIELD]: block }, { spaces: 2 });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        console.error(`[record-store] Failed to remove temp file ${tempPath}:`, cleanupError);
      });
      throw new StoreError(`Failed to write ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    await touch(filePath, now);

    return {
      key: normalized,
      value,
      metadata,
      createdAt: now,
      accessedAt: now,
      location: filePath,
    };
  }

  async function remove(key: CacheKey): Promise<boolean> {
    normalizeCacheKey(key);
    const filePath = recordPath(key);
    if (!(await fs.pathExists(filePath))) {
      return false;
    }
    await fs.remove(filePath);
    return true;
  }

  /**
   * Stat and (best effort) parse every record file in the directory
   */
  async function scan(): Promise<RecordFile[]> {
    if (!(await fs.pathExists(dir))) {
      return [];
    }

    let names: string[];
    try {
      names = (await fs.readdir(dir)).filter((name) => name.endsWith(RECORD_EXTENSION));
    } catch (error) {
      throw new StoreError(`Failed to read cache directory ${dir}: ${errorMessage(error)}`, { cause: error });
    }

    const files: RecordFile[] = [];
    for (const name of names) {
      const filePath = path.join(dir, name);
      // null when removed between readdir and stat
      const stats = await fs.stat(filePath).catch((error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          return null;
        }
        throw new StoreError(`Failed to stat ${filePath}: ${error.message}`, { cause: error });
      });
      if (!stats) {
        continue;
      }

      const file: RecordFile = {
        name,
        filePath,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime,
        block: null,
      };
      try {
        file.block = (await readRecord(filePath)).block;
      } catch (error) {
        file.error = errorMessage(error);
      }
      files.push(file);
    }
    return files;
  }

  function createdAtOf(file: RecordFile): Date {
    return file.block ? new Date(file.block.cachedAt) : file.modifiedAt;
  }

  /**
   * Oldest access first; ties by creation time, then name
   */
  function byAccessAscending(a: RecordFile, b: RecordFile): number {
    return (
      a.modifiedAt.getTime() - b.modifiedAt.getTime() ||
      createdAtOf(a).getTime() - createdAtOf(b).getTime() ||
      a.name.localeCompare(b.name)
    );
  }

  async function list(): Promise<CacheListing[]> {
    const files = await scan();

    return files
      .sort((a, b) => byAccessAscending(b, a))
      .map((file): CacheListing => {
        const common = {
          cachedAt: createdAtOf(file).toISOString(),
          lastAccessed: file.modifiedAt.toISOString(),
          sizeBytes: file.sizeBytes,
          location: file.filePath,
        };

        if (file.block) {
          return { ...common, primary: file.block.song, secondary: file.block.artist, origin: { kind: "parsed" } };
        }

        console.warn(`[record-store] Listing ${file.name} from its file name: ${file.error}`);
        const match = STORAGE_NAME_PATTERN.exec(file.name);
        return {
          ...common,
          primary: match ? match[1].replace(/_/g, " ").trim() : file.name,
          secondary: null,
          origin: { kind: "fallbackFromName", error: file.error ?? "unreadable" },
        };
      });
  }

  async function countEntries(): Promise<number> {
    if (!(await fs.pathExists(dir))) {
      return 0;
    }
    return (await fs.readdir(dir)).filter((name) => name.endsWith(RECORD_EXTENSION)).length;
  }

  async function totalBytes(): Promise<number> {
    const files = await scan();
    return files.reduce((sum, file) => sum + file.sizeBytes, 0);
  }

  async function deleteFiles(files: RecordFile[]): Promise<number> {
    for (const file of files) {
      await fs.remove(file.filePath);
    }
    return files.length;
  }

  /**
   * Remove temp files older than the grace period
   */
  async function sweepTempFiles(): Promise<number> {
    if (!(await fs.pathExists(dir))) {
      return 0;
    }

    const cutoff = clock().getTime() - TEMP_FILE_GRACE_MS;
    const names = (await fs.readdir(dir)).filter((name) => name.endsWith(TEMP_EXTENSION));
    let removed = 0;
    for (const name of names) {
      const filePath = path.join(dir, name);
      const stats = await fs.stat(filePath).catch((error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          return null;
        }
        throw new StoreError(`Failed to stat ${filePath}: ${error.message}`, { cause: error });
      });
      if (stats && stats.mtime.getTime() < cutoff) {
        await fs.remove(filePath);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[record-store] Removed ${removed} abandoned temp file(s) from ${dir}`);
    }
    return removed;
  }

  async function deleteOlderThan(maxAgeDays: number): Promise<number> {
    await sweepTempFiles();
    const cutoff = clock().getTime() - maxAgeDays * DAY_MS;
    const files = await scan();
    return deleteFiles(files.filter((file) => createdAtOf(file).getTime() < cutoff));
  }

  async function deleteLeastRecentlyAccessedExcess(keepCount: number): Promise<number> {
    const files = await scan();
    const excess = files.length - keepCount;
    if (excess <= 0) {
      return 0;
    }
    return deleteFiles(files.sort(byAccessAscending).slice(0, excess));
  }

  return {
    kind: "file",
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
