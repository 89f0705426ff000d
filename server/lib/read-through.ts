/**
 * Read-Through Orchestrator
 *
 * Probe the store; on a miss, call the loader (an external collaborator),
 * write the result through and return it with provenance.
 *
 * Invariants:
 * - Cache failures degrade to a miss, they never fail the request
 * - Loader failures come back as structured results, never as throws
 * - Concurrent fetches of one key in this process share one load
 *   (single flight); across processes the last writer wins
 */

import { CacheKey, NormalizedKey, describeKey, keyString, normalizeKey } from "./cache-key";
import { CacheError, FailureReason, errorMessage, toFailureReason } from "./cache-errors";
import { ContentCache, EntryMetadata } from "./content-cache";

export type LoadResult<T> =
  | { status: "found"; value: T; metadata?: EntryMetadata }
  | { status: "not_found" };

export type Loader<T> = (key: NormalizedKey) => Promise<LoadResult<T>>;

export interface HitProvenance<V> {
  fromCache: true;
  cachedAt: string;
  stored: V;
  location: string;
}

export interface MissProvenance<V> {
  fromCache: false;
  /** What was written; null when the write failed */
  stored: V | null;
  /** Where the entry was written */
  location?: string;
  writeError?: string;
  /** Set when a cached entry existed but could not be used */
  recoveredFrom?: FailureReason;
}

export type ReadThroughResult<T, V> =
  | {
      success: true;
      key: NormalizedKey;
      value: T;
      metadata: EntryMetadata;
      provenance: HitProvenance<V> | MissProvenance<V>;
    }
  | {
      success: false;
      reason: FailureReason;
      error: string;
      recoveredFrom?: FailureReason;
    };

export interface ReadThroughOptions<T, V> {
  /** Log prefix */
  name: string;
  store: ContentCache<V>;
  /** Turn a loaded value into its stored form */
  encode(value: T): V;
  /** Turn a stored value back; may throw DecodeError */
  decode(stored: V): T;
}

export interface FetchOptions {
  /** Separates concurrent fetches of one key that use different loaders */
  variant?: string;
}

export interface ReadThroughCache<T, V> {
  fetch(key: CacheKey, load: Loader<T>, options?: FetchOptions): Promise<ReadThroughResult<T, V>>;
  /** Number of loads currently in flight */
  inFlight(): number;
}

export function createReadThroughCache<T, V>(options: ReadThroughOptions<T, V>): ReadThroughCache<T, V> {
  const { name, store, encode, decode } = options;
  const pending = new Map<string, Promise<ReadThroughResult<T, V>>>();

  /**
   * Probe the store; any failure is logged and reported as a miss
   */
  async function probe(
    key: NormalizedKey
  ): Promise<{ hit: ReadThroughResult<T, V> | null; recoveredFrom?: FailureReason }> {
    try {
      const record = await store.get(key);
      if (!record) {
        return { hit: null };
      }

      const value = decode(record.value);
      console.log(`[${name}] Cache hit for ${describeKey(key)}`);
      return {
        hit: {
          success: true,
          key,
          value,
          metadata: record.metadata,
          provenance: {
            fromCache: true,
            cachedAt: record.createdAt.toISOString(),
            stored: record.value,
            location: record.location,
          },
        },
      };
    } catch (error) {
      const reason = toFailureReason(error);
      console.warn(`[${name}] Cached entry for ${describeKey(key)} unusable (${reason}), treating as miss: ${errorMessage(error)}`);
      return { hit: null, recoveredFrom: reason };
    }
  }

  async function loadAndStore(key: NormalizedKey, load: Loader<T>): Promise<ReadThroughResult<T, V>> {
    const { hit, recoveredFrom } = await probe(key);
    if (hit) {
      return hit;
    }

    console.log(`[${name}] Cache miss for ${describeKey(key)}`);

    let loaded: LoadResult<T>;
    try {
      loaded = await load(key);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[${name}] Loader failed for ${describeKey(key)}: ${message}`);
      return { success: false, reason: "PROVIDER_ERROR", error: message, recoveredFrom };
    }

    if (loaded.status === "not_found") {
      return { success: false, reason: "NOT_FOUND", error: `Nothing found for ${describeKey(key)}`, recoveredFrom };
    }

    const metadata = loaded.metadata ?? {};
    const provenance: MissProvenance<V> = { fromCache: false, stored: null };
    if (recoveredFrom) {
      provenance.recoveredFrom = recoveredFrom;
    }

    try {
      const stored = encode(loaded.value);
      const record = await store.put(key, stored, metadata);
      provenance.stored = stored;
      provenance.location = record.location;
    } catch (error) {
      provenance.writeError = errorMessage(error);
      console.error(`[${name}] Failed to cache ${describeKey(key)}: ${provenance.writeError}`);
    }

    return { success: true, key, value: loaded.value, metadata, provenance };
  }

  async function fetch(
    rawKey: CacheKey,
    load: Loader<T>,
    fetchOptions: FetchOptions = {}
  ): Promise<ReadThroughResult<T, V>> {
    let key: NormalizedKey;
    try {
      key = normalizeKey(rawKey.primary, rawKey.secondary);
    } catch (error) {
      return {
        success: false,
        reason: error instanceof CacheError ? error.reason : "INVALID_KEY",
        error: errorMessage(error),
      };
    }

    const flightKey = `${keyString(key)}|${fetchOptions.variant ?? ""}`;
    const existing = pending.get(flightKey);
    if (existing) {
      console.log(`[${name}] Joining in-flight fetch for ${describeKey(key)}`);
      return existing;
    }

    const flight = loadAndStore(key, load).finally(() => {
      pending.delete(flightKey);
    });
    pending.set(flightKey, flight);
    return flight;
  }

  return {
    fetch,
    inFlight: () => pending.size,
  };
}
