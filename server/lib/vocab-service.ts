/**
 * Vocabulary Service
 *
 * File-per-song cache of vocabulary extracted from lyrics. Extraction itself
 * belongs to a VocabExtractor; this service only stores and serves results.
 *
 * Invariants:
 * - fetchVocabulary never extracts; it only probes the cache
 * - Unreadable cache files read as a miss
 * - Never throws to the caller
 */

import { CacheConfig } from "./config";
import { CacheListing, ContentCache, DeleteResult } from "./content-cache";
import { FailureReason, ProviderError, errorMessage, toFailureReason } from "./cache-errors";
import { NormalizedKey, describeKey } from "./cache-key";
import { createRecordStore } from "./record-store";
import { LoadResult, createReadThroughCache } from "./read-through";
import { EvictionReport, runEviction } from "./eviction";
import { VocabExtractor, VocabularyItem, VocabularyPayload, vocabularyPayloadSchema } from "./vocabulary";

export interface VocabularyCacheInfo {
  fromCache: boolean;
  cachedAt?: string;
  filePath?: string;
  stored?: boolean;
  writeError?: string;
  recoveredFrom?: FailureReason;
}

export interface FetchVocabularyResult {
  success: boolean;
  vocabulary?: VocabularyItem[];
  cacheInfo?: VocabularyCacheInfo;
  reason?: FailureReason;
  error?: string;
}

export interface ExtractVocabularyResult {
  success: boolean;
  /** Full payload, including fields the extractor added */
  payload?: VocabularyPayload;
  cacheInfo?: VocabularyCacheInfo;
  reason?: FailureReason;
  error?: string;
}

export interface SaveVocabularyResult {
  success: boolean;
  filePath?: string;
  cachedAt?: string;
  reason?: FailureReason;
  error?: string;
}

export interface ListVocabularyResult {
  success: boolean;
  entries: CacheListing[];
  count: number;
  error?: string;
}

export interface VocabularyServiceOptions {
  config: CacheConfig;
  /** Defaults to JSON files under config.vocabCacheDir */
  store?: ContentCache<VocabularyPayload>;
}

export interface VocabularyService {
  fetchVocabulary(song: string, artist?: string | null): Promise<FetchVocabularyResult>;
  saveVocabulary(song: string, artist: string | null, payload: unknown): Promise<SaveVocabularyResult>;
  getOrExtractVocabulary(
    song: string,
    artist: string | null,
    lyrics: string,
    extractor: VocabExtractor
  ): Promise<ExtractVocabularyResult>;
  listCachedVocabulary(): Promise<ListVocabularyResult>;
  evictVocabularyCache(maxEntries?: number, maxAgeDays?: number): Promise<EvictionReport>;
  deleteCachedVocabulary(song: string, artist?: string | null): Promise<DeleteResult>;
}

export function createVocabularyService(options: VocabularyServiceOptions): VocabularyService {
  const { config } = options;
  const store =
    options.store ??
    createRecordStore({ dir: config.vocabCacheDir, schema: vocabularyPayloadSchema, clock: config.clock });

  const readThrough = createReadThroughCache<VocabularyPayload, VocabularyPayload>({
    name: "vocab-cache",
    store,
    encode: (payload) => payload,
    decode: (stored) => stored,
  });

  async function fetchVocabulary(song: string, artist: string | null = null): Promise<FetchVocabularyResult> {
    try {
      const record = await store.get({ primary: song, secondary: artist });
      if (!record) {
        return { success: false, reason: "NOT_FOUND", error: "No cached vocabulary for this song" };
      }

      console.log(`[vocab-service] Cache hit for ${describeKey(record.key)}`);
      return {
        success: true,
        vocabulary: record.value.vocabulary,
        cacheInfo: { fromCache: true, cachedAt: record.createdAt.toISOString(), filePath: record.location },
      };
    } catch (error) {
      const reason = toFailureReason(error);
      if (reason === "INVALID_KEY") {
        return { success: false, reason, error: errorMessage(error) };
      }

      console.warn(`[vocab-service] Cached vocabulary unusable (${reason}), treating as miss: ${errorMessage(error)}`);
      return {
        success: false,
        reason: "NOT_FOUND",
        error: "No cached vocabulary for this song",
        cacheInfo: { fromCache: false, recoveredFrom: reason },
      };
    }
  }

  async function saveVocabulary(song: string, artist: string | null, payload: unknown): Promise<SaveVocabularyResult> {
    const parsed = vocabularyPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        success: false,
        reason: "INVALID_ARGUMENT",
        error: `Invalid vocabulary payload: ${parsed.error.issues[0]?.message}`,
      };
    }

    try {
      const record = await store.put({ primary: song, secondary: artist }, parsed.data);
      console.log(`[vocab-service] Saved vocabulary for ${describeKey(record.key)} to ${record.location}`);
      return { success: true, filePath: record.location, cachedAt: record.createdAt.toISOString() };
    } catch (error) {
      console.error(`[vocab-service] Failed to save vocabulary: ${errorMessage(error)}`);
      return { success: false, reason: toFailureReason(error), error: errorMessage(error) };
    }
  }

  async function getOrExtractVocabulary(
    song: string,
    artist: string | null,
    lyrics: string,
    extractor: VocabExtractor
  ): Promise<ExtractVocabularyResult> {
    const load = async (key: NormalizedKey): Promise<LoadResult<VocabularyPayload>> => {
      console.log(`[vocab-service] Extracting vocabulary for ${describeKey(key)} with ${extractor.name}`);
      const extracted = await extractor.extract(lyrics);
      if (!extracted) {
        return { status: "not_found" };
      }

      const parsed = vocabularyPayloadSchema.safeParse(extracted);
      if (!parsed.success) {
        throw new ProviderError(`${extractor.name} returned invalid vocabulary: ${parsed.error.issues[0]?.message}`);
      }
      return { status: "found", value: parsed.data, metadata: { source: extractor.name } };
    };

    const result = await readThrough.fetch({ primary: song, secondary: artist }, load, { variant: extractor.name });
    if (!result.success) {
      const failure: ExtractVocabularyResult = { success: false, reason: result.reason, error: result.error };
      if (result.recoveredFrom) {
        failure.cacheInfo = { fromCache: false, recoveredFrom: result.recoveredFrom };
      }
      return failure;
    }

    const { provenance } = result;
    if (provenance.fromCache) {
      return {
        success: true,
        payload: result.value,
        cacheInfo: { fromCache: true, cachedAt: provenance.cachedAt, filePath: provenance.location },
      };
    }

    const cacheInfo: VocabularyCacheInfo = { fromCache: false, stored: provenance.stored !== null };
    if (provenance.location) {
      cacheInfo.filePath = provenance.location;
    }
    if (provenance.writeError) {
      cacheInfo.writeError = provenance.writeError;
    }
    if (provenance.recoveredFrom) {
      cacheInfo.recoveredFrom = provenance.recoveredFrom;
    }
    return { success: true, payload: result.value, cacheInfo };
  }

  async function listCachedVocabulary(): Promise<ListVocabularyResult> {
    try {
      const entries = await store.list();
      return { success: true, entries, count: entries.length };
    } catch (error) {
      console.error(`[vocab-service] Failed to list cached vocabulary: ${errorMessage(error)}`);
      return { success: false, entries: [], count: 0, error: errorMessage(error) };
    }
  }

  async function evictVocabularyCache(maxEntries?: number, maxAgeDays?: number): Promise<EvictionReport> {
    return runEviction(store, { maxEntries, maxAgeDays });
  }

  async function deleteCachedVocabulary(song: string, artist: string | null = null): Promise<DeleteResult> {
    try {
      return { success: true, deleted: await store.delete({ primary: song, secondary: artist }) };
    } catch (error) {
      console.error(`[vocab-service] Failed to delete cached vocabulary: ${errorMessage(error)}`);
      return { success: false, deleted: false, error: errorMessage(error) };
    }
  }

  return {
    fetchVocabulary,
    saveVocabulary,
    getOrExtractVocabulary,
    listCachedVocabulary,
    evictVocabularyCache,
    deleteCachedVocabulary,
  };
}
