/**
 * Cache Key Normalization
 *
 * Derives the identity of a cached artifact from (title, optional artist).
 *
 * Invariants:
 * - Keys are compared only in normalized form (lower-cased, trimmed)
 * - A blank or missing artist is "absent", never equal to a named artist
 * - storageId never maps two distinct normalized keys to the same name
 *   through its hash component, whatever their slugs look like
 */

import crypto from "crypto";
import { InvalidKeyError } from "./cache-errors";

export interface CacheKey {
  primary: string;
  secondary?: string | null;
}

export interface NormalizedKey {
  primary: string;
  secondary: string | null;
}

const HASH_LENGTH = 8;
const MAX_SLUG_LENGTH = 48;

/**
 * Lower-case and trim both parts of a key
 */
export function normalizeKey(primary: string, secondary?: string | null): NormalizedKey {
  const normalizedPrimary = primary.trim().toLowerCase();
  if (!normalizedPrimary) {
    throw new InvalidKeyError("Song title must not be empty");
  }

  const normalizedSecondary = secondary?.trim().toLowerCase();

  return {
    primary: normalizedPrimary,
    secondary: normalizedSecondary ? normalizedSecondary : null,
  };
}

export function normalizeCacheKey(key: CacheKey): NormalizedKey {
  return normalizeKey(key.primary, key.secondary);
}

/**
 * Stable string identity of a normalized key, for in-memory maps
 */
export function keyString(key: NormalizedKey): string {
  // JSON keeps null distinct from any string, and quotes any separator
  return JSON.stringify([key.primary, key.secondary]);
}

/**
 * Human-readable form for log lines
 */
export function describeKey(key: NormalizedKey): string {
  return key.secondary ? `'${key.primary}' by '${key.secondary}'` : `'${key.primary}'`;
}

function slugify(value: string): string {
  return value.replace(/[^\p{L}\p{N}]/gu, "_");
}

/**
 * Short content hash of a normalized key
 */
export function keyHash(key: NormalizedKey): string {
  return crypto.createHash("sha256").update(keyString(key), "utf8").digest("hex").slice(0, HASH_LENGTH);
}

/**
 * Filesystem-safe storage name: `{slug}_{hash}`
 */
export function storageId(primary: string, secondary?: string | null): string {
  const key = normalizeKey(primary, secondary);
  const parts = key.secondary ? [key.primary, key.secondary] : [key.primary];
  const slug = Array.from(parts.map(slugify).join("_")).slice(0, MAX_SLUG_LENGTH).join("");

  return `${slug}_${keyHash(key)}`;
}
