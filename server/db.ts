import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import fs from "fs-extra";
import path from "path";
import * as schema from "../drizzle/schema";

export type CacheDb = BetterSQLite3Database<typeof schema>;

/**
 * Run `fn` against a connection opened for this call only.
 * The connection is closed on every exit path, including throws.
 *
 * @param dbPath - SQLite file; created with its directory when missing
 */
export function withCacheDb<T>(dbPath: string, fn: (db: CacheDb) => T): T {
  fs.ensureDirSync(path.dirname(dbPath));
  const sqlite = new Database(dbPath);

  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("busy_timeout = 5000");
    sqlite.exec(schema.LYRICS_CACHE_DDL);
    return fn(drizzle(sqlite, { schema }));
  } finally {
    sqlite.close();
  }
}

/**
 * Whether a cache database exists yet; reads skip opening (and creating) it
 */
export async function cacheDbExists(dbPath: string): Promise<boolean> {
  return fs.pathExists(dbPath);
}
