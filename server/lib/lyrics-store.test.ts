import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { createLyricsStore } from "./lyrics-store";
import { compressText, CompressedText } from "./compression";
import { StoreError } from "./cache-errors";
import { ContentCache, DAY_MS } from "./content-cache";

const START = Date.UTC(2026, 0, 1);

describe.sequential("Lyrics Store", () => {
  let testDir: string;
  let dbPath: string;
  let now: number;
  let store: ContentCache<CompressedText>;

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `lyrics-store-test-${Date.now()}-${Math.random()}`);
    await fs.ensureDir(testDir);
    dbPath = path.join(testDir, "lyrics_cache.db");
    now = START;
    store = createLyricsStore({ dbPath, clock: () => new Date(now) });
  });

  afterEach(async () => {
    try {
      await fs.remove(testDir);
    } catch (e) {
      // Ignore cleanup errors
    }
  });

  describe("get", () => {
    it("should return null without creating the database", async () => {
      expect(await store.get({ primary: "Lemon" })).toBeNull();
      expect(await fs.pathExists(dbPath)).toBe(false);
    });

    it("should return what was put", async () => {
      const value = compressText("月の光が窓をたたく夜に");
      await store.put({ primary: "Lemon", secondary: "Kenshi Yonezu" }, value, { source: "https://example.test/lemon" });

      const record = await store.get({ primary: "lemon", secondary: "KENSHI YONEZU " });

      expect(record?.value).toEqual(value);
      expect(record?.key).toEqual({ primary: "lemon", secondary: "kenshi yonezu" });
      expect(record?.metadata.source).toBe("https://example.test/lemon");
      expect(record?.location).toBe(dbPath);
    });

    it("should refresh the access time on a hit", async () => {
      await store.put({ primary: "Lemon" }, compressText("a"));
      now = START + 60_000;

      const record = await store.get({ primary: "Lemon" });

      expect(record?.createdAt.getTime()).toBe(START);
      expect(record?.accessedAt.getTime()).toBe(START + 60_000);
      const [listing] = await store.list();
      expect(listing.lastAccessed).toBe(new Date(START + 60_000).toISOString());
    });

    it("should match a missing artist only against entries without one", async () => {
      await store.put({ primary: "Same Song", secondary: "Artist 1" }, compressText("one"));

      expect(await store.get({ primary: "Same Song" })).toBeNull();

      await store.put({ primary: "Same Song" }, compressText("none"));
      const record = await store.get({ primary: "Same Song" });
      expect(record?.key.secondary).toBeNull();
      expect(record?.value.encoded).toBe(compressText("none").encoded);
    });

    it("should keep two artists of the same title apart", async () => {
      const first = compressText("first payload");
      const second = compressText("second payload");
      await store.put({ primary: "Same Song", secondary: "Artist 1" }, first);
      await store.put({ primary: "Same Song", secondary: "Artist 2" }, second);

      expect((await store.get({ primary: "Same Song", secondary: "Artist 1" }))?.value).toEqual(first);
      expect((await store.get({ primary: "Same Song", secondary: "Artist 2" }))?.value).toEqual(second);
      expect(await store.count()).toBe(2);
    });

    it("should surface a malformed row as a StoreError", async () => {
      await store.put({ primary: "Broken" }, compressText("x"));
      const sqlite = new Database(dbPath);
      sqlite.prepare("UPDATE lyrics_cache SET compressionInfo = ?").run("{not json");
      sqlite.close();

      await expect(store.get({ primary: "Broken" })).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe("put", () => {
    it("should update an existing key in place", async () => {
      await store.put({ primary: "Lemon" }, compressText("old"), { source: "a" });
      now = START + 5_000;
      const record = await store.put({ primary: " LEMON " }, compressText("new"), { source: "b" });

      expect(await store.count()).toBe(1);
      expect(record.createdAt.getTime()).toBe(START);
      expect(record.accessedAt.getTime()).toBe(START + 5_000);
      expect(record.value.encoded).toBe(compressText("new").encoded);
      expect(record.metadata.source).toBe("b");
    });

    it("should store the language hint in its own column", async () => {
      await store.put({ primary: "Lemon" }, compressText("x"), { language: "japanese" });
      const sqlite = new Database(dbPath);
      const row = sqlite.prepare("SELECT language, sourceUrl FROM lyrics_cache").get();
      sqlite.close();

      expect(row).toEqual({ language: "japanese", sourceUrl: null });
    });
  });

  describe("list", () => {
    it("should be empty when no database exists", async () => {
      expect(await store.list()).toEqual([]);
    });

    it("should order by most recent access", async () => {
      await store.put({ primary: "A" }, compressText("a"));
      now += 1_000;
      await store.put({ primary: "B", secondary: "Band" }, compressText("b"));
      now += 1_000;
      await store.get({ primary: "A" });

      const listing = await store.list();

      expect(listing.map((entry) => entry.primary)).toEqual(["a", "b"]);
      expect(listing[1]).toEqual({
        primary: "b",
        secondary: "band",
        cachedAt: new Date(START + 1_000).toISOString(),
        lastAccessed: new Date(START + 1_000).toISOString(),
        sizeBytes: compressText("b").encoded.length,
        location: dbPath,
        origin: { kind: "parsed" },
      });
    });
  });

  describe("delete", () => {
    it("should remove only the given key", async () => {
      await store.put({ primary: "A" }, compressText("a"));
      await store.put({ primary: "B" }, compressText("b"));

      expect(await store.delete({ primary: "a" })).toBe(true);
      expect(await store.delete({ primary: "a" })).toBe(false);
      expect(await store.count()).toBe(1);
    });
  });

  describe("eviction primitives", () => {
    it("should delete entries older than the age limit", async () => {
      const ages = [100, 50, 10];
      for (const age of ages) {
        now = START - age * DAY_MS;
        await store.put({ primary: `song ${age}` }, compressText(`aged ${age}`));
      }
      now = START;

      expect(await store.deleteOlderThan(30)).toBe(2);
      expect((await store.list()).map((entry) => entry.primary)).toEqual(["song 10"]);
    });

    it("should delete the least recently accessed excess", async () => {
      for (let i = 0; i < 15; i++) {
        now = START + i * 1_000;
        await store.put({ primary: `song ${i}` }, compressText(`payload ${i}`));
      }
      for (let i = 0; i < 5; i++) {
        now = START + 100_000 + i * 1_000;
        await store.get({ primary: `song ${i}` });
      }

      expect(await store.deleteLeastRecentlyAccessedExcess(10)).toBe(5);

      const kept = (await store.list()).map((entry) => entry.primary).sort();
      const expected = [0, 1, 2, 3, 4, 10, 11, 12, 13, 14].map((i) => `song ${i}`).sort();
      expect(kept).toEqual(expected);
    });

    it("should break access-time ties by insertion order", async () => {
      for (const name of ["first", "second", "third"]) {
        await store.put({ primary: name }, compressText(name));
      }

      expect(await store.deleteLeastRecentlyAccessedExcess(1)).toBe(2);
      expect((await store.list()).map((entry) => entry.primary)).toEqual(["third"]);
    });

    it("should report the total encoded size", async () => {
      const a = compressText("alpha");
      const b = compressText("beta beta beta");
      await store.put({ primary: "A" }, a);
      await store.put({ primary: "B" }, b);

      expect(await store.totalBytes()).toBe(a.encoded.length + b.encoded.length);
    });

    it("should treat a missing database as empty", async () => {
      expect(await store.count()).toBe(0);
      expect(await store.totalBytes()).toBe(0);
      expect(await store.deleteOlderThan(1)).toBe(0);
      expect(await store.deleteLeastRecentlyAccessedExcess(0)).toBe(0);
    });
  });
});
