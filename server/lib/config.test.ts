import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { createCacheConfig, loadCacheConfig, DEFAULT_DATA_DIR } from "./config";

describe("Cache Config", () => {
  describe("createCacheConfig", () => {
    it("should place stores under the default data dir", () => {
      const config = createCacheConfig();
      expect(config.lyricsDbPath).toBe(`${DEFAULT_DATA_DIR}/lyrics_cache.db`);
      expect(config.vocabCacheDir).toBe(`${DEFAULT_DATA_DIR}/vocab_cache`);
      expect(config.compressionLevel).toBe(6);
      expect(config.notFoundTtlSeconds).toBe(300);
      expect(config.clock()).toBeInstanceOf(Date);
    });

    it("should derive paths from a custom data dir", () => {
      const config = createCacheConfig({ dataDir: "/srv/cache" });
      expect(config.lyricsDbPath).toBe("/srv/cache/lyrics_cache.db");
      expect(config.vocabCacheDir).toBe("/srv/cache/vocab_cache");
    });

    it("should prefer explicit paths over the data dir", () => {
      const config = createCacheConfig({ dataDir: "/srv/cache", lyricsDbPath: "/var/db/lyrics.db" });
      expect(config.lyricsDbPath).toBe("/var/db/lyrics.db");
      expect(config.vocabCacheDir).toBe("/srv/cache/vocab_cache");
    });

    it("should reject compression levels outside 0-9", () => {
      expect(() => createCacheConfig({ compressionLevel: 12 })).toThrow(ZodError);
    });
  });

  describe("loadCacheConfig", () => {
    it("should read overrides from the environment", () => {
      const config = loadCacheConfig({
        CACHE_DATA_DIR: "/data",
        LYRICS_COMPRESSION_LEVEL: "9",
        LYRICS_NOT_FOUND_TTL: "0",
      });
      expect(config.lyricsDbPath).toBe("/data/lyrics_cache.db");
      expect(config.compressionLevel).toBe(9);
      expect(config.notFoundTtlSeconds).toBe(0);
    });

    it("should fall back to defaults for an empty environment", () => {
      const config = loadCacheConfig({});
      expect(config.vocabCacheDir).toBe(`${DEFAULT_DATA_DIR}/vocab_cache`);
      expect(config.compressionLevel).toBe(6);
    });

    it("should reject a non-numeric compression level", () => {
      expect(() => loadCacheConfig({ LYRICS_COMPRESSION_LEVEL: "fast" })).toThrow(ZodError);
    });
  });
});
