/**
 * Compression Codec
 *
 * zlib deflate followed by base64, so compressed lyrics fit a TEXT column.
 * The level only affects compression; any level decodes the same way.
 */

import zlib from "zlib";
import { z } from "zod";
import { DecodeError } from "./cache-errors";

export const COMPRESSION_ALGORITHM = "zlib+base64";

export interface CompressionStats {
  originalSizeBytes: number;
  compressedSizeBytes: number;
  encodedSizeBytes: number;
  /** original / encoded */
  ratio: number;
  algorithm: typeof COMPRESSION_ALGORITHM;
  level: number;
}

export interface CompressedText {
  encoded: string;
  stats: CompressionStats;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

// Shape of inflateSync(..., { info: true })
const inflateInfoSchema = z.object({
  buffer: z.instanceof(Buffer),
  engine: z.object({ bytesWritten: z.number() }),
});

export function compressText(text: string, level: number = 6): CompressedText {
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new RangeError(`Compression level must be an integer from 0 to 9, got ${level}`);
  }

  const original = Buffer.from(text, "utf8");
  const compressed = zlib.deflateSync(original, { level });
  const encoded = compressed.toString("base64");

  return {
    encoded,
    stats: {
      originalSizeBytes: original.length,
      compressedSizeBytes: compressed.length,
      encodedSizeBytes: encoded.length,
      ratio: encoded.length > 0 ? original.length / encoded.length : 0,
      algorithm: COMPRESSION_ALGORITHM,
      level,
    },
  };
}

export function decompressText(encoded: string): string {
  // Buffer.from(..., "base64") silently skips invalid characters
  if (!encoded || !BASE64_PATTERN.test(encoded)) {
    throw new DecodeError("Stored payload is not valid base64");
  }

  const compressed = Buffer.from(encoded, "base64");
  let info: unknown;
  try {
    info = zlib.inflateSync(compressed, { info: true });
  } catch (error) {
    throw new DecodeError("Stored payload is not a valid zlib stream", { cause: error });
  }

  const parsed = inflateInfoSchema.safeParse(info);
  if (!parsed.success) {
    throw new DecodeError("Stored payload is not a valid zlib stream", { cause: parsed.error });
  }
  // inflate stops at the end of the stream and ignores anything after it
  if (parsed.data.engine.bytesWritten !== compressed.length) {
    throw new DecodeError("Stored payload has trailing data");
  }
  const inflated = parsed.data.buffer;

  try {
    return utf8Decoder.decode(inflated);
  } catch (error) {
    throw new DecodeError("Stored payload is not valid UTF-8", { cause: error });
  }
}

/**
 * Format a byte count: "512 B", "2.0 KB", "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatCompressionStats(stats: CompressionStats): string {
  return `${formatBytes(stats.originalSizeBytes)} -> ${formatBytes(stats.encodedSizeBytes)} (${stats.ratio.toFixed(2)}x, ${stats.algorithm} level ${stats.level})`;
}
