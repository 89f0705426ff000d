/**
 * Lyrics Provider
 *
 * External source of raw lyrics behind the lyrics cache. The default client
 * talks to the LRCLIB search API.
 *
 * Invariants:
 * - "No lyrics" is a null answer, not an error
 * - Transport and server failures propagate to the caller
 */

import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { ProviderError } from "./cache-errors";

export interface ProvidedLyrics {
  lyrics: string;
  /** URL or label identifying where the lyrics came from */
  source: string;
}

export interface LyricsProvider {
  readonly name: string;
  findLyrics(song: string, artist?: string | null): Promise<ProvidedLyrics | null>;
}

export const DEFAULT_LRCLIB_BASE_URL = "https://lrclib.net";

export interface LrclibProviderOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Preconfigured client, e.g. with a custom adapter */
  http?: AxiosInstance;
}

const lrclibTrackSchema = z.object({
  id: z.number(),
  trackName: z.string().nullable().optional(),
  artistName: z.string().nullable().optional(),
  plainLyrics: z.string().nullable().optional(),
});

const lrclibSearchSchema = z.array(lrclibTrackSchema);

export function createLrclibProvider(options: LrclibProviderOptions = {}): LyricsProvider {
  const baseUrl = (options.baseUrl ?? DEFAULT_LRCLIB_BASE_URL).replace(/\/+$/, "");
  const http = options.http ?? axios.create();
  const timeout = options.timeoutMs ?? 5000;

  async function findLyrics(song: string, artist?: string | null): Promise<ProvidedLyrics | null> {
    let data: unknown;
    try {
      const response = await http.get(`${baseUrl}/api/search`, {
        params: {
          track_name: song,
          artist_name: artist?.trim() ? artist.trim() : undefined,
        },
        timeout,
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      throw error;
    }

    const results = lrclibSearchSchema.safeParse(data);
    if (!results.success) {
      throw new ProviderError(`LRCLIB returned an unexpected response: ${results.error.issues[0]?.message}`);
    }

    // First result with plain lyrics is the best match
    const match = results.data.find((track) => track.plainLyrics?.trim());
    if (!match?.plainLyrics) {
      console.log(`[lyrics-provider] No lyrics on LRCLIB for ${song}${artist ? ` by ${artist}` : ""}`);
      return null;
    }

    return {
      lyrics: match.plainLyrics,
      source: `${baseUrl}/api/get/${match.id}`,
    };
  }

  return {
    name: "lrclib",
    findLyrics,
  };
}
