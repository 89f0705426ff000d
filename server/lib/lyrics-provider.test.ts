import { describe, it, expect } from "vitest";
import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { createLrclibProvider } from "./lyrics-provider";
import { ProviderError } from "./cache-errors";

type Responder = (config: InternalAxiosRequestConfig) => AxiosResponse;

/**
 * Axios client answering in process; records each request config
 */
function stubHttp(respond: Responder) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      return respond(config);
    },
  });
  return { http, requests };
}

function reply(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: "OK", headers: {}, config };
}

describe("LRCLIB provider", () => {
  it("should query by title and artist and return the first plain lyrics", async () => {
    const { http, requests } = stubHttp((config) =>
      reply(config, [
        { id: 1, trackName: "Lemon", artistName: "Kenshi Yonezu", plainLyrics: null },
        { id: 2, trackName: "Lemon", artistName: "Kenshi Yonezu", plainLyrics: "月の光" },
      ])
    );
    const provider = createLrclibProvider({ baseUrl: "https://lyrics.test/", http });

    const result = await provider.findLyrics("Lemon", "Kenshi Yonezu");

    expect(result).toEqual({ lyrics: "月の光", source: "https://lyrics.test/api/get/2" });
    expect(requests[0].url).toBe("https://lyrics.test/api/search");
    expect(requests[0].params).toEqual({ track_name: "Lemon", artist_name: "Kenshi Yonezu" });
  });

  it("should leave out a blank artist", async () => {
    const { http, requests } = stubHttp((config) => reply(config, []));

    await createLrclibProvider({ http }).findLyrics("Lemon", "  ");

    expect(requests[0].params).toEqual({ track_name: "Lemon", artist_name: undefined });
  });

  it("should answer null when nothing has lyrics", async () => {
    const { http } = stubHttp((config) => reply(config, [{ id: 3, plainLyrics: "   " }]));

    expect(await createLrclibProvider({ http }).findLyrics("Instrumental")).toBeNull();
  });

  it("should answer null on a 404", async () => {
    const { http } = stubHttp((config) => {
      const response = reply(config, { message: "not found" }, 404);
      throw new AxiosError("Request failed with status code 404", "ERR_BAD_REQUEST", config, null, response);
    });

    expect(await createLrclibProvider({ http }).findLyrics("Missing")).toBeNull();
  });

  it("should propagate server and transport errors", async () => {
    const { http } = stubHttp((config) => {
      throw new AxiosError("timeout of 5000ms exceeded", "ECONNABORTED", config);
    });

    await expect(createLrclibProvider({ http }).findLyrics("Lemon")).rejects.toThrow("timeout of 5000ms exceeded");
  });

  it("should reject a response of the wrong shape", async () => {
    const { http } = stubHttp((config) => reply(config, { unexpected: true }));

    await expect(createLrclibProvider({ http }).findLyrics("Lemon")).rejects.toBeInstanceOf(ProviderError);
  });
});
