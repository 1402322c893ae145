import type { DownloadService } from "../ports/download.js";
import { httpStatus, invalidUtf8, networkRequestFailed } from "../errors/catalog.js";

/**
 * Decode bytes as UTF-8, failing on malformed sequences.
 * A leading byte order mark is kept in the output.
 */
export function decodeUtf8(bytes: ArrayBuffer | Uint8Array, url: string): string {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw invalidUtf8(url, error);
  }
}

/**
 * Create a download service using fetch.
 * Each call is an independent request with no timeout or retry.
 */
export function createFetchDownloadService(
  fetchImpl: typeof fetch = globalThis.fetch
): DownloadService {
  return {
    async fetchText(url: string): Promise<string> {
      let response: Response;
      let body: ArrayBuffer;

      try {
        response = await fetchImpl(url);
      } catch (error) {
        throw networkRequestFailed(url, error);
      }

      if (!response.ok) {
        // Release the connection before reporting the status.
        await response.body?.cancel();
        throw httpStatus(url, response.status, response.statusText);
      }

      try {
        body = await response.arrayBuffer();
      } catch (error) {
        throw networkRequestFailed(url, error);
      }

      return decodeUtf8(body, url);
    },
  };
}

/**
 * Default download service instance.
 */
export const fetchDownloadService = createFetchDownloadService();
