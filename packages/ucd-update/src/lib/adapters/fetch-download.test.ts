import { describe, it, expect, vi } from "vitest";
import { createFetchDownloadService, decodeUtf8 } from "./fetch-download.js";
import { CLIError } from "../errors/types.js";

const URL_UNDER_TEST = "https://ucd.test/ucd/UnicodeData.txt";

async function captureError(promise: Promise<unknown>): Promise<CLIError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CLIError) return error;
    throw error;
  }
  throw new Error("expected promise to reject");
}

describe("createFetchDownloadService", () => {
  it("returns the decoded body of a successful response", async () => {
    const fetchImpl = vi.fn(async () => new Response("0041;LATIN CAPITAL LETTER A\n"));
    const service = createFetchDownloadService(fetchImpl);

    await expect(service.fetchText(URL_UNDER_TEST)).resolves.toBe("0041;LATIN CAPITAL LETTER A\n");
    expect(fetchImpl).toHaveBeenCalledWith(URL_UNDER_TEST);
  });

  it("decodes multi-byte UTF-8", async () => {
    const bytes = new TextEncoder().encode("00E9;é\n");
    const service = createFetchDownloadService(vi.fn(async () => new Response(bytes)));

    await expect(service.fetchText(URL_UNDER_TEST)).resolves.toBe("00E9;é\n");
  });

  it("rejects non-success statuses", async () => {
    const service = createFetchDownloadService(
      vi.fn(async () => new Response("missing", { status: 404, statusText: "Not Found" }))
    );

    const error = await captureError(service.fetchText(URL_UNDER_TEST));

    expect(error.code).toBe("NETWORK_HTTP_STATUS");
    expect(error.message).toBe("Download failed with HTTP 404 Not Found");
    expect(error.details).toBe(URL_UNDER_TEST);
  });

  it("cancels the body of a non-success response", async () => {
    const response = new Response("server error page", { status: 502, statusText: "Bad Gateway" });
    if (!response.body) throw new Error("expected a response body");
    const cancelSpy = vi.spyOn(response.body, "cancel");
    const service = createFetchDownloadService(vi.fn(async () => response));

    const error = await captureError(service.fetchText(URL_UNDER_TEST));

    expect(error.code).toBe("NETWORK_HTTP_STATUS");
    expect(cancelSpy).toHaveBeenCalledTimes(1);
  });

  it("reports a malformed URL as a request failure", async () => {
    const service = createFetchDownloadService(vi.fn().mockRejectedValue(new TypeError("Invalid URL")));

    const error = await captureError(service.fetchText("not a url"));

    expect(error.code).toBe("NETWORK_REQUEST_FAILED");
    expect(error.message).toBe("Can't reach not a url");
    expect(error.details).toBe("not a url: Invalid URL");
  });

  it("wraps transport failures", async () => {
    const cause = new TypeError("fetch failed");
    const service = createFetchDownloadService(vi.fn().mockRejectedValue(cause));

    const error = await captureError(service.fetchText(URL_UNDER_TEST));

    expect(error.code).toBe("NETWORK_REQUEST_FAILED");
    expect(error.message).toBe("Can't reach ucd.test");
    expect(error.details).toBe(`${URL_UNDER_TEST}: fetch failed`);
    expect(error.cause).toBe(cause);
  });

  it("rejects bodies that are not valid UTF-8", async () => {
    const service = createFetchDownloadService(
      vi.fn(async () => new Response(new Uint8Array([0x61, 0xff, 0x62])))
    );

    const error = await captureError(service.fetchText(URL_UNDER_TEST));

    expect(error.code).toBe("DECODE_INVALID_UTF8");
    expect(error.details).toBe(URL_UNDER_TEST);
  });
});

describe("decodeUtf8", () => {
  it("keeps a leading byte order mark", () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x61]);
    expect(decodeUtf8(bytes, URL_UNDER_TEST)).toBe("\ufeffa");
  });

  it("rejects a truncated multi-byte sequence", () => {
    const bytes = new Uint8Array([0x61, 0xc3]);
    expect(() => decodeUtf8(bytes, URL_UNDER_TEST)).toThrow("Response is not valid UTF-8 text");
  });
});
