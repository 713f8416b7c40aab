// ---------------------------------------------------------------------------
// Tests for the fetch-backed page fetcher.
//
// Mocks global fetch; no request leaves the process.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import pino from "pino";

import { NetworkError } from "../../../src/core/errors.js";
import { createPageFetcher, toNetworkError } from "../../../src/http/page-fetcher.js";

const URL_UNDER_TEST = "https://catalog.example.org/search?q=moby";

function createSilentLogger() {
  return pino({ level: "silent" });
}

describe("createPageFetcher", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    globalThis.fetch = mockFetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  const fetchPage = () =>
    createPageFetcher({ userAgent: "marc-scout-test", logger: createSilentLogger() });

  it("returns the body and reports no redirect", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>ok</html>", { status: 200 }));

    const page = await fetchPage()(URL_UNDER_TEST, { timeoutMs: 1000 });

    expect(page).toEqual({
      requestedUrl: URL_UNDER_TEST,
      finalUrl: URL_UNDER_TEST,
      redirected: false,
      status: 200,
      body: "<html>ok</html>",
    });
    expect(mockFetch).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        redirect: "follow",
        headers: expect.objectContaining({ "User-Agent": "marc-scout-test" }),
      }),
    );
  });

  it("reports the final URL after a redirect", async () => {
    const response = new Response("<html>record</html>", { status: 200 });
    Object.defineProperty(response, "url", { value: "https://catalog.example.org/record/7" });
    Object.defineProperty(response, "redirected", { value: true });
    mockFetch.mockResolvedValueOnce(response);

    const page = await fetchPage()(URL_UNDER_TEST, { timeoutMs: 1000 });

    expect(page.finalUrl).toBe("https://catalog.example.org/record/7");
    expect(page.redirected).toBe(true);
    expect(page.requestedUrl).toBe(URL_UNDER_TEST);
  });

  it("rejects a non-2xx status with an http_status error", async () => {
    mockFetch.mockResolvedValueOnce(new Response("gone", { status: 404 }));

    const attempt = fetchPage()(URL_UNDER_TEST, { timeoutMs: 1000 });

    await expect(attempt).rejects.toBeInstanceOf(NetworkError);
    await expect(attempt).rejects.toMatchObject({
      failure: "http_status",
      status: 404,
      message: `Request to ${URL_UNDER_TEST} failed with HTTP 404`,
    });
  });

  it("maps a connection failure", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(fetchPage()(URL_UNDER_TEST, { timeoutMs: 1000 })).rejects.toMatchObject({
      failure: "connection",
      status: null,
      message: `Network error fetching ${URL_UNDER_TEST}: fetch failed`,
    });
  });

  it("maps a timeout", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    mockFetch.mockRejectedValueOnce(timeout);

    await expect(fetchPage()(URL_UNDER_TEST, { timeoutMs: 50 })).rejects.toMatchObject({
      failure: "timeout",
      message: `Request to ${URL_UNDER_TEST} timed out after 50ms`,
    });
  });
});

describe("toNetworkError", () => {
  it("passes a NetworkError through", () => {
    const original = new NetworkError("boom", URL_UNDER_TEST, "http_status", 500);
    expect(toNetworkError(original, URL_UNDER_TEST, 10)).toBe(original);
  });

  it("includes the cause message of a TypeError", () => {
    const err = new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND") });
    expect(toNetworkError(err, URL_UNDER_TEST, 10).message).toBe(
      `Network error fetching ${URL_UNDER_TEST}: fetch failed: getaddrinfo ENOTFOUND`,
    );
  });

  it("treats anything else as a connection failure", () => {
    const wrapped = toNetworkError("weird", URL_UNDER_TEST, 10);
    expect(wrapped.failure).toBe("connection");
    expect(wrapped.message).toBe(`Fetching ${URL_UNDER_TEST} failed: Unknown fetch error`);
  });
});
