// ---------------------------------------------------------------------------
// Integration tests for the service index and /health.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { ALPHA, createHarness, type TestHarness } from "./harness.js";

describe("GET /health", () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(() => {
    h.cleanup();
  });

  it("reports library count and search state", async () => {
    h.store.add(ALPHA);

    const res = await h.app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      libraries: 1,
      search: "idle",
      libraryFileDirty: false,
    });
  });

  it("lists the service routes at the root", async () => {
    const res = await h.app.request("/");

    expect(await res.json()).toEqual({
      service: "marc-scout",
      routes: ["/health", "/libraries", "/search", "/scrape", "/records"],
    });
  });

  it("echoes a safe client request id", async () => {
    const res = await h.app.request("/health", { headers: { "X-Request-ID": "client-42" } });
    expect(res.headers.get("X-Request-ID")).toBe("client-42");
  });

  it("replaces an unsafe request id", async () => {
    const res = await h.app.request("/health", { headers: { "X-Request-ID": "bad id!" } });
    const id = res.headers.get("X-Request-ID");
    expect(id).not.toBe("bad id!");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("returns 404 for unknown paths", async () => {
    const res = await h.app.request("/nope");
    expect(res.status).toBe(404);
  });
});
