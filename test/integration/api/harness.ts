// ---------------------------------------------------------------------------
// Shared wiring for the API integration tests: a real app over a temp
// library file, with the page fetcher replaced by a vi.fn.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { vi, type Mock } from "vitest";

import { createApp } from "../../../src/api/server.js";
import { LibraryStore } from "../../../src/config/library-store.js";
import type { AppConfig, FetchedPage, LibraryEndpoint, PageFetcher } from "../../../src/core/types.js";
import { SourceFetcher } from "../../../src/scrape/source-fetcher.js";
import { SearchController } from "../../../src/search/search-controller.js";

export interface TestHarness {
  app: ReturnType<typeof createApp>;
  store: LibraryStore;
  searchController: SearchController;
  fetchPage: Mock<PageFetcher>;
  cleanup: () => void;
}

export const ALPHA: LibraryEndpoint = {
  name: "Alpha",
  isbnUrl: "https://alpha.example.org/search?isbn={isbn}",
  titleAuthorUrl: "https://alpha.example.org/search?t={title}&a={author}",
};

export const BETA: LibraryEndpoint = {
  name: "Beta",
  isbnUrl: "https://beta.example.org/search?isbn={isbn}",
  titleAuthorUrl: "https://beta.example.org/search?t={title}&a={author}",
};

export function page(url: string, body: string): FetchedPage {
  return { requestedUrl: url, finalUrl: url, redirected: false, status: 200, body };
}

export function createHarness(env: AppConfig["env"] = "development"): TestHarness {
  const logger = pino({ level: "silent" });
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "marc-scout-api-"));
  const store = new LibraryStore(path.join(dir, "libraries.json"), logger);
  store.load();

  const fetchPage = vi.fn<PageFetcher>();
  const searchController = new SearchController({
    endpoints: store,
    fetchPage,
    timeoutMs: 1000,
    logger,
  });
  const sourceFetcher = new SourceFetcher({ fetchPage, timeoutMs: 1000, logger });

  return {
    app: createApp({ store, searchController, sourceFetcher, logger, env }),
    store,
    searchController,
    fetchPage,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

/** JSON request init for `app.request`. */
export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}
