// ---------------------------------------------------------------------------
// MARC scout -- application bootstrap shared by the server and the CLI.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";

import type { AppEnv } from "./api/env.js";
import { createApp } from "./api/server.js";
import { loadConfig } from "./config/config.js";
import { LibraryStore } from "./config/library-store.js";
import type { AppConfig } from "./core/types.js";
import { createPageFetcher } from "./http/page-fetcher.js";
import { createLogger, type Logger } from "./logging/logger.js";
import { SourceFetcher } from "./scrape/source-fetcher.js";
import { SearchController } from "./search/search-controller.js";

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  store: LibraryStore;
  searchController: SearchController;
  sourceFetcher: SourceFetcher;
}

/** Build every long-lived service from configuration. */
export function createRuntime(config: AppConfig = loadConfig()): Runtime {
  // 1. Create logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
    redactSecrets: true,
  });

  // 2. Load the library list
  const store = new LibraryStore(config.libraryFile, logger);
  store.load();

  // 3. HTTP capability, scraper and search controller
  const fetchPage = createPageFetcher({ userAgent: config.http.userAgent, logger });

  const sourceFetcher = new SourceFetcher({
    fetchPage,
    timeoutMs: config.http.scrapeTimeoutMs,
    logger: logger.child({ module: "scrape" }),
  });

  const searchController = new SearchController({
    endpoints: store,
    fetchPage,
    timeoutMs: config.http.searchTimeoutMs,
    logger: logger.child({ module: "search" }),
  });

  return { config, logger, store, searchController, sourceFetcher };
}

/** Build the Hono app and the runtime behind it. */
export function buildApp(config?: AppConfig): { app: Hono<AppEnv>; runtime: Runtime } {
  const runtime = createRuntime(config);
  const app = createApp({
    store: runtime.store,
    searchController: runtime.searchController,
    sourceFetcher: runtime.sourceFetcher,
    logger: runtime.logger,
    env: runtime.config.env,
  });

  runtime.logger.info(
    {
      port: runtime.config.port,
      env: runtime.config.env,
      libraries: runtime.store.size,
    },
    "marc-scout ready",
  );

  return { app, runtime };
}
