// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";

import type { LibraryStore } from "../config/library-store.js";
import type { AppConfig } from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import type { SourceFetcher } from "../scrape/source-fetcher.js";
import type { SearchController } from "../search/search-controller.js";

import { createRequestLogger } from "../logging/context.js";
import type { AppEnv } from "./env.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";

import { healthRoutes } from "./routes/health.js";
import { libraryRoutes } from "./routes/libraries.js";
import { recordRoutes } from "./routes/records.js";
import { scrapeRoutes } from "./routes/scrape.js";
import { searchRoutes } from "./routes/search.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  store: LibraryStore;
  searchController: SearchController;
  sourceFetcher: SourceFetcher;
  logger: Logger;
  /** Controls whether 5xx messages reach the client. */
  env: AppConfig["env"];
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      service: "marc-scout",
      routes: ["/health", "/libraries", "/search", "/scrape", "/records"],
    }),
  );

  app.route("/health", healthRoutes({ store: deps.store, searchController: deps.searchController }));
  app.route("/libraries", libraryRoutes({ store: deps.store }));
  app.route("/search", searchRoutes({ searchController: deps.searchController }));
  app.route("/scrape", scrapeRoutes({ sourceFetcher: deps.sourceFetcher }));
  app.route("/records", recordRoutes());

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(createErrorHandler(deps.env));

  return app;
}
