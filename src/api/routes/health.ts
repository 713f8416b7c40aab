// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";

import type { LibraryStore } from "../../config/library-store.js";
import type { SearchController } from "../../search/search-controller.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  store: LibraryStore;
  searchController: SearchController;
}

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health` -- Liveness probe with library count and search state.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
      libraries: deps.store.size,
      search: deps.searchController.snapshot().state,
      libraryFileDirty: deps.store.isDirty,
    });
  });

  return app;
}
