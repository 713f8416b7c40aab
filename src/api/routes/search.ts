// ---------------------------------------------------------------------------
// Search routes: start (POST + poll), status, and cancel.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import type { SearchQuery, SearchScope } from "../../core/types.js";
import type { SearchController } from "../../search/search-controller.js";
import type { AppEnv } from "../env.js";
import { readJsonBody } from "../request-body.js";

/** Dependencies required by search routes. */
export interface SearchRouteDeps {
  searchController: SearchController;
}

const IndexSchema = z.number().int().nonnegative().optional();

const SearchBodySchema = z.union([
  z.object({ isbn: z.string(), index: IndexSchema }),
  z.object({ title: z.string(), author: z.string(), index: IndexSchema }),
]);

type SearchBody = z.infer<typeof SearchBodySchema>;

function toQuery(body: SearchBody): SearchQuery {
  return "isbn" in body
    ? { kind: "isbn", isbn: body.isbn }
    : { kind: "title_author", title: body.title, author: body.author };
}

function toScope(body: SearchBody): SearchScope {
  return body.index === undefined ? { kind: "all" } : { kind: "single", index: body.index };
}

/**
 * Mounts search endpoints:
 *
 * - `POST   /search` -- Start a search (`{isbn}` or `{title, author}`, with an
 *                       optional `index` to re-run one library). Returns 202
 *                       and the status table; poll `GET /search` for updates.
 * - `GET    /search` -- Current status table.
 * - `DELETE /search` -- Cancel the running search.
 */
export function searchRoutes(deps: SearchRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── POST /search ─────────────────────────────────────────────────────

  app.post("/", async (c) => {
    const body = await readJsonBody(c, SearchBodySchema);
    const snapshot = await deps.searchController.start(toQuery(body), toScope(body));
    c.get("logger").info({ taskId: snapshot.taskId }, "search accepted");
    return c.json(snapshot, 202);
  });

  // ── GET /search ──────────────────────────────────────────────────────

  app.get("/", (c) => c.json(deps.searchController.snapshot()));

  // ── DELETE /search ───────────────────────────────────────────────────

  app.delete("/", async (c) => {
    const snapshot = await deps.searchController.cancel();
    return c.json(snapshot);
  });

  return app;
}
