// ---------------------------------------------------------------------------
// Library list routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import type { LibraryStore } from "../../config/library-store.js";
import type { AppEnv } from "../env.js";
import { parseIndexParam, readJsonBody } from "../request-body.js";

/** Dependencies required by library routes. */
export interface LibraryRouteDeps {
  store: LibraryStore;
}

const LibraryBodySchema = z.object({
  name: z.string(),
  isbnUrl: z.string(),
  titleAuthorUrl: z.string(),
});

/**
 * Mounts library list endpoints:
 *
 * - `GET    /libraries`         -- Ordered list of endpoints.
 * - `GET    /libraries/:index`  -- One endpoint.
 * - `POST   /libraries`         -- Append an endpoint (validated, then saved).
 * - `PUT    /libraries/:index`  -- Replace an endpoint.
 * - `DELETE /libraries/:index`  -- Remove an endpoint.
 */
export function libraryRoutes(deps: LibraryRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /libraries
  app.get("/", (c) => {
    const libraries = deps.store.list().map((library, index) => ({ index, ...library }));
    return c.json({ libraries, total: libraries.length });
  });

  // GET /libraries/:index
  app.get("/:index", (c) => {
    const index = parseIndexParam(c.req.param("index"));
    return c.json({ library: { index, ...deps.store.get(index) } });
  });

  // POST /libraries
  app.post("/", async (c) => {
    const body = await readJsonBody(c, LibraryBodySchema);
    const library = deps.store.add(body);
    const index = deps.store.size - 1;
    return c.json({ library: { index, ...library } }, 201);
  });

  // PUT /libraries/:index
  app.put("/:index", async (c) => {
    const index = parseIndexParam(c.req.param("index"));
    const body = await readJsonBody(c, LibraryBodySchema);
    const library = deps.store.update(index, body);
    return c.json({ library: { index, ...library } });
  });

  // DELETE /libraries/:index
  app.delete("/:index", (c) => {
    const index = parseIndexParam(c.req.param("index"));
    const removed = deps.store.remove(index);
    return c.json({ removed, total: deps.store.size });
  });

  return app;
}
