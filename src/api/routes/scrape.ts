// ---------------------------------------------------------------------------
// Scrape route: fetch a catalog page and return its MARC fields.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import { withMarcExtension } from "../../marc/marc-file.js";
import { MarcRecord } from "../../marc/record.js";
import { findRecordProblems } from "../../marc/record-validation.js";
import type { SourceFetcher } from "../../scrape/source-fetcher.js";
import type { AppEnv } from "../env.js";
import { readJsonBody } from "../request-body.js";

/** Dependencies required by scrape routes. */
export interface ScrapeRouteDeps {
  sourceFetcher: SourceFetcher;
}

const ScrapeBodySchema = z.object({
  url: z.string(),
});

/**
 * Mounts:
 *
 * - `POST /scrape` -- `{url}` -> parsed fields, display lines, download
 *                     filename, and any problems that would block saving.
 */
export function scrapeRoutes(deps: ScrapeRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/", async (c) => {
    const { url } = await readJsonBody(c, ScrapeBodySchema);
    const document = await deps.sourceFetcher.scrape(url);
    const record = MarcRecord.fromFields(document.fields);

    return c.json({
      document,
      lines: record.toDisplayLines(),
      downloadName: withMarcExtension(document.filename),
      problems: findRecordProblems(record),
    });
  });

  return app;
}
