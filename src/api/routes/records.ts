// ---------------------------------------------------------------------------
// Record routes: manual cataloging, validation and ISO 2709 export.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { z } from "zod";

import { buildCatalogRecord } from "../../marc/catalog-builder.js";
import { deriveFilename, sanitizeFilename } from "../../marc/filename.js";
import { withMarcExtension } from "../../marc/marc-file.js";
import { MarcRecord } from "../../marc/record.js";
import { assertRecordValid, findRecordProblems } from "../../marc/record-validation.js";
import type { AppEnv } from "../env.js";
import { MarcFieldSchema, readJsonBody } from "../request-body.js";

const optionalText = z.string().optional();

const CatalogBodySchema = z.object({
  title: z.string().refine((t) => t.trim() !== "", "title is required"),
  subtitle: optionalText,
  author: optionalText,
  secondAuthor: optionalText,
  thirdAuthor: optionalText,
  editor: optionalText,
  secondEditor: optionalText,
  copyrightYear: optionalText,
  edition: optionalText,
  publisher: optionalText,
  publisherLocation: optionalText,
  lccn: optionalText,
  isbn: optionalText,
  secondIsbn: optionalText,
  locCallNumber: optionalText,
  pages: optionalText,
  bookHeight: optionalText,
  references: z.boolean().optional(),
  referencesPageRange: optionalText,
  index: z.boolean().optional(),
  summary: optionalText,
  locSubjects: z.array(z.string()).max(3).optional(),
});

const FieldsBodySchema = z.object({
  fields: z.array(MarcFieldSchema),
});

const ExportBodySchema = FieldsBodySchema.extend({
  filename: z.string().optional(),
  // Manually catalogued records carry no 001.
  validate: z.boolean().default(true),
});

/**
 * Mounts:
 *
 * - `POST /records/catalog`  -- manual details -> fields and display lines
 * - `POST /records/validate` -- 200 when the record can be saved, else 422
 * - `POST /records/export`   -- ISO 2709 download (`application/marc`)
 */
export function recordRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/catalog", async (c) => {
    const entry = await readJsonBody(c, CatalogBodySchema);
    const record = buildCatalogRecord(entry, c.get("logger"));
    const filename = deriveFilename(record.getFields());

    return c.json({
      fields: record.getFields(),
      lines: record.toDisplayLines(),
      filename,
      downloadName: withMarcExtension(filename),
    });
  });

  app.post("/validate", async (c) => {
    const { fields } = await readJsonBody(c, FieldsBodySchema);
    const problems = findRecordProblems(MarcRecord.fromFields(fields));
    return c.json({ valid: problems.length === 0, problems }, problems.length === 0 ? 200 : 422);
  });

  app.post("/export", async (c) => {
    const body = await readJsonBody(c, ExportBodySchema);
    const record = MarcRecord.fromFields(body.fields);
    if (body.validate) assertRecordValid(record);

    const base = body.filename ? sanitizeFilename(body.filename.replace(/\.mrc$/i, "")) : "";
    const downloadName = withMarcExtension(base || deriveFilename(record.getFields()));
    const bytes = record.toIso2709();
    const payload = new ArrayBuffer(bytes.length);
    new Uint8Array(payload).set(bytes);

    c.get("logger").info({ downloadName, bytes: bytes.length }, "record exported");
    return c.body(payload, 200, {
      "Content-Type": "application/marc",
      "Content-Disposition": `attachment; filename="${downloadName}"`,
    });
  });

  return app;
}
