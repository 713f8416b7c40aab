// ---------------------------------------------------------------------------
// Request parsing helpers shared by the route modules.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { z } from "zod";

import { RequestValidationError } from "../core/errors.js";
import type { AppEnv } from "./env.js";

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "body";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Parse the JSON body and validate it against `schema`.
 *
 * @throws {RequestValidationError} for a non-JSON body or a schema mismatch.
 */
export async function readJsonBody<T extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: T,
): Promise<z.output<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    throw new RequestValidationError(["body: must be valid JSON"], { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RequestValidationError(describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Parse a non-negative integer path parameter.
 *
 * @throws {RequestValidationError} when the value is not a plain integer.
 */
export function parseIndexParam(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new RequestValidationError([`index: expected a non-negative integer, got "${raw}"`]);
  }
  return Number.parseInt(raw, 10);
}

// ── Shared schemas ──────────────────────────────────────────────────────────

export const SubfieldSchema = z.object({
  code: z.string(),
  value: z.string(),
});

export const MarcFieldSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("control"),
    tag: z.string(),
    data: z.string(),
  }),
  z.object({
    kind: z.literal("data"),
    tag: z.string(),
    indicators: z.tuple([z.string(), z.string()]),
    subfields: z.array(SubfieldSchema),
  }),
]);
