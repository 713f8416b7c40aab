// ---------------------------------------------------------------------------
// Filename derivation from a record's title and main entry.
// ---------------------------------------------------------------------------

import type { MarcFieldDraft } from "../core/types.js";

export const FALLBACK_TITLE = "Untitled";
export const FALLBACK_AUTHOR = "UnknownAuthor";
export const MARC_EXTENSION = ".mrc";

/**
 * Keep ASCII letters, digits and whitespace; trim; collapse whitespace runs
 * to a single underscore.
 */
export function sanitizeFilename(value: string): string {
  return value
    .replace(/[^a-zA-Z0-9\s]/g, "")
    .trim()
    .replace(/\s+/g, "_");
}

function firstSubfield(
  fields: readonly MarcFieldDraft[],
  tag: string,
  code: string,
): string | null {
  for (const field of fields) {
    if (field.kind !== "data" || field.tag !== tag) continue;
    const sub = field.subfields.find((s) => s.code === code);
    if (sub) return sub.value;
  }
  return null;
}

/**
 * `<author>_<title>` from the first 100$a and 245$a, each sanitized on its
 * own. A value that is missing or sanitizes to nothing falls back to
 * `UnknownAuthor` or `Untitled`.
 */
export function deriveFilename(fields: readonly MarcFieldDraft[]): string {
  const title = sanitizeFilename(firstSubfield(fields, "245", "a") ?? "") || FALLBACK_TITLE;
  const author = sanitizeFilename(firstSubfield(fields, "100", "a") ?? "") || FALLBACK_AUTHOR;
  return `${author}_${title}`;
}
