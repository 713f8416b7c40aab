// ---------------------------------------------------------------------------
// Identify which MARC dialect a fetched page is written in.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

import { MarcDialect, type DetectedFormat } from "../core/types.js";
import { CITATION_TABLE_SELECTOR } from "./parsers/citation-table-parser.js";
import { findLtrPre } from "./parsers/dom.js";

interface FormatProbe {
  dialect: MarcDialect;
  matches: ($: CheerioAPI) => boolean;
}

/** Checked in order; the first match wins. */
export const FORMAT_PROBES: readonly FormatProbe[] = [
  {
    dialect: MarcDialect.INLINE_FIELDS,
    matches: ($) => $("div.field").length > 0,
  },
  {
    dialect: MarcDialect.PLAIN_VIEW_REDIRECT,
    matches: ($) => $("table#marc").length > 0,
  },
  {
    dialect: MarcDialect.LINE_TEXT,
    matches: ($) => findLtrPre($) !== undefined,
  },
  {
    dialect: MarcDialect.CITATION_TABLE,
    matches: ($) => $(CITATION_TABLE_SELECTOR).length > 0,
  },
];

/** Return the first dialect whose marker is present, or `"unknown"`. */
export function detectFormat($: CheerioAPI): DetectedFormat {
  for (const probe of FORMAT_PROBES) {
    if (probe.matches($)) return probe.dialect;
  }
  return "unknown";
}
