// ---------------------------------------------------------------------------
// Plain view reached from a `table#marc` page.
//
// Usually a table with one row per field and subfield markers written `_a`.
// Some catalogs serve the plain view as line-oriented text instead; that
// form goes through the line-text parser. Both paths drop the subfields in
// PLAIN_VIEW_SUPPRESSIONS.
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";

import type { MarcFieldDraft, Subfield } from "../../core/types.js";
import { FieldCollector } from "../../marc/field-collector.js";
import { isControlTag, normalizeIndicator } from "../../marc/field.js";
import type { Logger } from "../../logging/logger.js";
import { nextSiblingText } from "./dom.js";
import { parseLineText } from "./line-text-parser.js";
import { applySuppressions, PLAIN_VIEW_SUPPRESSIONS } from "./suppression.js";

export function parsePlainView(body: string, logger: Logger): MarcFieldDraft[] {
  const $ = cheerio.load(body);
  const $table = $("table").first();

  if ($table.length === 0) {
    const $pre = $("pre").first();
    const text = $pre.length > 0 ? $pre.text() : $.root().text();
    logger.info("plain view has no table, reading it as line text");
    return parseLineText(text, logger, { suppressions: PLAIN_VIEW_SUPPRESSIONS });
  }

  const out = new FieldCollector(logger);

  for (const row of $table.find("tr").toArray()) {
    const $row = $(row);
    const $th = $row.find("th").first();
    if ($th.length === 0) continue;

    const tag = $th.text().trim();
    const cells = $row.find("td").toArray();

    if (isControlTag(tag)) {
      const last = cells[cells.length - 1];
      const data = last ? $(last).text().trim() : "";
      if (data) out.addControl(tag, data);
      continue;
    }

    if (cells.length <= 2) continue;

    const ind1 = normalizeIndicator($(cells[0]).text());
    const ind2 = normalizeIndicator($(cells[1]).text());

    const subfields: Subfield[] = [];
    for (const marker of $(cells[2]).find("strong").toArray()) {
      const label = $(marker).text().trim();
      if (!label.startsWith("_") || label.length < 2) continue;
      subfields.push({ code: label.charAt(1), value: nextSiblingText($, marker) });
    }

    out.addData(
      tag,
      [ind1, ind2],
      applySuppressions(tag, subfields, PLAIN_VIEW_SUPPRESSIONS, logger),
    );
  }

  const fields = out.toArray();
  logger.info({ count: fields.length }, "parsed plain view");
  return fields;
}
