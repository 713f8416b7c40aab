// ---------------------------------------------------------------------------
// Citation-table dialect.
//
//   <table class="citation table table-striped">
//     <tr><th>245</th><td>1</td><td>0</td>
//         <td><strong>|a</strong> Moby Dick / <strong>|c</strong> ...</td></tr>
//   </table>
//
// Rows whose header is not numeric (LEADER and the like) are ignored.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

import type { MarcFieldDraft, Subfield } from "../../core/types.js";
import { FieldCollector } from "../../marc/field-collector.js";
import { isControlTag, normalizeIndicator } from "../../marc/field.js";
import type { Logger } from "../../logging/logger.js";
import { nextSiblingText } from "./dom.js";

export const CITATION_TABLE_SELECTOR = "table.citation.table.table-striped";

export function parseCitationTable($: CheerioAPI, logger: Logger): MarcFieldDraft[] {
  const out = new FieldCollector(logger);
  const $table = $(CITATION_TABLE_SELECTOR).first();

  for (const row of $table.find("tr").toArray()) {
    const $row = $(row);
    const $th = $row.find("th").first();
    if ($th.length === 0) continue;

    const tag = $th.text().trim();
    if (!/^\d+$/.test(tag)) continue;

    const cells = $row.find("td").toArray();
    if (cells.length < 3) continue;

    const $data = $(cells[2]);

    if (isControlTag(tag)) {
      const data = $data.text().trim();
      if (data) out.addControl(tag, data);
      continue;
    }

    const subfields: Subfield[] = [];
    for (const marker of $data.find("strong").toArray()) {
      const code = $(marker).text().trim().replace(/\|/g, "");
      const value = nextSiblingText($, marker);
      if (code && value) subfields.push({ code, value });
    }

    out.addData(
      tag,
      [normalizeIndicator($(cells[0]).text()), normalizeIndicator($(cells[1]).text())],
      subfields,
    );
  }

  const fields = out.toArray();
  logger.info({ count: fields.length }, "parsed citation table");
  return fields;
}
