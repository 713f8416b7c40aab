// ---------------------------------------------------------------------------
// Inline-fields dialect.
//
// One container per field:
//
//   <div class="field">
//     <span class="tag">245</span>
//     <div class="ind1">1</div><div class="ind2">0</div>
//     <span class="sub_code">|a</span>Moby Dick /
//     <span class="sub_code">|c</span>Herman Melville.
//   </div>
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

import { CONTROL_FIELD_TAGS, type MarcFieldDraft, type Subfield } from "../../core/types.js";
import { FieldCollector } from "../../marc/field-collector.js";
import { normalizeIndicator } from "../../marc/field.js";
import type { Logger } from "../../logging/logger.js";
import { nextSiblingText } from "./dom.js";

/**
 * Parse every `div.field` on the page. Fields without a `span.tag` are
 * skipped. Tags 001, 003, 005 and 008 become control fields whose data is
 * the joined subfield values.
 */
export function parseInlineFields($: CheerioAPI, logger: Logger): MarcFieldDraft[] {
  const out = new FieldCollector(logger);

  for (const element of $("div.field").toArray()) {
    const $field = $(element);

    const $tag = $field.find("span.tag").first();
    if ($tag.length === 0) continue;
    const tag = $tag.text().trim();

    const $ind1 = $field.find("div.ind1").first();
    const $ind2 = $field.find("div.ind2").first();
    const ind1 = $ind1.length > 0 ? normalizeIndicator($ind1.text()) : " ";
    const ind2 = $ind2.length > 0 ? normalizeIndicator($ind2.text()) : " ";

    const subfields: Subfield[] = $field
      .find("span.sub_code")
      .toArray()
      .map((marker) => ({
        code: $(marker).text().trim().replace(/\|/g, ""),
        value: nextSiblingText($, marker),
      }));

    if (CONTROL_FIELD_TAGS.includes(tag)) {
      if (subfields.length === 0) {
        logger.info({ tag }, "skipping control field with no data");
        continue;
      }
      out.addControl(tag, subfields.map((s) => s.value).join(""));
      continue;
    }

    out.addData(tag, [ind1, ind2], subfields);
  }

  const fields = out.toArray();
  logger.info({ count: fields.length }, "parsed inline-fields page");
  return fields;
}
