// ---------------------------------------------------------------------------
// Line-text dialect.
//
// One field per line:
//
//   245 10 $aMoby Dick /$cHerman Melville.
//   ^^^ ^^ ^
//   tag |  data from offset 7
//       indicators at offsets 4 and 5
//
// Control fields (000-009) and the leader line are not carried over.
// ---------------------------------------------------------------------------

import type { MarcFieldDraft, Subfield } from "../../core/types.js";
import { FieldCollector } from "../../marc/field-collector.js";
import { normalizeIndicator } from "../../marc/field.js";
import type { Logger } from "../../logging/logger.js";
import { applySuppressions, type SuppressionTable } from "./suppression.js";

export interface LineTextOptions {
  suppressions?: SuppressionTable;
}

const LEADER_LINE_RE = /^(?:leader|ldr)/i;

/** Split `$aFoo $bBar` into ordered subfields, skipping empty chunks. */
export function splitDollarSubfields(data: string): Subfield[] {
  const subfields: Subfield[] = [];
  for (const chunk of data.split("$")) {
    if (!chunk) continue;
    subfields.push({ code: chunk[0], value: chunk.slice(1).trim() });
  }
  return subfields;
}

function isDiscardedControlTag(tag: string): boolean {
  return /^\d+$/.test(tag) && Number(tag) <= 9;
}

/** Parse line-oriented MARC text into data-field drafts. */
export function parseLineText(
  text: string,
  logger: Logger,
  options: LineTextOptions = {},
): MarcFieldDraft[] {
  const out = new FieldCollector(logger);

  for (const line of text.split(/\r?\n/)) {
    if (!line.trim() || LEADER_LINE_RE.test(line)) continue;

    const tag = line.slice(0, 3).trim();
    if (isDiscardedControlTag(tag)) {
      logger.info({ tag, line }, "discarded control field line");
      continue;
    }

    const ind1 = normalizeIndicator(line.charAt(4));
    const ind2 = normalizeIndicator(line.charAt(5));

    let subfields = splitDollarSubfields(line.slice(7).trim());
    if (options.suppressions) {
      subfields = applySuppressions(tag, subfields, options.suppressions, logger);
    }

    out.addData(tag, [ind1, ind2], subfields);
  }

  const fields = out.toArray();
  logger.info({ count: fields.length }, "parsed line-text record");
  return fields;
}
