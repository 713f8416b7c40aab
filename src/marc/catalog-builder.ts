// ---------------------------------------------------------------------------
// Manual cataloging: map entered bibliographic details to MARC fields.
// ---------------------------------------------------------------------------

import type { CatalogEntry, Indicators, Subfield } from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import { FieldCollector } from "./field-collector.js";
import { MarcRecord } from "./record.js";

const BLANK: Indicators = [" ", " "];

/** Trimmed value, or null when the input is absent or blank. */
function text(value: string | undefined): string | null {
  const trimmed = (value ?? "").trim();
  return trimmed === "" ? null : trimmed;
}

/** Subfields for the non-empty values, in the order given. */
function subfields(...pairs: [string, string | null][]): Subfield[] {
  const out: Subfield[] = [];
  for (const [code, value] of pairs) {
    if (value !== null) out.push({ code, value });
  }
  return out;
}

/**
 * Build a record from manually entered details. Fields come out in tag
 * order; empty inputs produce no subfield, and a field left without
 * subfields is not written.
 */
export function buildCatalogRecord(entry: CatalogEntry, logger: Logger): MarcRecord {
  const out = new FieldCollector(logger);

  const title = text(entry.title);
  const author = text(entry.author);
  const year = text(entry.copyrightYear);
  const pages = text(entry.pages);
  const height = text(entry.bookHeight);

  out.addData("010", BLANK, subfields(["a", text(entry.lccn)]));
  out.addData("020", BLANK, subfields(["a", text(entry.isbn)]));
  out.addData("020", BLANK, subfields(["a", text(entry.secondIsbn)]));
  out.addData("050", ["0", "4"], subfields(["a", text(entry.locCallNumber)]));
  out.addData("100", ["1", " "], subfields(["a", author]));
  out.addData(
    "245",
    ["1", "0"],
    subfields(["a", title], ["b", text(entry.subtitle)]),
  );
  out.addData("250", BLANK, subfields(["a", text(entry.edition)]));
  out.addData(
    "264",
    [" ", "1"],
    subfields(
      ["a", text(entry.publisherLocation)],
      ["b", text(entry.publisher)],
      ["c", year],
    ),
  );
  out.addData("264", [" ", "4"], subfields(["c", year === null ? null : `c${year}.`]));
  out.addData(
    "300",
    BLANK,
    subfields(
      ["a", pages === null ? null : `${pages} p.`],
      ["c", height === null ? null : `${height} cm.`],
    ),
  );

  if (entry.index) {
    out.addData("500", BLANK, subfields(["a", "Includes index."]));
  }

  if (entry.references) {
    const range = text(entry.referencesPageRange);
    let note = "Includes bibliographical references";
    if (range !== null) note += ` (p. ${range}).`;
    out.addData("504", BLANK, subfields(["a", note]));
  }

  out.addData("520", BLANK, subfields(["a", text(entry.summary)]));

  for (const subject of (entry.locSubjects ?? []).slice(0, 3)) {
    out.addData("650", [" ", "0"], subfields(["a", text(subject)]));
  }

  for (const person of [
    entry.secondAuthor,
    entry.thirdAuthor,
    entry.editor,
    entry.secondEditor,
  ]) {
    out.addData("700", ["1", " "], subfields(["a", text(person)]));
  }

  const record = MarcRecord.fromFields(out.toArray());
  logger.info({ fields: record.size }, "catalog record created");
  return record;
}
