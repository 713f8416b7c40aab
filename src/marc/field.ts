// ---------------------------------------------------------------------------
// Validating constructors for MARC field drafts.
//
// Every dialect parser builds fields through these helpers so that a field
// with a malformed tag, indicator or subfield code never reaches a record.
// ---------------------------------------------------------------------------

import { MarcValidationError } from "../core/errors.js";
import type {
  ControlFieldDraft,
  DataFieldDraft,
  Indicators,
  MarcFieldDraft,
  Subfield,
} from "../core/types.js";

const TAG_RE = /^[0-9A-Za-z]{3}$/;
const CONTROL_TAG_RE = /^00[0-9]$/;
const SUBFIELD_CODE_RE = /^[0-9A-Za-z]$/;

/** Blank indicator as it is stored. */
export const BLANK_INDICATOR = " ";

/** True for tags 000 through 009, which never carry indicators. */
export function isControlTag(tag: string): boolean {
  return CONTROL_TAG_RE.test(tag);
}

function assertTag(tag: string): void {
  if (!TAG_RE.test(tag)) {
    throw new MarcValidationError(tag, "tag must be three alphanumeric characters");
  }
}

/**
 * Build a control field. Only 00X tags are accepted.
 *
 * @throws {MarcValidationError} when the tag is malformed or not a control tag.
 */
export function controlField(tag: string, data: string): ControlFieldDraft {
  assertTag(tag);
  if (!isControlTag(tag)) {
    throw new MarcValidationError(tag, "control fields must use a 00X tag");
  }
  return { kind: "control", tag, data };
}

/**
 * Build a data field from an indicator pair and ordered subfields.
 *
 * @throws {MarcValidationError} when the tag, an indicator or a subfield code
 *   is malformed.
 */
export function dataField(
  tag: string,
  indicators: Indicators,
  subfields: Subfield[],
): DataFieldDraft {
  assertTag(tag);

  indicators.forEach((indicator, position) => {
    if (indicator.length !== 1) {
      throw new MarcValidationError(
        tag,
        `indicator ${position + 1} must be a single character, got ${JSON.stringify(indicator)}`,
      );
    }
  });

  for (const sub of subfields) {
    if (!SUBFIELD_CODE_RE.test(sub.code)) {
      throw new MarcValidationError(
        tag,
        `subfield code must be one alphanumeric character, got ${JSON.stringify(sub.code)}`,
      );
    }
  }

  return {
    kind: "data",
    tag,
    indicators: [indicators[0], indicators[1]],
    subfields: subfields.map((s) => ({ code: s.code, value: s.value })),
  };
}

/**
 * Normalise a scraped indicator: empty, whitespace or `#` become a blank.
 */
export function normalizeIndicator(raw: string | undefined): string {
  const trimmed = (raw ?? "").trim();
  if (trimmed === "" || trimmed === "#") return BLANK_INDICATOR;
  return trimmed;
}

// ── Display ───────────────────────────────────────────────────────────────

function displayIndicator(indicator: string): string {
  return indicator === BLANK_INDICATOR ? "\\" : indicator;
}

/**
 * Render a field as one mnemonic line, e.g. `=245  10$aMoby Dick`.
 * Blank indicators are shown as `\`.
 */
export function formatField(field: MarcFieldDraft): string {
  if (field.kind === "control") {
    return `=${field.tag}  ${field.data}`;
  }
  const [ind1, ind2] = field.indicators;
  const subs = field.subfields.map((s) => `$${s.code}${s.value}`).join("");
  return `=${field.tag}  ${displayIndicator(ind1)}${displayIndicator(ind2)}${subs}`;
}
