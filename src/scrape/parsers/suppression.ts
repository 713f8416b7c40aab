// ---------------------------------------------------------------------------
// Subfields dropped from the plain-view dialect.
// ---------------------------------------------------------------------------

import type { Subfield } from "../../core/types.js";
import type { Logger } from "../../logging/logger.js";

/** Tag → subfield codes that are removed before the field is built. */
export type SuppressionTable = Readonly<Record<string, readonly string[]>>;

/** Local authority links ($9) on name, subject and series fields. */
export const PLAIN_VIEW_SUPPRESSIONS: SuppressionTable = {
  "100": ["9"],
  "600": ["9"],
  "650": ["9"],
  "700": ["9"],
  "830": ["9"],
};

/** Remove suppressed subfields, logging each one. */
export function applySuppressions(
  tag: string,
  subfields: Subfield[],
  table: SuppressionTable,
  logger: Logger,
): Subfield[] {
  const codes = table[tag];
  if (!codes) return subfields;
  return subfields.filter((sub) => {
    if (!codes.includes(sub.code)) return true;
    logger.info(
      { tag, code: sub.code, value: sub.value },
      "discarded suppressed subfield",
    );
    return false;
  });
}
