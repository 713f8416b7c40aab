// ---------------------------------------------------------------------------
// Per-field collection policy shared by every dialect parser.
//
// - A data field with no subfields is dropped and logged.
// - A field that fails construction (MarcValidationError) is dropped and
//   logged with its tag. Any other error propagates and aborts the parse.
// ---------------------------------------------------------------------------

import { MarcValidationError } from "../core/errors.js";
import type { Indicators, MarcFieldDraft, Subfield } from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import { controlField, dataField } from "./field.js";

export class FieldCollector {
  private readonly fields: MarcFieldDraft[] = [];

  constructor(private readonly logger: Logger) {}

  addControl(tag: string, data: string): void {
    this.attempt(tag, () => controlField(tag, data));
  }

  addData(tag: string, indicators: Indicators, subfields: Subfield[]): void {
    if (subfields.length === 0) {
      this.logger.info({ tag }, "skipping field with no subfields");
      return;
    }
    this.attempt(tag, () => dataField(tag, indicators, subfields));
  }

  /** Fields collected so far, in document order. */
  toArray(): MarcFieldDraft[] {
    return [...this.fields];
  }

  private attempt(tag: string, build: () => MarcFieldDraft): void {
    try {
      this.fields.push(build());
    } catch (err) {
      if (!(err instanceof MarcValidationError)) throw err;
      this.logger.warn({ tag, err: err.message }, "skipping invalid field");
    }
  }
}
