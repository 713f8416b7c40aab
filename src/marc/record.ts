// ---------------------------------------------------------------------------
// Minimal MARC bibliographic record with ISO 2709 serialization.
//
// Layout written by toIso2709():
//   leader (24 bytes)
//   directory: one 12-byte entry per field (tag, length, start offset)
//   field terminator
//   field data, each field ending with a field terminator
//   record terminator
// Lengths and offsets are counted in UTF-8 bytes.
// ---------------------------------------------------------------------------

import type {
  DataFieldDraft,
  MarcFieldDraft,
  Subfield,
} from "../core/types.js";
import { MarcValidationError, RecordValidationError } from "../core/errors.js";
import { controlField, dataField, formatField } from "./field.js";

export const SUBFIELD_DELIMITER = "\x1f";
export const FIELD_TERMINATOR = "\x1e";
export const RECORD_TERMINATOR = "\x1d";

const LEADER_LENGTH = 24;
const DIRECTORY_ENTRY_LENGTH = 12;
// Widest values the 4-digit field length and 5-digit record length can hold.
export const MAX_FIELD_BYTES = 9999;
export const MAX_RECORD_BYTES = 99999;

/** Zero-pad `value` to `width` digits. */
function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export class MarcRecord {
  private readonly fields: MarcFieldDraft[] = [];

  /** Build a record from drafts, preserving their order. */
  static fromFields(drafts: Iterable<MarcFieldDraft>): MarcRecord {
    const record = new MarcRecord();
    for (const draft of drafts) {
      record.addField(draft);
    }
    return record;
  }

  /**
   * Append a field. The draft is re-validated, so a hand-built object is
   * held to the same rules as one produced by the field constructors.
   */
  addField(draft: MarcFieldDraft): void {
    this.fields.push(
      draft.kind === "control"
        ? controlField(draft.tag, draft.data)
        : dataField(draft.tag, draft.indicators, draft.subfields),
    );
  }

  /** All fields, or only those whose tag is in `tags`. */
  getFields(...tags: string[]): MarcFieldDraft[] {
    if (tags.length === 0) return [...this.fields];
    return this.fields.filter((f) => tags.includes(f.tag));
  }

  /** Data fields with the given tag. */
  getDataFields(tag: string): DataFieldDraft[] {
    return this.fields.filter(
      (f): f is DataFieldDraft => f.kind === "data" && f.tag === tag,
    );
  }

  /** Value of the first `code` subfield of the first `tag` field that has one. */
  firstSubfield(tag: string, code: string): string | null {
    for (const field of this.getDataFields(tag)) {
      const sub = field.subfields.find((s) => s.code === code);
      if (sub) return sub.value;
    }
    return null;
  }

  get size(): number {
    return this.fields.length;
  }

  /** Mnemonic display lines, one per field. */
  toDisplayLines(): string[] {
    return this.fields.map(formatField);
  }

  /**
   * Encode as a single ISO 2709 record. Throws `MarcValidationError` for a
   * field longer than 9999 bytes and `RecordValidationError` for a record
   * longer than 99999 bytes.
   */
  toIso2709(): Buffer {
    const bodies = this.fields.map((f) => {
      const body = Buffer.from(encodeFieldBody(f) + FIELD_TERMINATOR, "utf8");
      if (body.length > MAX_FIELD_BYTES) {
        throw new MarcValidationError(
          f.tag,
          `field is ${body.length} bytes, the limit is ${MAX_FIELD_BYTES}`,
        );
      }
      return body;
    });

    let directory = "";
    let offset = 0;
    this.fields.forEach((field, i) => {
      const length = bodies[i].length;
      directory += field.tag + pad(length, 4) + pad(offset, 5);
      offset += length;
    });

    const baseAddress =
      LEADER_LENGTH + DIRECTORY_ENTRY_LENGTH * this.fields.length + 1;
    const recordLength = baseAddress + offset + 1;
    if (recordLength > MAX_RECORD_BYTES) {
      throw new RecordValidationError([
        `record is ${recordLength} bytes, the limit is ${MAX_RECORD_BYTES}`,
      ]);
    }
    const leader = `${pad(recordLength, 5)}nam a22${pad(baseAddress, 5)}   4500`;

    return Buffer.concat([
      Buffer.from(leader + directory + FIELD_TERMINATOR, "utf8"),
      ...bodies,
      Buffer.from(RECORD_TERMINATOR, "utf8"),
    ]);
  }
}

function encodeSubfields(subfields: Subfield[]): string {
  return subfields.map((s) => SUBFIELD_DELIMITER + s.code + s.value).join("");
}

function encodeFieldBody(field: MarcFieldDraft): string {
  if (field.kind === "control") return field.data;
  return field.indicators[0] + field.indicators[1] + encodeSubfields(field.subfields);
}
