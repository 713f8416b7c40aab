// ---------------------------------------------------------------------------
// Tests for the MARC field constructors and the shared collection policy.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import pino from "pino";

import { MarcValidationError } from "../../../src/core/errors.js";
import {
  controlField,
  dataField,
  formatField,
  isControlTag,
  normalizeIndicator,
} from "../../../src/marc/field.js";
import { FieldCollector } from "../../../src/marc/field-collector.js";

const logger = pino({ level: "silent" });

// ── Constructors ──────────────────────────────────────────────────────────

describe("controlField", () => {
  it("builds a control field for a 00X tag", () => {
    expect(controlField("001", "ocm12345")).toEqual({
      kind: "control",
      tag: "001",
      data: "ocm12345",
    });
  });

  it("rejects a non-control tag", () => {
    expect(() => controlField("245", "x")).toThrow(MarcValidationError);
  });
});

describe("dataField", () => {
  it("copies indicators and subfields in order", () => {
    const field = dataField("245", ["1", "0"], [
      { code: "a", value: "Moby Dick /" },
      { code: "c", value: "Herman Melville." },
    ]);

    expect(field.indicators).toEqual(["1", "0"]);
    expect(field.subfields.map((s) => s.code)).toEqual(["a", "c"]);
  });

  it("rejects a two-character tag", () => {
    expect(() => dataField("24", [" ", " "], [{ code: "a", value: "x" }])).toThrow(
      MarcValidationError,
    );
  });

  it("rejects a multi-character indicator", () => {
    expect(() => dataField("245", ["10", " "], [{ code: "a", value: "x" }])).toThrow(
      /indicator 1 must be a single character/,
    );
  });

  it("rejects an empty subfield code", () => {
    expect(() => dataField("650", [" ", "0"], [{ code: "", value: "Whales" }])).toThrow(
      expect.objectContaining({ name: "MarcValidationError", tag: "650" }),
    );
  });
});

describe("isControlTag / normalizeIndicator", () => {
  it("treats 000-009 as control tags", () => {
    expect(isControlTag("008")).toBe(true);
    expect(isControlTag("010")).toBe(false);
  });

  it("maps blank, whitespace and # to a space", () => {
    expect(normalizeIndicator("")).toBe(" ");
    expect(normalizeIndicator("  ")).toBe(" ");
    expect(normalizeIndicator("#")).toBe(" ");
    expect(normalizeIndicator(undefined)).toBe(" ");
    expect(normalizeIndicator("4")).toBe("4");
  });
});

describe("formatField", () => {
  it("shows blank indicators as backslashes", () => {
    const field = dataField("650", [" ", "0"], [{ code: "a", value: "Whaling" }]);
    expect(formatField(field)).toBe("=650  \\0$aWhaling");
  });

  it("renders control fields without indicators", () => {
    expect(formatField(controlField("001", "123"))).toBe("=001  123");
  });
});

// ── FieldCollector ───────────────────────────────────────────────────────

describe("FieldCollector", () => {
  it("drops a data field with no subfields", () => {
    const out = new FieldCollector(logger);
    out.addData("500", [" ", " "], []);
    expect(out.toArray()).toEqual([]);
  });

  it("skips an invalid field and keeps the rest", () => {
    const out = new FieldCollector(logger);
    out.addData("2X", [" ", " "], [{ code: "a", value: "bad tag" }]);
    out.addData("245", ["1", "0"], [{ code: "a", value: "Good" }]);

    expect(out.toArray().map((f) => f.tag)).toEqual(["245"]);
  });

  it("logs the tag of a skipped field", () => {
    const warnings: unknown[] = [];
    const spyLogger = pino({ level: "warn" }, {
      write: (line: string) => {
        warnings.push(JSON.parse(line));
      },
    });
    const out = new FieldCollector(spyLogger);
    out.addData("245", ["1", "0"], [{ code: "ab", value: "x" }]);

    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ tag: "245", msg: "skipping invalid field" });
  });
});
