// ---------------------------------------------------------------------------
// MARCXML variant of the source-record API response.
//
// fast-xml-parser returns either a single object or an array for repeated
// elements; every helper here accepts both. Expected parsed shape (with
// ignoreAttributes: false and namespace prefixes removed):
//   record.datafield    -> each with @_tag, @_ind1, @_ind2, subfield(s)
//   record.controlfield -> each with @_tag, #text
//   subfield            -> each with @_code, #text
// ---------------------------------------------------------------------------

import { XMLParser } from "fast-xml-parser";

import type { MarcFieldDraft, Subfield } from "../../core/types.js";
import { FieldCollector } from "../../marc/field-collector.js";
import { normalizeIndicator } from "../../marc/field.js";
import type { Logger } from "../../logging/logger.js";

type XmlNode = Record<string, unknown>;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  // Leading zeros in tags and numeric-looking values must survive.
  parseTagValue: false,
  parseAttributeValue: false,
  // Text values go through decodeXmlEntities instead.
  processEntities: false,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalise a value that may be a single item or an array into an array.
 */
function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function attribute(node: XmlNode, name: string): string | null {
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : null;
}

const PREDEFINED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/**
 * Decode the predefined XML entities and numeric character references in a
 * single pass. DOCTYPE entities are never expanded.
 */
export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (match, name: string) => {
    if (!name.startsWith("#")) return PREDEFINED_ENTITIES[name] ?? match;
    const code = name.startsWith("#x") ? parseInt(name.slice(2), 16) : parseInt(name.slice(1), 10);
    return code <= 0x10ffff ? String.fromCodePoint(code) : match;
  });
}

function textOf(value: unknown): string {
  if (typeof value === "string") return decodeXmlEntities(value).trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (isNode(value)) return textOf(value["#text"]);
  return "";
}

/** True when `body` looks like MARCXML rather than line text. */
export function looksLikeMarcXml(body: string): boolean {
  const head = body.trimStart();
  return head.startsWith("<") && /<(?:\w+:)?datafield\b/.test(body);
}

/** Depth-first search for `record` elements anywhere in the document. */
function findRecords(node: unknown): XmlNode[] {
  const found: XmlNode[] = [];
  for (const item of toArray(node)) {
    if (!isNode(item)) continue;
    for (const [key, child] of Object.entries(item)) {
      if (key.startsWith("@_") || key === "#text") continue;
      if (key === "record") {
        found.push(...toArray(child).filter(isNode));
      } else {
        found.push(...findRecords(child));
      }
    }
  }
  return found;
}

/**
 * Parse the first MARCXML record in `xml`. Control fields are not carried
 * over, matching the line-text dialect.
 */
export function parseMarcXml(xml: string, logger: Logger): MarcFieldDraft[] {
  const [record] = findRecords(xmlParser.parse(xml));
  const out = new FieldCollector(logger);
  if (!record) {
    logger.warn("no MARCXML record element found");
    return [];
  }

  for (const control of toArray(record["controlfield"]).filter(isNode)) {
    logger.info({ tag: attribute(control, "tag") }, "discarded control field");
  }

  for (const field of toArray(record["datafield"]).filter(isNode)) {
    const tag = attribute(field, "tag") ?? "";
    const subfields: Subfield[] = toArray(field["subfield"])
      .filter(isNode)
      .map((sub) => ({ code: attribute(sub, "code") ?? "", value: textOf(sub) }));

    out.addData(
      tag,
      [
        normalizeIndicator(attribute(field, "ind1") ?? undefined),
        normalizeIndicator(attribute(field, "ind2") ?? undefined),
      ],
      subfields,
    );
  }

  const fields = out.toArray();
  logger.info({ count: fields.length }, "parsed MARCXML record");
  return fields;
}
