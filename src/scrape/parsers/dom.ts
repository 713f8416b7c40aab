// ---------------------------------------------------------------------------
// Small DOM helpers shared by the cheerio-based parsers.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode, type Element } from "domhandler";

/**
 * Trimmed text of the node immediately after `node`. Subfield markers in
 * scraped MARC views are followed by their value as a bare text node; an
 * element sibling contributes its text content.
 */
export function nextSiblingText($: CheerioAPI, node: AnyNode): string {
  const sibling = node.nextSibling;
  if (!sibling) return "";
  if (isText(sibling)) return sibling.data.trim();
  if (isTag(sibling)) return $(sibling).text().trim();
  return "";
}

const INVISIBLE_TAGS = new Set(["script", "style", "noscript", "template"]);

/**
 * Every non-empty text node outside script and style blocks, trimmed, in
 * document order.
 */
export function visibleTextNodes($: CheerioAPI): string[] {
  const out: string[] = [];
  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      const value = node.data.trim();
      if (value) out.push(value);
      return;
    }
    if (isTag(node) && INVISIBLE_TAGS.has(node.name.toLowerCase())) return;
    if (hasChildren(node)) {
      for (const child of node.children) walk(child);
    }
  };
  for (const node of $.root().toArray()) walk(node);
  return out;
}

const LTR_STYLE_RE = /direction\s*:\s*ltr/i;

/** First `pre` element whose inline style declares `direction: ltr`. */
export function findLtrPre($: CheerioAPI): Element | undefined {
  return $("pre")
    .toArray()
    .find((el) => LTR_STYLE_RE.test($(el).attr("style") ?? ""));
}
