// ---------------------------------------------------------------------------
// Response classifier: decide FOUND / NOT_FOUND for a catalog search page.
//
// Evaluation order:
//   1. not-found rules (any match -> NOT_FOUND)
//   2. redirect shortcut (redirected -> FOUND at the final URL)
//   3. structural found rules
//   4. result-count patterns over the raw body
//   5. NOT_FOUND
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";

import { SearchVerdict, type Classification, type FetchedPage } from "../core/types.js";
import { visibleTextNodes } from "../scrape/parsers/dom.js";

export interface PageView {
  $: CheerioAPI;
  /** Visible text nodes, trimmed, in document order. */
  textNodes: string[];
}

export interface ClassifierRule {
  name: string;
  test: (page: PageView) => boolean;
}

export const NOT_FOUND_PHRASES: readonly string[] = [
  "no results found",
  "no matches found",
  "no entries found",
  "search resulted in no hits",
  "no results!",
  "your search found no results.",
  "no records found",
];

function positiveInt(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return false;
  return Number.parseInt(trimmed, 10) > 0;
}

export const NOT_FOUND_RULES: readonly ClassifierRule[] = [
  {
    name: "no-results-phrase",
    test: ({ textNodes }) => {
      const text = textNodes.join(" ").toLowerCase();
      return NOT_FOUND_PHRASES.some((phrase) => text.includes(phrase));
    },
  },
  {
    name: "no-results-heading",
    test: ({ $ }) =>
      $("h1")
        .toArray()
        .some((el) => /no results/i.test($(el).text())),
  },
  {
    name: "no-results-container",
    test: ({ $ }) => $("div#documents.noresults").length > 0,
  },
  {
    name: "placeholder-row",
    test: ({ $ }) => $("tr.yourEntryWouldBeHere").length > 0,
  },
];

export const FOUND_RULES: readonly ClassifierRule[] = [
  { name: "browse-entry-rows", test: ({ $ }) => $("tr.browseEntry").length > 0 },
  {
    name: "record-count-badge",
    test: ({ $ }) => $("span.results-bar-item.results-bar-item-record-count").length > 0,
  },
  {
    name: "meta-total-results",
    test: ({ $ }) => positiveInt($('meta[name="totalResults"]').first().attr("content")),
  },
  { name: "document-container", test: ({ $ }) => $('div[class*="document"]').length > 0 },
  {
    name: "detail-container",
    test: ({ $ }) =>
      $("div.bibDisplayContentMain, div.bibDisplayItemsMain, div.bibliographicData").length > 0,
  },
  {
    name: "results-count-text",
    test: ({ textNodes }) => textNodes.some((t) => /Results:\s*\d+/i.test(t)),
  },
  { name: "numresults-element", test: ({ $ }) => $("#numresults").length > 0 },
  { name: "search-tool-message", test: ({ $ }) => $("div.browseSearchtoolMessage").length > 0 },
  {
    name: "search-stats-total",
    test: ({ $ }) => positiveInt($("div.search-stats").first().attr("data-record-total")),
  },
  {
    name: "results-found-span",
    test: ({ $ }) =>
      $("span")
        .toArray()
        .some((el) => /\d+\s+(?:results?|of\s+results?)\s*found/i.test($(el).text())),
  },
];

export const RESULT_COUNT_PATTERNS: readonly RegExp[] = [
  /\b(?:your\s+search\s+returned\s+|(\d+)\s+)(?:results?|result)\b/i,
  /\bResults:\s*\d+/i,
  /\b(\d+)\s+(?:results?|result)\s+found\b/i,
  /\b(\d+)-(\d+)\s+of\s+(\d+)\b/i,
];

function firstMatch(rules: readonly ClassifierRule[], view: PageView): string | null {
  for (const rule of rules) {
    if (rule.test(view)) return rule.name;
  }
  return null;
}

/**
 * Classify a fetched search-result page. A FOUND verdict reports the final
 * URL after redirects; NOT_FOUND reports the requested URL.
 */
export function classifyResponse(page: FetchedPage): Classification {
  const $ = cheerio.load(page.body);
  const view: PageView = { $, textNodes: visibleTextNodes($) };

  const notFound = firstMatch(NOT_FOUND_RULES, view);
  if (notFound !== null) {
    return { verdict: SearchVerdict.NOT_FOUND, url: page.requestedUrl, rule: notFound };
  }

  if (page.redirected) {
    return { verdict: SearchVerdict.FOUND, url: page.finalUrl, rule: "redirected" };
  }

  const found = firstMatch(FOUND_RULES, view);
  if (found !== null) {
    return { verdict: SearchVerdict.FOUND, url: page.finalUrl, rule: found };
  }

  const pattern = RESULT_COUNT_PATTERNS.findIndex((re) => re.test(page.body));
  if (pattern >= 0) {
    return {
      verdict: SearchVerdict.FOUND,
      url: page.finalUrl,
      rule: `result-count-pattern-${pattern + 1}`,
    };
  }

  return { verdict: SearchVerdict.NOT_FOUND, url: page.requestedUrl, rule: "no-signal" };
}
