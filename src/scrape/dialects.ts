// ---------------------------------------------------------------------------
// Dialect dispatch: one parser per detected format.
// ---------------------------------------------------------------------------

import type { CheerioAPI } from "cheerio";

import { FormatError } from "../core/errors.js";
import { MarcDialect, type MarcFieldDraft, type PageFetcher } from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import { findLtrPre } from "./parsers/dom.js";
import { parseCitationTable } from "./parsers/citation-table-parser.js";
import { parseInlineFields } from "./parsers/inline-fields-parser.js";
import { parseLineText } from "./parsers/line-text-parser.js";
import { parsePlainView } from "./parsers/plain-view-parser.js";

export interface DialectContext {
  $: CheerioAPI;
  /** URL the page was served from, after redirects. */
  pageUrl: string;
  fetchPage: PageFetcher;
  timeoutMs: number;
  logger: Logger;
}

export type DialectParser = (ctx: DialectContext) => Promise<MarcFieldDraft[]>;

async function followPlainView(ctx: DialectContext): Promise<MarcFieldDraft[]> {
  const href = ctx.$("a#switchview").first().attr("href");
  if (!href) {
    throw new FormatError("Plain view link (a#switchview) not found on MARC table page");
  }

  const plainUrl = new URL(href, new URL(ctx.pageUrl).origin).toString();
  ctx.logger.info({ plainUrl }, "following plain view link");

  const page = await ctx.fetchPage(plainUrl, { timeoutMs: ctx.timeoutMs });
  return parsePlainView(page.body, ctx.logger);
}

function lineTextFromPre(ctx: DialectContext): MarcFieldDraft[] {
  const pre = findLtrPre(ctx.$);
  const text = pre ? ctx.$(pre).text() : ctx.$.root().text();
  return parseLineText(text, ctx.logger);
}

/** Exhaustive over {@link MarcDialect}. */
export const DIALECT_PARSERS: Record<MarcDialect, DialectParser> = {
  [MarcDialect.INLINE_FIELDS]: async (ctx) => parseInlineFields(ctx.$, ctx.logger),
  [MarcDialect.PLAIN_VIEW_REDIRECT]: followPlainView,
  [MarcDialect.LINE_TEXT]: async (ctx) => lineTextFromPre(ctx),
  [MarcDialect.CITATION_TABLE]: async (ctx) => parseCitationTable(ctx.$, ctx.logger),
};
