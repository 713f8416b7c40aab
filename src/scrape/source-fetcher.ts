// ---------------------------------------------------------------------------
// Source fetcher: turn a catalog URL into a parsed MARC document.
//
// Two routes:
//   1. Discovery-aggregator URLs are rewritten to the public source-record
//      API, whose body is line-oriented MARC (or MARCXML).
//   2. Anything else is fetched directly, classified, and handed to the
//      matching dialect parser.
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";

import { FormatError, SourceParameterError } from "../core/errors.js";
import type {
  MarcFieldDraft,
  PageFetcher,
  ParsedMarcDocument,
  ScrapeSource,
} from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import { deriveFilename } from "../marc/filename.js";
import { DIALECT_PARSERS } from "./dialects.js";
import { detectFormat } from "./format-classifier.js";
import { parseLineText } from "./parsers/line-text-parser.js";
import { looksLikeMarcXml, parseMarcXml } from "./parsers/marcxml-parser.js";

const AGGREGATOR_HOST = "primo.exlibrisgroup.com";
const SOURCE_RECORD_PATH = "discovery/sourceRecord";
const SOURCE_RECORD_PARAMS = ["docId", "vid", "recordOwner"] as const;

export interface SourceFetcherOptions {
  fetchPage: PageFetcher;
  timeoutMs: number;
  logger: Logger;
}

/** True when the URL should go through the source-record API. */
export function isSourceRecordUrl(url: URL): boolean {
  return url.host.includes(AGGREGATOR_HOST) || url.pathname.includes(SOURCE_RECORD_PATH);
}

/**
 * Build the source-record API URL for an aggregator link.
 *
 * @throws {SourceParameterError} naming every missing query parameter.
 */
export function buildSourceRecordUrl(url: URL): string {
  const missing = SOURCE_RECORD_PARAMS.filter((name) => !url.searchParams.get(name));
  if (missing.length > 0) {
    throw new SourceParameterError(
      `Unable to extract necessary parameters from the URL: missing ${missing.join(", ")}`,
      missing,
    );
  }

  const params = new URLSearchParams();
  for (const name of SOURCE_RECORD_PARAMS) {
    params.set(name, url.searchParams.get(name) ?? "");
  }
  params.set("lang", "en");
  return `https://${url.host}/primaws/rest/pub/sourceRecord?${params.toString()}`;
}

/**
 * Validate user input as an absolute http(s) URL.
 *
 * @throws {SourceParameterError} for a blank or non-http(s) URL.
 */
export function parseSourceUrl(raw: string): URL {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new SourceParameterError("Please enter a valid URL.", ["url"]);
  }
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (err) {
    throw new SourceParameterError(`Not a valid URL: ${trimmed}`, ["url"], { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new SourceParameterError(`Unsupported URL scheme: ${url.protocol}`, ["url"]);
  }
  return url;
}

export class SourceFetcher {
  private readonly fetchPage: PageFetcher;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SourceFetcherOptions) {
    this.fetchPage = options.fetchPage;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ component: "source-fetcher" });
  }

  /**
   * Fetch and parse the MARC record behind `rawUrl`.
   *
   * @throws {SourceParameterError} bad URL or missing aggregator parameters
   * @throws {NetworkError} timeout, connection failure or non-2xx status
   * @throws {FormatError} unrecognised page, or missing plain-view link
   */
  async scrape(rawUrl: string): Promise<ParsedMarcDocument> {
    const url = parseSourceUrl(rawUrl);
    const log = this.logger.child({ url: url.toString() });
    log.info("scraping URL");

    let source: ScrapeSource;
    let fields: MarcFieldDraft[];

    if (isSourceRecordUrl(url)) {
      log.info("detected source-record URL");
      const apiUrl = buildSourceRecordUrl(url);
      const page = await this.fetchPage(apiUrl, { timeoutMs: this.timeoutMs });
      source = "source_record_api";
      fields = looksLikeMarcXml(page.body)
        ? parseMarcXml(page.body, log)
        : parseLineText(page.body, log);
    } else {
      const page = await this.fetchPage(url.toString(), { timeoutMs: this.timeoutMs });
      const $ = cheerio.load(page.body);
      const format = detectFormat($);
      if (format === "unknown") {
        log.warn("unknown format detected");
        throw new FormatError("Unable to identify the MARC format in the provided HTML.");
      }
      log.info({ format }, "detected format");
      source = format;
      fields = await DIALECT_PARSERS[format]({
        $,
        pageUrl: page.finalUrl,
        fetchPage: this.fetchPage,
        timeoutMs: this.timeoutMs,
        logger: log,
      });
    }

    const filename = deriveFilename(fields);
    log.info({ source, fields: fields.length, filename }, "finished parsing");
    return { sourceUrl: url.toString(), source, fields, filename };
  }
}
