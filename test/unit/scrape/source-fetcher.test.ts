// ---------------------------------------------------------------------------
// Tests for SourceFetcher routing, URL rewriting and dialect dispatch.
//
// The page fetcher is replaced by a vi.fn so no request leaves the process.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import pino from "pino";

import { FormatError, NetworkError, SourceParameterError } from "../../../src/core/errors.js";
import type { FetchedPage, PageFetcher } from "../../../src/core/types.js";
import { formatField } from "../../../src/marc/field.js";
import {
  buildSourceRecordUrl,
  isSourceRecordUrl,
  parseSourceUrl,
  SourceFetcher,
} from "../../../src/scrape/source-fetcher.js";

// ── Fixtures ─────────────────────────────────────────────────────────────

const RECORD_URL = "https://catalog.example.org/record/1";

const INLINE_PAGE = `
<div class="field"><span class="tag">100</span><div class="ind1">1</div><span class="sub_code">|a</span>Melville, Herman,</div>
<div class="field"><span class="tag">245</span><div class="ind1">1</div><div class="ind2">0</div><span class="sub_code">|a</span>Moby Dick /</div>`;

const PLAIN_TABLE = `
<table>
<tr><th>245</th><td>0</td><td>0</td><td><strong>_a</strong>Plain Title</td></tr>
</table>`;

function page(url: string, body: string, finalUrl = url): FetchedPage {
  return { requestedUrl: url, finalUrl, redirected: finalUrl !== url, status: 200, body };
}

// ── URL helpers ─────────────────────────────────────────────────────────

describe("parseSourceUrl", () => {
  it("rejects a blank URL", () => {
    expect(() => parseSourceUrl("   ")).toThrow("Please enter a valid URL.");
  });

  it("rejects a relative URL", () => {
    expect(() => parseSourceUrl("record/1")).toThrow(SourceParameterError);
  });

  it("rejects schemes other than http(s)", () => {
    expect(() => parseSourceUrl("ftp://catalog.example.org/x")).toThrow(
      "Unsupported URL scheme: ftp:",
    );
  });
});

describe("isSourceRecordUrl / buildSourceRecordUrl", () => {
  it("routes aggregator hosts and source-record paths", () => {
    expect(isSourceRecordUrl(new URL("https://uni.primo.exlibrisgroup.com/discovery/fulldisplay"))).toBe(true);
    expect(isSourceRecordUrl(new URL("https://lib.example.edu/discovery/sourceRecord?docId=1"))).toBe(true);
    expect(isSourceRecordUrl(new URL(RECORD_URL))).toBe(false);
  });

  it("builds the API URL from the three record parameters", () => {
    const url = new URL(
      "https://uni.primo.exlibrisgroup.com/discovery/fulldisplay?context=L&docId=alma991&vid=MAIN&recordOwner=OWNER",
    );
    expect(buildSourceRecordUrl(url)).toBe(
      "https://uni.primo.exlibrisgroup.com/primaws/rest/pub/sourceRecord?docId=alma991&vid=MAIN&recordOwner=OWNER&lang=en",
    );
  });

  it("names every missing parameter", () => {
    const url = new URL("https://uni.primo.exlibrisgroup.com/discovery/fulldisplay?docId=alma991");
    expect(() => buildSourceRecordUrl(url)).toThrow(
      expect.objectContaining({ missing: ["vid", "recordOwner"] }),
    );
  });
});

// ── SourceFetcher.scrape ────────────────────────────────────────────────

describe("SourceFetcher", () => {
  let fetchPage: Mock<PageFetcher>;
  let fetcher: SourceFetcher;

  beforeEach(() => {
    fetchPage = vi.fn<PageFetcher>();
    fetcher = new SourceFetcher({
      fetchPage,
      timeoutMs: 5000,
      logger: pino({ level: "silent" }),
    });
  });

  it("parses an inline-fields page and derives the filename", async () => {
    fetchPage.mockResolvedValueOnce(page(RECORD_URL, INLINE_PAGE));

    const doc = await fetcher.scrape(`  ${RECORD_URL}  `);

    expect(fetchPage).toHaveBeenCalledWith(RECORD_URL, { timeoutMs: 5000 });
    expect(doc.source).toBe("inline_fields");
    expect(doc.sourceUrl).toBe(RECORD_URL);
    expect(doc.filename).toBe("Melville_Herman_Moby_Dick");
    expect(doc.fields.map(formatField)).toEqual([
      "=100  1\\$aMelville, Herman,",
      "=245  10$aMoby Dick /",
    ]);
  });

  it("follows the plain view link against the final page origin", async () => {
    fetchPage
      .mockResolvedValueOnce(
        page(
          RECORD_URL,
          '<table id="marc"></table><a id="switchview" href="/record/1/plain">Plain view</a>',
          "https://opac.example.org/record/1?view=marc",
        ),
      )
      .mockResolvedValueOnce(page("https://opac.example.org/record/1/plain", PLAIN_TABLE));

    const doc = await fetcher.scrape(RECORD_URL);

    expect(fetchPage).toHaveBeenNthCalledWith(2, "https://opac.example.org/record/1/plain", {
      timeoutMs: 5000,
    });
    expect(doc.source).toBe("plain_view_redirect");
    expect(doc.fields.map(formatField)).toEqual(["=245  00$aPlain Title"]);
    expect(doc.filename).toBe("UnknownAuthor_Plain_Title");
  });

  it("fails when the MARC table page has no plain view link", async () => {
    fetchPage.mockResolvedValueOnce(page(RECORD_URL, '<table id="marc"></table>'));

    await expect(fetcher.scrape(RECORD_URL)).rejects.toThrow(
      "Plain view link (a#switchview) not found on MARC table page",
    );
  });

  it("reads line text from the left-to-right pre block", async () => {
    fetchPage.mockResolvedValueOnce(
      page(RECORD_URL, '<pre>ignored</pre><pre style="direction: ltr">001 x\n245 10 $aLine Title</pre>'),
    );

    const doc = await fetcher.scrape(RECORD_URL);
    expect(doc.source).toBe("line_text");
    expect(doc.fields.map(formatField)).toEqual(["=245  10$aLine Title"]);
  });

  it("rejects an unrecognised page", async () => {
    fetchPage.mockResolvedValueOnce(page(RECORD_URL, "<h1>Catalog home</h1>"));

    const attempt = fetcher.scrape(RECORD_URL);
    await expect(attempt).rejects.toBeInstanceOf(FormatError);
    await expect(attempt).rejects.toThrow(
      "Unable to identify the MARC format in the provided HTML.",
    );
  });

  it("fetches aggregator records through the source-record API", async () => {
    const apiUrl =
      "https://uni.primo.exlibrisgroup.com/primaws/rest/pub/sourceRecord?docId=alma991&vid=MAIN&recordOwner=OWNER&lang=en";
    fetchPage.mockResolvedValueOnce(
      page(apiUrl, "LDR 00000nam\n100 1  $aDoe, Jane.\n245 10 $aField Notes"),
    );

    const doc = await fetcher.scrape(
      "https://uni.primo.exlibrisgroup.com/discovery/fulldisplay?docId=alma991&vid=MAIN&recordOwner=OWNER",
    );

    expect(fetchPage).toHaveBeenCalledWith(apiUrl, { timeoutMs: 5000 });
    expect(doc.source).toBe("source_record_api");
    expect(doc.filename).toBe("Doe_Jane_Field_Notes");
  });

  it("parses a MARCXML source-record body", async () => {
    fetchPage.mockResolvedValueOnce(
      page(
        "https://lib.example.edu/discovery/sourceRecord",
        '<record><datafield tag="245" ind1="0" ind2="0"><subfield code="a">XML Title</subfield></datafield></record>',
      ),
    );

    const doc = await fetcher.scrape(
      "https://lib.example.edu/discovery/sourceRecord?docId=d1&vid=v1&recordOwner=o1",
    );
    expect(doc.fields.map(formatField)).toEqual(["=245  00$aXML Title"]);
  });

  it("does not fetch when aggregator parameters are missing", async () => {
    await expect(
      fetcher.scrape("https://uni.primo.exlibrisgroup.com/discovery/fulldisplay?vid=MAIN"),
    ).rejects.toBeInstanceOf(SourceParameterError);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it("propagates network errors", async () => {
    const failure = new NetworkError("Request to x failed with HTTP 503", RECORD_URL, "http_status", 503);
    fetchPage.mockRejectedValueOnce(failure);

    await expect(fetcher.scrape(RECORD_URL)).rejects.toBe(failure);
  });
});
