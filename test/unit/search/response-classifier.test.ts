// ---------------------------------------------------------------------------
// Tests for the search-result page classifier.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import type { FetchedPage } from "../../../src/core/types.js";
import { classifyResponse } from "../../../src/search/response-classifier.js";

const REQUESTED = "https://lib.example.org/search?isbn=123";
const FINAL = "https://lib.example.org/record/42";

function fetched(body: string, redirected = false): FetchedPage {
  return {
    requestedUrl: REQUESTED,
    finalUrl: redirected ? FINAL : REQUESTED,
    redirected,
    status: 200,
    body: `<html><body>${body}</body></html>`,
  };
}

describe("classifyResponse", () => {
  describe("not found", () => {
    it("matches a no-results phrase in visible text", () => {
      expect(classifyResponse(fetched("<p>No results found for 123</p>"))).toEqual({
        verdict: "not_found",
        url: REQUESTED,
        rule: "no-results-phrase",
      });
    });

    it("matches a no-results heading even after a redirect", () => {
      const result = classifyResponse(fetched("<h1>No Results</h1>", true));
      expect(result).toEqual({ verdict: "not_found", url: REQUESTED, rule: "no-results-heading" });
    });

    it("matches the empty documents container", () => {
      const result = classifyResponse(fetched('<div id="documents" class="noresults"></div>'));
      expect(result.rule).toBe("no-results-container");
    });

    it("matches the placeholder browse row", () => {
      const result = classifyResponse(
        fetched('<table><tr class="yourEntryWouldBeHere"><td>Your entry would be here</td></tr></table>'),
      );
      expect(result.rule).toBe("placeholder-row");
    });

    it("falls through to no-signal", () => {
      expect(classifyResponse(fetched("<p>Welcome to the catalog</p>"))).toEqual({
        verdict: "not_found",
        url: REQUESTED,
        rule: "no-signal",
      });
    });

    it("wins over a positive result total", () => {
      const result = classifyResponse(
        fetched('<meta name="totalResults" content="12"><p>No results found</p>'),
      );
      expect(result).toEqual({ verdict: "not_found", url: REQUESTED, rule: "no-results-phrase" });
    });

    it("does not count a zero result total", () => {
      const result = classifyResponse(fetched('<meta name="totalResults" content="0">'));
      expect(result.rule).toBe("no-signal");
    });
  });

  describe("found", () => {
    it("treats a redirect as a direct hit at the final URL", () => {
      expect(classifyResponse(fetched("<p>Moby Dick</p>", true))).toEqual({
        verdict: "found",
        url: FINAL,
        rule: "redirected",
      });
    });

    it("matches browse entry rows", () => {
      const result = classifyResponse(
        fetched('<table><tr class="browseEntry"><td>Moby Dick</td></tr></table>'),
      );
      expect(result).toEqual({ verdict: "found", url: REQUESTED, rule: "browse-entry-rows" });
    });

    it("matches a positive result total", () => {
      const result = classifyResponse(fetched('<meta name="totalResults" content="12">'));
      expect(result.rule).toBe("meta-total-results");
    });

    it("ignores phrases inside scripts", () => {
      const result = classifyResponse(
        fetched('<script>var empty = "no results found";</script><div class="bibDisplayContentMain">Moby Dick</div>'),
      );
      expect(result).toEqual({ verdict: "found", url: REQUESTED, rule: "detail-container" });
    });

    it("matches a results-found span", () => {
      const result = classifyResponse(fetched("<span>3 results found</span>"));
      expect(result.rule).toBe("results-found-span");
    });

    it("falls back to result count patterns in the body", () => {
      expect(classifyResponse(fetched("<p>Your search returned 5 results</p>")).rule).toBe(
        "result-count-pattern-1",
      );
      expect(classifyResponse(fetched("<p>Showing 1-10 of 42</p>")).rule).toBe(
        "result-count-pattern-4",
      );
    });
  });
});
