import { describe, it, expect } from "vitest";

import { SearchQueryError } from "../../../src/core/errors.js";
import type { LibraryEndpoint } from "../../../src/core/types.js";
import { assertQueryComplete, buildSearchUrl } from "../../../src/search/url-template.js";

const ENDPOINT: LibraryEndpoint = {
  name: "Example Public Library",
  isbnUrl: "https://lib.example.org/search?isbn={isbn}",
  titleAuthorUrl: "https://lib.example.org/s?t={title}&a={author}&again={title}",
};

describe("buildSearchUrl", () => {
  it("substitutes a trimmed ISBN", () => {
    expect(buildSearchUrl(ENDPOINT, { kind: "isbn", isbn: " 978-0 " })).toBe(
      "https://lib.example.org/search?isbn=978-0",
    );
  });

  it("percent-encodes every title and author occurrence", () => {
    const url = buildSearchUrl(ENDPOINT, {
      kind: "title_author",
      title: "Moby Dick/Whale",
      author: "Melville & Co",
    });
    expect(url).toBe(
      "https://lib.example.org/s?t=Moby%20Dick%2FWhale&a=Melville%20%26%20Co&again=Moby%20Dick%2FWhale",
    );
  });

  it("does not substitute placeholders that appear inside a value", () => {
    const url = buildSearchUrl(ENDPOINT, { kind: "title_author", title: "{author}", author: "X" });
    expect(url).toBe("https://lib.example.org/s?t=%7Bauthor%7D&a=X&again=%7Bauthor%7D");
  });

  it("rejects an empty ISBN", () => {
    expect(() => buildSearchUrl(ENDPOINT, { kind: "isbn", isbn: "   " })).toThrow(
      "ISBN field is empty. Cannot perform the search.",
    );
  });

  it("rejects a missing author", () => {
    expect(() =>
      buildSearchUrl(ENDPOINT, { kind: "title_author", title: "Moby Dick", author: "" }),
    ).toThrow("Title or Author field is empty. Cannot perform the search.");
  });
});

describe("assertQueryComplete", () => {
  it("accepts a complete query", () => {
    expect(() => assertQueryComplete({ kind: "isbn", isbn: "123" })).not.toThrow();
  });

  it("rejects a blank title", () => {
    expect(() =>
      assertQueryComplete({ kind: "title_author", title: " ", author: "Melville" }),
    ).toThrow(SearchQueryError);
  });
});
