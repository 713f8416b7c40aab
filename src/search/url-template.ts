// ---------------------------------------------------------------------------
// Search URL construction from endpoint templates.
// ---------------------------------------------------------------------------

import { SearchQueryError } from "../core/errors.js";
import type { LibraryEndpoint, SearchQuery } from "../core/types.js";

export const ISBN_PLACEHOLDER = "{isbn}";
export const TITLE_PLACEHOLDER = "{title}";
export const AUTHOR_PLACEHOLDER = "{author}";

/** Replace every occurrence of `placeholder` with the encoded value. */
function fill(template: string, placeholder: string, value: string): string {
  return template.split(placeholder).join(encodeURIComponent(value));
}

/**
 * Build the search URL for one endpoint. Query components are trimmed and
 * percent-encoded.
 *
 * @throws {SearchQueryError} when a required component is empty.
 */
export function buildSearchUrl(endpoint: LibraryEndpoint, query: SearchQuery): string {
  if (query.kind === "isbn") {
    const isbn = query.isbn.trim();
    if (!isbn) {
      throw new SearchQueryError("ISBN field is empty. Cannot perform the search.");
    }
    return fill(endpoint.isbnUrl, ISBN_PLACEHOLDER, isbn);
  }

  const title = query.title.trim();
  const author = query.author.trim();
  if (!title || !author) {
    throw new SearchQueryError("Title or Author field is empty. Cannot perform the search.");
  }
  return fill(
    fill(endpoint.titleAuthorUrl, TITLE_PLACEHOLDER, title),
    AUTHOR_PLACEHOLDER,
    author,
  );
}

/** Throw early when a query could never produce a URL. */
export function assertQueryComplete(query: SearchQuery): void {
  if (query.kind === "isbn" && !query.isbn.trim()) {
    throw new SearchQueryError("ISBN field is empty. Cannot perform the search.");
  }
  if (query.kind === "title_author" && (!query.title.trim() || !query.author.trim())) {
    throw new SearchQueryError("Title or Author field is empty. Cannot perform the search.");
  }
}
