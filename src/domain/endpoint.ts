// ---------------------------------------------------------------------------
// Library endpoint validation.
// ---------------------------------------------------------------------------

import { EndpointValidationError } from "../core/errors.js";
import type { LibraryEndpoint } from "../core/types.js";
import {
  AUTHOR_PLACEHOLDER,
  ISBN_PLACEHOLDER,
  TITLE_PLACEHOLDER,
} from "../search/url-template.js";

function isHttpUrl(template: string): boolean {
  try {
    const url = new URL(template);
    return (url.protocol === "http:" || url.protocol === "https:") && url.host !== "";
  } catch {
    return false;
  }
}

/**
 * Every rule the endpoint breaks. Empty when the endpoint is acceptable.
 *
 * - name is non-empty
 * - the ISBN template has `{isbn}` and neither `{title}` nor `{author}`
 * - the title/author template has `{title}` and `{author}` but not `{isbn}`
 * - both templates are absolute http(s) URLs
 */
export function findEndpointProblems(endpoint: LibraryEndpoint): string[] {
  const problems: string[] = [];
  const { isbnUrl, titleAuthorUrl } = endpoint;

  if (!endpoint.name.trim()) {
    problems.push("Library name is required.");
  }

  if (!isbnUrl.includes(ISBN_PLACEHOLDER)) {
    problems.push("ISBN URL must contain {isbn}.");
  }
  if (isbnUrl.includes(TITLE_PLACEHOLDER) || isbnUrl.includes(AUTHOR_PLACEHOLDER)) {
    problems.push("ISBN URL must not contain {title} or {author}.");
  }
  if (!isHttpUrl(isbnUrl)) {
    problems.push("ISBN URL is not a valid http(s) URL.");
  }

  if (!titleAuthorUrl.includes(TITLE_PLACEHOLDER) || !titleAuthorUrl.includes(AUTHOR_PLACEHOLDER)) {
    problems.push("Title/Author URL must contain {title} and {author}.");
  }
  if (titleAuthorUrl.includes(ISBN_PLACEHOLDER)) {
    problems.push("Title/Author URL must not contain {isbn}.");
  }
  if (!isHttpUrl(titleAuthorUrl)) {
    problems.push("Title/Author URL is not a valid http(s) URL.");
  }

  return problems;
}

/**
 * Return a trimmed copy of the endpoint.
 *
 * @throws {EndpointValidationError} listing every problem found.
 */
export function validateEndpoint(endpoint: LibraryEndpoint): LibraryEndpoint {
  const normalized: LibraryEndpoint = {
    name: endpoint.name.trim(),
    isbnUrl: endpoint.isbnUrl.trim(),
    titleAuthorUrl: endpoint.titleAuthorUrl.trim(),
  };
  const problems = findEndpointProblems(normalized);
  if (problems.length > 0) {
    throw new EndpointValidationError(problems);
  }
  return normalized;
}
