// ---------------------------------------------------------------------------
// HTTP GET capability shared by the scraper and the search worker.
// ---------------------------------------------------------------------------

import { NetworkError } from "../core/errors.js";
import type { FetchedPage, FetchOptions, PageFetcher } from "../core/types.js";
import type { Logger } from "../logging/logger.js";

export interface PageFetcherOptions {
  userAgent: string;
  logger: Logger;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

/**
 * Map whatever `fetch` threw onto a {@link NetworkError}.
 *
 * - AbortError / TimeoutError -> `timeout`
 * - TypeError (DNS, refused, reset, TLS) -> `connection`
 * - anything else -> `connection` with the original message
 */
export function toNetworkError(error: unknown, url: string, timeoutMs: number): NetworkError {
  if (error instanceof NetworkError) return error;

  if (isTimeout(error)) {
    return new NetworkError(
      `Request to ${url} timed out after ${timeoutMs}ms`,
      url,
      "timeout",
      null,
      { cause: error },
    );
  }

  if (error instanceof TypeError) {
    const detail = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return new NetworkError(
      `Network error fetching ${url}: ${error.message}${detail}`,
      url,
      "connection",
      null,
      { cause: error },
    );
  }

  const msg = error instanceof Error ? error.message : "Unknown fetch error";
  return new NetworkError(`Fetching ${url} failed: ${msg}`, url, "connection", null, {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Create a {@link PageFetcher} backed by the global `fetch`.
 *
 * Redirects are followed; the returned page reports the final URL and
 * whether any redirect happened. A non-2xx status rejects with an
 * `http_status` {@link NetworkError}.
 */
export function createPageFetcher(options: PageFetcherOptions): PageFetcher {
  const logger = options.logger.child({ component: "page-fetcher" });

  return async (url: string, { timeoutMs }: FetchOptions): Promise<FetchedPage> => {
    const start = performance.now();
    logger.debug({ url, timeoutMs }, "fetching page");

    try {
      const response = await fetch(url, {
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          Accept: "text/html, application/xhtml+xml, application/xml;q=0.9, */*;q=0.8",
          "User-Agent": options.userAgent,
        },
      });

      if (!response.ok) {
        throw new NetworkError(
          `Request to ${url} failed with HTTP ${response.status}`,
          url,
          "http_status",
          response.status,
        );
      }

      const body = await response.text();
      const page: FetchedPage = {
        requestedUrl: url,
        finalUrl: response.url || url,
        redirected: response.redirected,
        status: response.status,
        body,
      };

      logger.debug(
        {
          url,
          finalUrl: page.finalUrl,
          status: page.status,
          responseTimeMs: Math.round(performance.now() - start),
        },
        "page fetched",
      );
      return page;
    } catch (error: unknown) {
      const wrapped = toNetworkError(error, url, timeoutMs);
      logger.warn(
        { url, failure: wrapped.failure, status: wrapped.status },
        wrapped.message,
      );
      throw wrapped;
    }
  };
}
