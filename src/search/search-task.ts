// ---------------------------------------------------------------------------
// Search task: query each endpoint in order and report per-endpoint status.
//
// The task checks its stop signal between endpoints only. The signal is not
// handed to fetch, so an in-flight request runs to completion (or to its own
// timeout); its result is dropped when a stop was requested meanwhile.
// ---------------------------------------------------------------------------

import { NetworkError, SearchQueryError } from "../core/errors.js";
import {
  SearchVerdict,
  TaskState,
  type EndpointOutcome,
  type LibraryEndpoint,
  type PageFetcher,
  type SearchQuery,
  type SearchScope,
  type StatusListener,
} from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import { classifyResponse } from "./response-classifier.js";
import { buildSearchUrl } from "./url-template.js";

export interface SearchTaskOptions {
  taskId: string;
  /** Snapshot of the endpoint list taken when the task was started. */
  endpoints: readonly LibraryEndpoint[];
  query: SearchQuery;
  scope: SearchScope;
  fetchPage: PageFetcher;
  timeoutMs: number;
  signal: AbortSignal;
  onUpdate: StatusListener;
  logger: Logger;
}

export type SearchTaskResult = typeof TaskState.COMPLETED | typeof TaskState.CANCELED;

/** Indices visited for a scope, in list order. */
export function scopeIndices(scope: SearchScope, count: number): number[] {
  if (scope.kind === "single") {
    return scope.index >= 0 && scope.index < count ? [scope.index] : [];
  }
  return Array.from({ length: count }, (_, i) => i);
}

/**
 * Run one search to completion or until `signal` is aborted.
 *
 * Never rejects for per-endpoint failures: a bad URL or a network error
 * becomes an `error` status for that endpoint and the loop moves on.
 */
export async function runSearchTask(options: SearchTaskOptions): Promise<SearchTaskResult> {
  const { taskId, endpoints, query, signal } = options;
  const logger = options.logger.child({ taskId });

  const emit = (index: number, outcome: EndpointOutcome): void => {
    options.onUpdate({
      taskId,
      index,
      endpointName: endpoints[index].name,
      outcome,
    });
  };

  for (const index of scopeIndices(options.scope, endpoints.length)) {
    if (signal.aborted) {
      logger.info({ index }, "search stopped before endpoint");
      return TaskState.CANCELED;
    }

    const endpoint = endpoints[index];

    let url: string;
    try {
      url = buildSearchUrl(endpoint, query);
    } catch (err) {
      if (!(err instanceof SearchQueryError)) throw err;
      emit(index, { status: "error", reason: err.message, url: null });
      continue;
    }

    emit(index, { status: "searching", url });

    try {
      const page = await options.fetchPage(url, { timeoutMs: options.timeoutMs });
      if (signal.aborted) {
        logger.info({ index, url }, "discarding response received after stop");
        return TaskState.CANCELED;
      }

      const result = classifyResponse(page);
      logger.debug({ index, url, verdict: result.verdict, rule: result.rule }, "classified response");
      emit(
        index,
        result.verdict === SearchVerdict.FOUND
          ? { status: "found", url: result.url }
          : { status: "not_found", url: result.url },
      );
    } catch (err) {
      if (signal.aborted) {
        logger.info({ index, url }, "discarding failure received after stop");
        return TaskState.CANCELED;
      }
      if (!(err instanceof NetworkError)) {
        logger.error({ index, url, err }, "unexpected error while searching endpoint");
      }
      const reason = err instanceof Error ? err.message : String(err);
      emit(index, { status: "error", reason, url });
    }
  }

  return TaskState.COMPLETED;
}
