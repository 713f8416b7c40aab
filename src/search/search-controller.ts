// ---------------------------------------------------------------------------
// Search controller: owns the per-endpoint status table and the single
// active search task.
//
// Every public operation is queued, so start/cancel calls never interleave.
// Starting a search first stops the previous task and waits for it to exit,
// which guarantees the new task's first update arrives after the old task's
// last one.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";

import { SearchQueryError } from "../core/errors.js";
import {
  TaskState,
  type LibraryEndpoint,
  type PageFetcher,
  type SearchQuery,
  type SearchRow,
  type SearchScope,
  type SearchSnapshot,
  type StatusListener,
  type StatusUpdate,
} from "../core/types.js";
import type { Logger } from "../logging/logger.js";
import { runSearchTask } from "./search-task.js";
import { assertQueryComplete } from "./url-template.js";

/** Anything that can hand out the current endpoint list. */
export interface EndpointSource {
  list(): readonly LibraryEndpoint[];
}

export interface SearchControllerOptions {
  endpoints: EndpointSource;
  fetchPage: PageFetcher;
  timeoutMs: number;
  logger: Logger;
}

interface ActiveTask {
  id: string;
  abort: AbortController;
  done: Promise<void>;
}

export class SearchController {
  private readonly endpoints: EndpointSource;
  private readonly fetchPage: PageFetcher;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly listeners = new Set<StatusListener>();

  private queue: Promise<unknown> = Promise.resolve();
  private active: ActiveTask | null = null;

  private taskId: string | null = null;
  private state: TaskState = TaskState.IDLE;
  private query: SearchQuery | null = null;
  private scope: SearchScope | null = null;
  private startedAt: string | null = null;
  private completedAt: string | null = null;
  private rows: SearchRow[] = [];

  constructor(options: SearchControllerOptions) {
    this.endpoints = options.endpoints;
    this.fetchPage = options.fetchPage;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ component: "search-controller" });
  }

  // ── Public interface ────────────────────────────────────────────────────

  /**
   * Start a search over every endpoint, or re-run one endpoint when `scope`
   * is `single`. Any running search is cancelled and awaited first.
   *
   * @throws {SearchQueryError} for an empty query component or an
   *   out-of-range endpoint index. The running search is left untouched.
   */
  start(query: SearchQuery, scope: SearchScope = { kind: "all" }): Promise<SearchSnapshot> {
    return this.enqueue(async () => {
      assertQueryComplete(query);
      const endpoints = [...this.endpoints.list()];
      if (scope.kind === "single" && (scope.index < 0 || scope.index >= endpoints.length)) {
        throw new SearchQueryError(
          `Library index ${scope.index} is out of range (0-${endpoints.length - 1})`,
        );
      }

      await this.stopActive();
      this.launch(query, scope, endpoints);
      return this.snapshot();
    });
  }

  /** Stop the running search, if any, and mark in-flight rows canceled. */
  cancel(): Promise<SearchSnapshot> {
    return this.enqueue(async () => {
      await this.stopActive();
      return this.snapshot();
    });
  }

  /** Resolves once the current task (if any) has exited. */
  async whenIdle(): Promise<void> {
    await this.queue.catch(() => undefined);
    await this.active?.done;
  }

  snapshot(): SearchSnapshot {
    return {
      taskId: this.taskId,
      state: this.state,
      query: this.query,
      scope: this.scope,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      rows: this.rows.map((r) => ({ name: r.name, outcome: r.outcome })),
    };
  }

  /** Subscribe to status updates. Returns an unsubscribe function. */
  onUpdate(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const next = this.queue.then(op, op);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private launch(
    query: SearchQuery,
    scope: SearchScope,
    endpoints: LibraryEndpoint[],
  ): void {
    const id = randomUUID();
    const abort = new AbortController();

    const keepRows = scope.kind === "single" && this.rows.length === endpoints.length;
    this.rows = endpoints.map((endpoint, i): SearchRow => {
      const pending: SearchRow = { name: endpoint.name, outcome: { status: "pending" } };
      if (!keepRows || (scope.kind === "single" && scope.index === i)) return pending;
      return { name: endpoint.name, outcome: this.rows[i].outcome };
    });

    this.taskId = id;
    this.state = TaskState.RUNNING;
    this.query = query;
    this.scope = scope;
    this.startedAt = new Date().toISOString();
    this.completedAt = null;

    this.logger.info(
      { taskId: id, query, scope, endpoints: endpoints.length },
      "search started",
    );

    const done = runSearchTask({
      taskId: id,
      endpoints,
      query,
      scope,
      fetchPage: this.fetchPage,
      timeoutMs: this.timeoutMs,
      signal: abort.signal,
      onUpdate: (update) => this.apply(update),
      logger: this.logger,
    })
      .then((result) => {
        if (this.taskId !== id) return;
        this.state = result;
        this.completedAt = new Date().toISOString();
        this.logger.info({ taskId: id, state: result }, "search finished");
      })
      .catch((err: unknown) => {
        if (this.taskId === id) {
          this.state = TaskState.COMPLETED;
          this.completedAt = new Date().toISOString();
        }
        this.logger.error({ taskId: id, err }, "search task failed");
      });

    this.active = { id, abort, done };
  }

  private async stopActive(): Promise<void> {
    const task = this.active;
    if (!task) return;

    if (!task.abort.signal.aborted && this.state === TaskState.RUNNING) {
      this.logger.info({ taskId: task.id }, "cancelling the current search");
    }
    task.abort.abort();
    await task.done;
    this.active = null;

    if (this.state === TaskState.RUNNING) {
      this.state = TaskState.CANCELED;
      this.completedAt = new Date().toISOString();
    }

    this.rows.forEach((row, index) => {
      if (row.outcome.status !== "searching") return;
      const url = row.outcome.url;
      this.rows[index] = { name: row.name, outcome: { status: "canceled", url } };
      this.logger.info({ taskId: task.id, index }, `${row.name}: Search canceled.`);
      this.notify({
        taskId: task.id,
        index,
        endpointName: row.name,
        outcome: { status: "canceled", url },
      });
    });
  }

  private apply(update: StatusUpdate): void {
    if (update.taskId !== this.taskId) return;
    const row = this.rows[update.index];
    if (!row) return;

    this.rows[update.index] = { name: row.name, outcome: update.outcome };
    this.logOutcome(update);
    this.notify(update);
  }

  private logOutcome({ taskId, index, endpointName, outcome }: StatusUpdate): void {
    const log = this.logger.child({ taskId, index });
    switch (outcome.status) {
      case "searching":
        log.debug({ url: outcome.url }, `${endpointName}: Searching...`);
        break;
      case "found":
        log.info({ url: outcome.url }, `${endpointName}: Found - ${outcome.url}`);
        break;
      case "not_found":
        log.info({ url: outcome.url }, `${endpointName}: Not Found`);
        break;
      case "error":
        log.warn(
          { url: outcome.url, reason: outcome.reason },
          `${endpointName}: Error accessing ${outcome.url ?? "library"}`,
        );
        break;
      case "canceled":
      case "pending":
        log.info(`${endpointName}: ${outcome.status}`);
        break;
    }
  }

  private notify(update: StatusUpdate): void {
    for (const listener of this.listeners) {
      try {
        listener(update);
      } catch (err) {
        this.logger.warn({ err }, "status listener threw");
      }
    }
  }
}
