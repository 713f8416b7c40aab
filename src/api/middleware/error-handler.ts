// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";

import {
  EndpointValidationError,
  FormatError,
  LibraryIndexError,
  MarcValidationError,
  NetworkError,
  PersistenceError,
  RecordValidationError,
  RequestValidationError,
  SearchQueryError,
  SourceParameterError,
} from "../../core/errors.js";
import type { AppConfig } from "../../core/types.js";
import type { AppEnv } from "../env.js";

interface ErrorBody {
  error: string;
  type: string;
  details?: string[];
}

/** Status, type tag, and whether the message is safe to expose. */
function classify(err: Error): { status: ContentfulStatusCode; body: ErrorBody; expose: boolean } {
  if (err instanceof RequestValidationError) {
    return { status: 400, body: { error: err.message, type: "request_validation_error", details: err.issues }, expose: true };
  }
  if (err instanceof EndpointValidationError) {
    return { status: 400, body: { error: err.message, type: "endpoint_validation_error", details: err.problems }, expose: true };
  }
  if (err instanceof SearchQueryError) {
    return { status: 400, body: { error: err.message, type: "search_query_error" }, expose: true };
  }
  if (err instanceof SourceParameterError) {
    return { status: 400, body: { error: err.message, type: "source_parameter_error", details: err.missing }, expose: true };
  }
  if (err instanceof LibraryIndexError) {
    return { status: 404, body: { error: err.message, type: "not_found" }, expose: true };
  }
  if (err instanceof FormatError) {
    return { status: 422, body: { error: err.message, type: "format_error" }, expose: true };
  }
  if (err instanceof RecordValidationError) {
    return { status: 422, body: { error: err.message, type: "record_validation_error", details: err.problems }, expose: true };
  }
  if (err instanceof MarcValidationError) {
    return { status: 422, body: { error: err.message, type: "marc_validation_error" }, expose: true };
  }
  if (err instanceof NetworkError) {
    return {
      status: err.failure === "timeout" ? 504 : 502,
      body: { error: err.message, type: `network_${err.failure}` },
      expose: false,
    };
  }
  if (err instanceof PersistenceError) {
    return { status: 500, body: { error: err.message, type: "persistence_error" }, expose: false };
  }
  return { status: 500, body: { error: err.message, type: "internal_error" }, expose: false };
}

const PRODUCTION_MESSAGES: Record<number, string> = {
  500: "Internal server error",
  502: "Upstream catalog request failed",
  504: "Upstream catalog request timed out",
};

/**
 * Build the Hono `onError` handler that inspects the thrown error and returns
 * an appropriate HTTP status code with a JSON body `{ error, type }`.
 *
 * Input-feedback errors (4xx) always carry their message. When `env` is
 * `production`,
 * 5xx messages are replaced with a generic text so internal paths and
 * upstream URLs are not exposed.
 *
 * Mapping:
 * - request, endpoint, query or source-parameter problems -> 400
 * - unknown library index                                 -> 404
 * - unrecognised page format, invalid record or field     -> 422
 * - upstream failure -> 502, upstream timeout             -> 504
 * - persistence and everything else                       -> 500
 */
export function createErrorHandler(
  env: AppConfig["env"],
): (err: Error, c: Context<AppEnv>) => Response {
  const isProduction = env === "production";

  return (err, c) => {
    const { status, body, expose } = classify(err);

    const logger = c.get("logger");
    if (logger) {
      if (status >= 500) logger.error({ err, status }, "request failed");
      else logger.info({ err: err.message, status }, "request rejected");
    }

    if (isProduction && !expose) {
      return c.json(
        { error: PRODUCTION_MESSAGES[status] ?? PRODUCTION_MESSAGES[500], type: body.type },
        status,
      );
    }
    return c.json(body, status);
  };
}
