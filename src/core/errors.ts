// ---------------------------------------------------------------------------
// Error hierarchy for MARC scout.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all MARC scout domain errors.
 */
export class MarcScoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MarcScoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Scraping errors ─────────────────────────────────────────────────────────

/**
 * The fetched markup is not one of the known dialects, or a structural anchor
 * the dialect needs is missing.
 */
export class FormatError extends MarcScoutError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FormatError";
  }
}

/** Required query parameters are absent from an API-style source URL. */
export class SourceParameterError extends MarcScoutError {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceParameterError";
    this.missing = missing;
  }
}

/** A tag, indicator or subfield does not have a valid MARC shape. */
export class MarcValidationError extends MarcScoutError {
  public readonly tag: string;

  constructor(tag: string, reason: string, options?: ErrorOptions) {
    super(`Invalid field ${JSON.stringify(tag)}: ${reason}`, options);
    this.name = "MarcValidationError";
    this.tag = tag;
  }
}

// ── Network errors ──────────────────────────────────────────────────────────

export type NetworkFailure = "timeout" | "connection" | "http_status";

/** Timeout, connection failure, or non-2xx status at the fetch boundary. */
export class NetworkError extends MarcScoutError {
  public readonly url: string;
  public readonly failure: NetworkFailure;
  public readonly status: number | null;

  constructor(
    message: string,
    url: string,
    failure: NetworkFailure,
    status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "NetworkError";
    this.url = url;
    this.failure = failure;
    this.status = status;
  }
}

// ── Validation errors ───────────────────────────────────────────────────────

/** A record is missing a required field at commit time. */
export class RecordValidationError extends MarcScoutError {
  public readonly problems: string[];

  constructor(problems: string[], options?: ErrorOptions) {
    super(`MARC record failed validation: ${problems.join("; ")}`, options);
    this.name = "RecordValidationError";
    this.problems = problems;
  }
}

/** A library endpoint broke the placeholder or URL rules. */
export class EndpointValidationError extends MarcScoutError {
  public readonly problems: string[];

  constructor(problems: string[], options?: ErrorOptions) {
    super(`Invalid library endpoint: ${problems.join("; ")}`, options);
    this.name = "EndpointValidationError";
    this.problems = problems;
  }
}

/** The search query lacks a required component, or the scope is out of range. */
export class SearchQueryError extends MarcScoutError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SearchQueryError";
  }
}

/** No library exists at the given position in the list. */
export class LibraryIndexError extends MarcScoutError {
  public readonly index: number;

  constructor(index: number, options?: ErrorOptions) {
    super(`No library at index ${index}`, options);
    this.name = "LibraryIndexError";
    this.index = index;
  }
}

/** An API request body or parameter failed schema validation. */
export class RequestValidationError extends MarcScoutError {
  public readonly issues: string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Invalid request: ${issues.join("; ")}`, options);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** Writing the library list or a MARC file failed. */
export class PersistenceError extends MarcScoutError {
  public readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PersistenceError";
    this.path = path;
  }
}

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends MarcScoutError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
