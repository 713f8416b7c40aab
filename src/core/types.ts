// ---------------------------------------------------------------------------
// Core types for MARC scout.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── MARC field drafts ───────────────────────────────────────────────────────

/** Tags that are always control fields when they appear in scraped markup. */
export const CONTROL_FIELD_TAGS: readonly string[] = ["001", "003", "005", "008"];

/** One coded subfield. Order inside a field is significant. */
export interface Subfield {
  code: string;
  value: string;
}

/** An indicator pair. A blank indicator is stored as a single space. */
export type Indicators = readonly [string, string];

export interface ControlFieldDraft {
  kind: "control";
  tag: string;
  data: string;
}

export interface DataFieldDraft {
  kind: "data";
  tag: string;
  indicators: Indicators;
  subfields: Subfield[];
}

/**
 * Intermediate representation produced by every dialect parser before it is
 * committed to a {@link MarcRecord}.
 */
export type MarcFieldDraft = ControlFieldDraft | DataFieldDraft;

// ── Scraping ────────────────────────────────────────────────────────────────

export const MarcDialect = {
  /** `div.field` containers with inline tag/indicator/subfield spans. */
  INLINE_FIELDS: "inline_fields",
  /** `table#marc` page that links to a plain view. */
  PLAIN_VIEW_REDIRECT: "plain_view_redirect",
  /** Line-oriented MARC text inside a left-to-right `pre` block. */
  LINE_TEXT: "line_text",
  /** `table.citation.table.table-striped`, one row per field. */
  CITATION_TABLE: "citation_table",
} as const;
export type MarcDialect = (typeof MarcDialect)[keyof typeof MarcDialect];

/** Result of format detection. */
export type DetectedFormat = MarcDialect | "unknown";

/** How the source fetcher obtained the field list. */
export type ScrapeSource = MarcDialect | "source_record_api";

export interface ParsedMarcDocument {
  sourceUrl: string;
  source: ScrapeSource;
  fields: MarcFieldDraft[];
  /** Safe base filename (no extension) derived from 100$a and 245$a. */
  filename: string;
}

// ── HTTP ────────────────────────────────────────────────────────────────────

export interface FetchedPage {
  requestedUrl: string;
  /** URL after redirects were followed. */
  finalUrl: string;
  redirected: boolean;
  status: number;
  body: string;
}

export interface FetchOptions {
  timeoutMs: number;
}

/** Single GET that follows redirects. Rejects with `NetworkError`. */
export type PageFetcher = (
  url: string,
  options: FetchOptions,
) => Promise<FetchedPage>;

// ── Library endpoints ───────────────────────────────────────────────────────

export interface LibraryEndpoint {
  /** Display label only; never used for matching. */
  name: string;
  /** Contains `{isbn}`. */
  isbnUrl: string;
  /** Contains `{title}` and `{author}`. */
  titleAuthorUrl: string;
}

// ── Search ──────────────────────────────────────────────────────────────────

export type SearchQuery =
  | { kind: "isbn"; isbn: string }
  | { kind: "title_author"; title: string; author: string };

export type SearchScope = { kind: "all" } | { kind: "single"; index: number };

export const TaskState = {
  IDLE: "idle",
  RUNNING: "running",
  COMPLETED: "completed",
  CANCELED: "canceled",
} as const;
export type TaskState = (typeof TaskState)[keyof typeof TaskState];

export type EndpointOutcome =
  | { status: "pending" }
  | { status: "searching"; url: string }
  | { status: "found"; url: string }
  | { status: "not_found"; url: string }
  | { status: "error"; reason: string; url: string | null }
  | { status: "canceled"; url: string | null };

/** One-way message from the search worker to the foreground. */
export interface StatusUpdate {
  taskId: string;
  index: number;
  endpointName: string;
  outcome: EndpointOutcome;
}

export type StatusListener = (update: StatusUpdate) => void;

export interface SearchRow {
  name: string;
  outcome: EndpointOutcome;
}

export interface SearchSnapshot {
  taskId: string | null;
  state: TaskState;
  query: SearchQuery | null;
  scope: SearchScope | null;
  startedAt: string | null;
  completedAt: string | null;
  rows: SearchRow[];
}

export const SearchVerdict = {
  FOUND: "found",
  NOT_FOUND: "not_found",
} as const;
export type SearchVerdict = (typeof SearchVerdict)[keyof typeof SearchVerdict];

export interface Classification {
  verdict: SearchVerdict;
  /** URL to report: the final URL for FOUND, the requested URL otherwise. */
  url: string;
  /** Name of the rule that decided the verdict. */
  rule: string;
}

// ── Manual cataloging ───────────────────────────────────────────────────────

export interface CatalogEntry {
  title: string;
  subtitle?: string;
  author?: string;
  secondAuthor?: string;
  thirdAuthor?: string;
  editor?: string;
  secondEditor?: string;
  copyrightYear?: string;
  edition?: string;
  publisher?: string;
  publisherLocation?: string;
  lccn?: string;
  isbn?: string;
  secondIsbn?: string;
  locCallNumber?: string;
  pages?: string;
  bookHeight?: string;
  references?: boolean;
  referencesPageRange?: string;
  index?: boolean;
  summary?: string;
  locSubjects?: string[];
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logLevel: string;
  libraryFile: string;
  http: HttpConfig;
}

export interface HttpConfig {
  searchTimeoutMs: number;
  scrapeTimeoutMs: number;
  userAgent: string;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
