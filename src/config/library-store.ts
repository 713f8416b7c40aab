// ---------------------------------------------------------------------------
// Library list persistence.
// The list is an ordered JSON array of endpoints, validated with Zod on load
// and rewritten in full after every change.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { LibraryIndexError, PersistenceError } from "../core/errors.js";
import type { LibraryEndpoint } from "../core/types.js";
import { validateEndpoint } from "../domain/endpoint.js";
import type { Logger } from "../logging/logger.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const StoredEndpointSchema = z.object({
  name: z.string(),
  isbn_url: z.string().default(""),
  title_author_url: z.string().default(""),
});

export const LibraryFileSchema = z.array(StoredEndpointSchema);

type StoredEndpoint = z.infer<typeof StoredEndpointSchema>;

function fromStored(stored: StoredEndpoint): LibraryEndpoint {
  return {
    name: stored.name,
    isbnUrl: stored.isbn_url,
    titleAuthorUrl: stored.title_author_url,
  };
}

function toStored(endpoint: LibraryEndpoint): StoredEndpoint {
  return {
    name: endpoint.name,
    isbn_url: endpoint.isbnUrl,
    title_author_url: endpoint.titleAuthorUrl,
  };
}

// ── LibraryStore ────────────────────────────────────────────────────────────

/**
 * In-memory library list backed by a JSON file.
 *
 * A failed save keeps the in-memory change, marks the store dirty and
 * rethrows as {@link PersistenceError}; {@link flush} retries the write.
 */
export class LibraryStore {
  private endpoints: LibraryEndpoint[] = [];
  private dirty = false;
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger.child({ component: "library-store", file: this.filePath });
  }

  /**
   * Read the file. A missing or malformed file yields an empty list and a
   * warning; stored entries are loaded as-is.
   */
  load(): LibraryEndpoint[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      this.logger.warn({ err }, "No library list file found. Please add a library.");
      this.endpoints = [];
      return this.list();
    }

    try {
      const parsed = LibraryFileSchema.parse(JSON.parse(raw));
      this.endpoints = parsed.map(fromStored);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ err: message }, "Library list file is malformed; starting empty.");
      this.endpoints = [];
    }

    this.logger.info({ count: this.endpoints.length }, "library list loaded");
    return this.list();
  }

  /** Copy of the current list, in stored order. */
  list(): LibraryEndpoint[] {
    return this.endpoints.map((e) => ({ ...e }));
  }

  get size(): number {
    return this.endpoints.length;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get(index: number): LibraryEndpoint {
    this.assertIndex(index);
    return { ...this.endpoints[index] };
  }

  /** @throws {EndpointValidationError} | {PersistenceError} */
  add(endpoint: LibraryEndpoint): LibraryEndpoint {
    const valid = validateEndpoint(endpoint);
    this.endpoints.push(valid);
    this.logger.info({ name: valid.name }, "library added");
    this.save();
    return { ...valid };
  }

  /** @throws {EndpointValidationError} | {LibraryIndexError} | {PersistenceError} */
  update(index: number, endpoint: LibraryEndpoint): LibraryEndpoint {
    this.assertIndex(index);
    const valid = validateEndpoint(endpoint);
    this.endpoints[index] = valid;
    this.logger.info({ index, name: valid.name }, "library updated");
    this.save();
    return { ...valid };
  }

  /** @throws {LibraryIndexError} | {PersistenceError} */
  remove(index: number): LibraryEndpoint {
    this.assertIndex(index);
    const [removed] = this.endpoints.splice(index, 1);
    this.logger.info({ index, name: removed.name }, "library deleted");
    this.save();
    return removed;
  }

  /** Write the list if the last save failed. */
  flush(): void {
    if (this.dirty) this.save();
  }

  // ── Private helpers ───────────────────────────────────────────────────

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.endpoints.length) {
      throw new LibraryIndexError(index);
    }
  }

  private save(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(
        this.filePath,
        JSON.stringify(this.endpoints.map(toStored), null, 4),
        "utf-8",
      );
      this.dirty = false;
    } catch (err) {
      this.dirty = true;
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err: message }, "failed to save library list");
      throw new PersistenceError(this.filePath, `Failed to save library list: ${message}`, {
        cause: err,
      });
    }
  }
}
