// ---------------------------------------------------------------------------
// Writing .mrc files.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import { PersistenceError } from "../core/errors.js";
import { MARC_EXTENSION } from "./filename.js";
import type { MarcRecord } from "./record.js";

/** `<base>.mrc` unless the name already ends in `.mrc`. */
export function withMarcExtension(name: string): string {
  return name.toLowerCase().endsWith(MARC_EXTENSION) ? name : `${name}${MARC_EXTENSION}`;
}

/**
 * Write the record as ISO 2709 to `target`, creating parent directories.
 * Returns the absolute path written.
 *
 * @throws {PersistenceError} when the file cannot be written.
 */
export async function writeMarcFile(record: MarcRecord, target: string): Promise<string> {
  const absolute = path.resolve(withMarcExtension(target));
  try {
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, record.toIso2709());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PersistenceError(absolute, `Failed to write MARC file: ${message}`, {
      cause: err,
    });
  }
  return absolute;
}
