// ---------------------------------------------------------------------------
// Commit-time checks on a record before it is saved.
// ---------------------------------------------------------------------------

import { RecordValidationError } from "../core/errors.js";
import type { MarcRecord } from "./record.js";

const REQUIRED_TAGS = ["001", "245"] as const;

/**
 * List every problem that blocks saving. An empty array means the record
 * can be written.
 *
 * - 001 and 245 must be present
 * - 001 must not repeat
 * - the first 245 must carry $a
 */
export function findRecordProblems(record: MarcRecord): string[] {
  const problems: string[] = [];

  for (const tag of REQUIRED_TAGS) {
    if (record.getFields(tag).length === 0) {
      problems.push(`Required field ${tag} is missing.`);
    }
  }

  if (record.getFields("001").length > 1) {
    problems.push("Multiple 001 fields found.");
  }

  const [firstTitle] = record.getDataFields("245");
  if (firstTitle && !firstTitle.subfields.some((s) => s.code === "a")) {
    problems.push("Field 245 is missing subfield 'a' for the main title.");
  }

  return problems;
}

/** @throws {RecordValidationError} listing every problem found. */
export function assertRecordValid(record: MarcRecord): void {
  const problems = findRecordProblems(record);
  if (problems.length > 0) {
    throw new RecordValidationError(problems);
  }
}
