#!/usr/bin/env node
// ---------------------------------------------------------------------------
// scrape-marc -- Scrape one catalog page and save it as a .mrc file.
//
// Usage:
//   npm run scrape -- --url <catalog record URL> [options]
//
// Options:
//   --url <url>     Catalog record page or source-record link (required)
//   --out <path>    Output file (default: <Author>_<Title>.mrc in the cwd)
//   --force         Write the file even when the record fails validation
//   --dry-run       Print the fields without writing anything
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";

import { createRuntime } from "../app.js";
import { MarcScoutError } from "../core/errors.js";
import { writeMarcFile } from "../marc/marc-file.js";
import { MarcRecord } from "../marc/record.js";
import { findRecordProblems } from "../marc/record-validation.js";
import type { SourceFetcher } from "../scrape/source-fetcher.js";

// ── CLI argument parsing ─────────────────────────────────────────────────

export interface CliOptions {
  url: string;
  out: string | null;
  force: boolean;
  dryRun: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      url: { type: "string" },
      out: { type: "string" },
      force: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
    },
    strict: true,
  });

  return {
    url: values.url ?? "",
    out: values.out ?? null,
    force: values.force ?? false,
    dryRun: values["dry-run"] ?? false,
  };
}

// ── Command ──────────────────────────────────────────────────────────────

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

/**
 * Scrape, print the display lines, and write the record. Returns the exit
 * code.
 */
export async function runScrapeMarc(
  options: CliOptions,
  sourceFetcher: SourceFetcher,
  io: CliIo,
): Promise<number> {
  const document = await sourceFetcher.scrape(options.url);
  const record = MarcRecord.fromFields(document.fields);

  for (const line of record.toDisplayLines()) io.stdout(line);
  io.stdout(`Parsed ${record.size} fields.`);

  const problems = findRecordProblems(record);
  for (const problem of problems) io.stderr(`Validation Error: ${problem}`);
  if (problems.length > 0 && !options.force) {
    io.stderr("MARC record failed validation. Re-run with --force to save it anyway.");
    return 2;
  }

  if (options.dryRun) return 0;

  const written = await writeMarcFile(record, options.out ?? document.filename);
  io.stdout(`MARC Record saved successfully.`);
  io.stdout(`Filename: ${written}`);
  return 0;
}

// ── Main ─────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const { sourceFetcher, logger } = createRuntime();
  const io: CliIo = {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  };

  try {
    process.exitCode = await runScrapeMarc(options, sourceFetcher, io);
  } catch (err) {
    if (!(err instanceof MarcScoutError)) throw err;
    logger.error({ err }, "scrape failed");
    io.stderr(`Error: ${err.message}`);
    process.exitCode = 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
