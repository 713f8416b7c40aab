// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";

import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

const DEFAULT_USER_AGENT = "MarcScout/1.0 (+https://example.org/marc-scout)";

const EnvSchema = z.object({
  MARC_SCOUT_ENV: z.enum(["development", "staging", "production"]).default("development"),
  MARC_SCOUT_PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  MARC_SCOUT_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  MARC_SCOUT_LIBRARY_FILE: z.string().min(1).default("./libraries.json"),
  MARC_SCOUT_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  MARC_SCOUT_SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MARC_SCOUT_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the service starts with zero configuration
 * for local development. Empty strings count as unset.
 *
 * @throws {ConfigurationError} listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("MARC_SCOUT_") && value !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const vars = parsed.data;

  return {
    env: vars.MARC_SCOUT_ENV,
    port: vars.MARC_SCOUT_PORT,
    logLevel: vars.MARC_SCOUT_LOG_LEVEL,
    libraryFile: vars.MARC_SCOUT_LIBRARY_FILE,

    http: {
      searchTimeoutMs: vars.MARC_SCOUT_SEARCH_TIMEOUT_MS, // per endpoint
      scrapeTimeoutMs: vars.MARC_SCOUT_SCRAPE_TIMEOUT_MS,
      userAgent: vars.MARC_SCOUT_USER_AGENT,
    },
  };
}
