import { describe, it, expect } from "vitest";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 3000,
      logLevel: "info",
      libraryFile: "./libraries.json",
      http: {
        searchTimeoutMs: 15_000,
        scrapeTimeoutMs: 10_000,
        userAgent: "MarcScout/1.0 (+https://example.org/marc-scout)",
      },
    });
  });

  it("reads overrides and treats empty strings as unset", () => {
    const config = loadConfig({
      MARC_SCOUT_ENV: "production",
      MARC_SCOUT_PORT: "8080",
      MARC_SCOUT_LOG_LEVEL: "",
      MARC_SCOUT_LIBRARY_FILE: "/srv/libraries.json",
      MARC_SCOUT_SEARCH_TIMEOUT_MS: "2500",
      UNRELATED: "ignored",
    });

    expect(config.env).toBe("production");
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("info");
    expect(config.libraryFile).toBe("/srv/libraries.json");
    expect(config.http.searchTimeoutMs).toBe(2500);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ MARC_SCOUT_PORT: "not-a-port" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MARC_SCOUT_ENV: "qa" })).toThrow(/MARC_SCOUT_ENV/);
  });
});
