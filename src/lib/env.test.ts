import { afterEach, describe, expect, it } from "vitest";

import { env, parseEnv, validateEnv } from "./env";

const TRACKED_ENV = ["ANALYTICS_CACHE_BACKEND", "ANALYTICS_FILTER_MAX_DEPTH"] as const;

const ORIGINAL_ENV = Object.fromEntries(
  TRACKED_ENV.map((key) => [key, process.env[key]])
) as Record<(typeof TRACKED_ENV)[number], string | undefined>;

const setEnv = (key: string, value: string | undefined): void => {
  if (value === undefined) {
    delete process.env[key];
    return;
  }

  process.env[key] = value;
};

describe("parseEnv", () => {
  it("applies defaults for an empty environment", () => {
    expect(parseEnv({})).toEqual({
      ANALYTICS_CACHE_BACKEND: "memory",
      ANALYTICS_DATABASE_URL: undefined,
      ANALYTICS_FILTER_MAX_DEPTH: 32,
      ANALYTICS_SOURCE_MODE: "memory",
      LOG_LEVEL: undefined
    });
  });

  it("normalizes enum casing and trims strings", () => {
    const parsed = parseEnv({
      ANALYTICS_CACHE_BACKEND: " Postgres ",
      ANALYTICS_DATABASE_URL: "  postgres://localhost:5432/analytics  ",
      ANALYTICS_FILTER_MAX_DEPTH: "8"
    });

    expect(parsed.ANALYTICS_CACHE_BACKEND).toBe("postgres");
    expect(parsed.ANALYTICS_DATABASE_URL).toBe("postgres://localhost:5432/analytics");
    expect(parsed.ANALYTICS_FILTER_MAX_DEPTH).toBe(8);
  });

  it("rejects unknown modes with a readable message", () => {
    expect(() => parseEnv({ ANALYTICS_SOURCE_MODE: "bigquery" })).toThrowError(
      "[env] Invalid environment configuration: ANALYTICS_SOURCE_MODE:"
    );
  });

  it("rejects a non-positive filter depth", () => {
    expect(() => parseEnv({ ANALYTICS_FILTER_MAX_DEPTH: "0" })).toThrowError(
      "[env] Invalid environment configuration: ANALYTICS_FILTER_MAX_DEPTH:"
    );
  });
});

describe("validateEnv cache invalidation", () => {
  afterEach(() => {
    for (const [key, value] of Object.entries(ORIGINAL_ENV)) {
      setEnv(key, value);
    }
  });

  it("re-validates when a tracked variable changes", () => {
    setEnv("ANALYTICS_CACHE_BACKEND", "memory");
    expect(validateEnv().ANALYTICS_CACHE_BACKEND).toBe("memory");

    setEnv("ANALYTICS_CACHE_BACKEND", "postgres");
    expect(env.ANALYTICS_CACHE_BACKEND).toBe("postgres");
  });
});
