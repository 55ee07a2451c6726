import { describe, expect, it, vi } from "vitest";

import type { Logger } from "../logger";
import { ANALYTICS_CACHE_TTL_SECONDS, createAnalyticsCache } from "./cache";
import { createMemoryCacheBackend } from "./cache_backends/memory";
import type { AnalyticsCacheBackend } from "./cache_backends/store";
import { buildAnalyticsCacheKey } from "./cache_key";
import type { AnalyticsPoint } from "./types";

const POINTS: AnalyticsPoint[] = [{ x: "US", y: 1, z: 2 }];

const createTestLogger = () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies Logger;
  return logger;
};

describe("createAnalyticsCache", () => {
  it("computes once and serves the stored value afterwards", async () => {
    const cache = createAnalyticsCache({
      backend: createMemoryCacheBackend(),
      logger: createTestLogger()
    });
    const compute = vi.fn(async () => POINTS);

    const first = await cache.getOrCompute("grouped", { object_type: "country" }, compute);
    const second = await cache.getOrCompute("grouped", { object_type: "country" }, compute);

    expect(first).toEqual(POINTS);
    expect(second).toEqual(POINTS);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("writes serialized points with the fixed ttl", async () => {
    const set = vi.fn(async (_key: string, _value: string, _ttlSeconds: number) => undefined);
    const cache = createAnalyticsCache({
      backend: { get: async () => null, set },
      logger: createTestLogger()
    });

    await cache.getOrCompute("top", { top_type: "blog" }, async () => POINTS);

    expect(set).toHaveBeenCalledWith(
      buildAnalyticsCacheKey("top", { top_type: "blog" }),
      '[{"x":"US","y":1,"z":2}]',
      ANALYTICS_CACHE_TTL_SECONDS
    );
    expect(ANALYTICS_CACHE_TTL_SECONDS).toBe(900);
  });

  it("treats backend read failures as misses", async () => {
    const logger = createTestLogger();
    const backend: AnalyticsCacheBackend = {
      get: async () => {
        throw new Error("connection refused");
      },
      set: async () => {
        throw new Error("connection refused");
      }
    };
    const cache = createAnalyticsCache({ backend, logger });

    await expect(cache.getOrCompute("grouped", {}, async () => POINTS)).resolves.toEqual(POINTS);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn.mock.calls.map((call) => call[1])).toEqual([
      "cache read failed",
      "cache write failed"
    ]);
  });

  it("recomputes when the stored value is malformed", async () => {
    const backend = createMemoryCacheBackend();
    const key = buildAnalyticsCacheKey("performance", {});
    await backend.set(key, '{"not":"points"}', 60);
    const cache = createAnalyticsCache({ backend, logger: createTestLogger() });

    const result = await cache.getOrCompute("performance", {}, async () => POINTS);

    expect(result).toEqual(POINTS);
    expect(await backend.get(key)).toBe('[{"x":"US","y":1,"z":2}]');
  });

  it("propagates compute failures", async () => {
    const cache = createAnalyticsCache({
      backend: createMemoryCacheBackend(),
      logger: createTestLogger()
    });

    await expect(
      cache.getOrCompute("grouped", {}, async () => {
        throw new Error("source unavailable");
      })
    ).rejects.toThrow("source unavailable");
  });
});
