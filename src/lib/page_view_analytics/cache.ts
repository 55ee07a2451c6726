import { z } from "zod";

import { createScopedLogger, type Logger } from "../logger";
import type { AnalyticsCacheBackend } from "./cache_backends/store";
import { buildAnalyticsCacheKey } from "./cache_key";
import type { AnalyticsPoint } from "./types";

export const ANALYTICS_CACHE_TTL_SECONDS = 900;

const cachedPointsSchema = z.array(
  z.object({
    x: z.string(),
    y: z.number(),
    z: z.number()
  })
);

type CreateAnalyticsCacheOptions = {
  backend: AnalyticsCacheBackend;
  ttlSeconds?: number;
  logger?: Logger;
};

export type AnalyticsCache = {
  getOrCompute(
    operation: string,
    params: unknown,
    compute: () => Promise<AnalyticsPoint[]>
  ): Promise<AnalyticsPoint[]>;
};

const decodePoints = (raw: string): AnalyticsPoint[] | null => {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = cachedPointsSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
};

/**
 * Read-through cache over a backend. Backend failures degrade to a miss or a
 * skipped write; failures of `compute` reach the caller unchanged.
 */
export const createAnalyticsCache = (options: CreateAnalyticsCacheOptions): AnalyticsCache => {
  const ttlSeconds = options.ttlSeconds ?? ANALYTICS_CACHE_TTL_SECONDS;
  const log = options.logger ?? createScopedLogger("analytics.cache");
  const { backend } = options;

  const read = async (operation: string, key: string): Promise<AnalyticsPoint[] | null> => {
    let raw: string | null;
    try {
      raw = await backend.get(key);
    } catch (error) {
      log.warn({ operation, key, error }, "cache read failed");
      return null;
    }

    if (raw === null) {
      return null;
    }

    const points = decodePoints(raw);
    if (!points) {
      log.warn({ operation, key }, "discarding malformed cache entry");
    }
    return points;
  };

  const write = async (operation: string, key: string, points: AnalyticsPoint[]): Promise<void> => {
    try {
      await backend.set(key, JSON.stringify(points), ttlSeconds);
    } catch (error) {
      log.warn({ operation, key, error }, "cache write failed");
    }
  };

  return {
    async getOrCompute(operation, params, compute) {
      const key = buildAnalyticsCacheKey(operation, params);

      const cached = await read(operation, key);
      if (cached) {
        log.debug({ operation, key }, "cache hit");
        return cached;
      }

      log.debug({ operation, key }, "cache miss");
      const points = await compute();
      await write(operation, key, points);
      return points;
    }
  };
};
