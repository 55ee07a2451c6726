import { env, type Env } from "../env";
import { createScopedLogger, type Logger } from "../logger";
import { createAnalyticsCache } from "./cache";
import { createMemoryCacheBackend, type MemoryCacheBackend } from "./cache_backends/memory";
import { PostgresCacheBackend } from "./cache_backends/postgres";
import type { AnalyticsCacheBackend } from "./cache_backends/store";
import { AnalyticsPlanner } from "./planner";
import { computeDailySummaries } from "./rollup";
import { MemoryRawEventSource, MemorySummarySource } from "./sources/memory";
import { PostgresRawEventSource, PostgresSummarySource } from "./sources/postgres";
import type { DailySummary, PageViewRecord } from "./types";

export type AnalyticsBackendMode = "memory" | "postgres";

type RuntimeConfig = Pick<
  Env,
  "ANALYTICS_CACHE_BACKEND" | "ANALYTICS_DATABASE_URL" | "ANALYTICS_SOURCE_MODE"
>;

const runtimeLogger = createScopedLogger("analytics.runtime");
const loggedWarnings = new Set<string>();

let sharedMemoryBackend: MemoryCacheBackend | null = null;

const logSelectionWarning = (log: Logger, key: string, message: string): void => {
  if (loggedWarnings.has(key)) {
    return;
  }

  loggedWarnings.add(key);
  log.warn({ key }, message);
};

const resolveMode = (
  variable: "ANALYTICS_SOURCE_MODE" | "ANALYTICS_CACHE_BACKEND",
  config: RuntimeConfig,
  log: Logger
): AnalyticsBackendMode => {
  if (config[variable] !== "postgres") {
    return "memory";
  }

  if (config.ANALYTICS_DATABASE_URL) {
    return "postgres";
  }

  logSelectionWarning(
    log,
    `${variable}-missing-database-url`,
    `${variable}=postgres requested, but ANALYTICS_DATABASE_URL is missing. Falling back to memory.`
  );
  return "memory";
};

export const resolveAnalyticsSourceMode = (
  config: RuntimeConfig = env,
  log: Logger = runtimeLogger
): AnalyticsBackendMode => resolveMode("ANALYTICS_SOURCE_MODE", config, log);

export const resolveAnalyticsCacheMode = (
  config: RuntimeConfig = env,
  log: Logger = runtimeLogger
): AnalyticsBackendMode => resolveMode("ANALYTICS_CACHE_BACKEND", config, log);

/** One in-memory backend per process so every planner shares its entries. */
const getSharedMemoryBackend = (): MemoryCacheBackend => {
  if (!sharedMemoryBackend) {
    sharedMemoryBackend = createMemoryCacheBackend();
  }
  return sharedMemoryBackend;
};

export type CreateAnalyticsPlannerFromEnvOptions = {
  config?: RuntimeConfig;
  /** Page views served in memory mode. */
  records?: readonly PageViewRecord[];
  /** Summaries served in memory mode; rolled up from `records` when omitted. */
  summaries?: readonly DailySummary[];
  logger?: Logger;
};

export const createAnalyticsPlannerFromEnv = (
  options: CreateAnalyticsPlannerFromEnvOptions = {}
): AnalyticsPlanner => {
  const config = options.config ?? env;
  const log = options.logger ?? runtimeLogger;

  const sourceMode = resolveAnalyticsSourceMode(config, log);
  const cacheMode = resolveAnalyticsCacheMode(config, log);

  const records = options.records ?? [];
  const summaries = options.summaries ?? computeDailySummaries(records);

  const backend: AnalyticsCacheBackend =
    cacheMode === "postgres" ? new PostgresCacheBackend() : getSharedMemoryBackend();

  log.debug({ sourceMode, cacheMode }, "analytics planner configured");

  if (sourceMode === "postgres") {
    return new AnalyticsPlanner({
      rawSource: new PostgresRawEventSource(),
      summarySource: new PostgresSummarySource(),
      cache: createAnalyticsCache({ backend })
    });
  }

  return new AnalyticsPlanner({
    rawSource: new MemoryRawEventSource(records),
    summarySource: new MemorySummarySource(summaries),
    cache: createAnalyticsCache({ backend })
  });
};

export const __resetAnalyticsRuntimeForTests = (): void => {
  sharedMemoryBackend = null;
  loggedWarnings.clear();
};
