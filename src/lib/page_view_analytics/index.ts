export * from "./errors";
export * from "./types";
export {
  FILTER_OPERATORS,
  compilePredicate,
  evaluatePredicate,
  type FieldReader,
  type FilterOperator,
  type FilterScalar,
  type Predicate
} from "./predicate";
export {
  buildExpressionPredicate,
  canonicalizeFilterExpression,
  parseFilterExpression,
  type FilterExpression,
  type FilterGroup,
  type FilterLeaf
} from "./filter_expression";
export { normalizeFlatFilter, normalizeSummaryFilter, parseFlatFilter } from "./flat_filter";
export { buildAnalyticsCacheKey } from "./cache_key";
export { ANALYTICS_CACHE_TTL_SECONDS, createAnalyticsCache, type AnalyticsCache } from "./cache";
export type { AnalyticsCacheBackend } from "./cache_backends/store";
export { createMemoryCacheBackend } from "./cache_backends/memory";
export { PostgresCacheBackend } from "./cache_backends/postgres";
export type { RawEventSource, SummarySource } from "./sources/types";
export { MemoryRawEventSource, MemorySummarySource } from "./sources/memory";
export { PostgresRawEventSource, PostgresSummarySource } from "./sources/postgres";
export {
  AnalyticsPlanner,
  TOP_RESULTS_LIMIT,
  computeGrowth,
  parseObjectType,
  parseTopType,
  selectBucketWidth
} from "./planner";
export { computeDailySummaries, rebuildDailySummaries, resolveRollupStartDate } from "./rollup";
export { createAnalyticsPlannerFromEnv } from "./runtime";
