import { formatDateYYYYMMDD, wholeDaysBetween } from "../utils/dates";
import type { AnalyticsCache } from "./cache";
import { AnalyticsValidationError } from "./errors";
import {
  buildExpressionPredicate,
  canonicalizeFilterExpression,
  type FilterExpression
} from "./filter_expression";
import { normalizeFlatFilter, normalizeSummaryFilter } from "./flat_filter";
import { and, type Predicate } from "./predicate";
import {
  RAW_EVENT_ALLOWED_FIELDS,
  SUMMARY_ALLOWED_FIELDS,
  resolveRawEventField,
  resolveSummaryField
} from "./sources/fields";
import type { RawEventSource, SummarySource } from "./sources/types";
import {
  OBJECT_TYPES,
  TOP_TYPES,
  UNKNOWN_GROUP_LABEL,
  type AnalyticsPoint,
  type BucketWidth,
  type Dimension,
  type DistinctField,
  type FlatFilter,
  type ObjectType,
  type TopType
} from "./types";

export const TOP_RESULTS_LIMIT = 10;

const MONTHLY_BUCKET_MIN_SPAN_DAYS = 365;
const WEEKLY_BUCKET_MIN_SPAN_DAYS = 30;

export type AnalyticsOperation = "grouped" | "top" | "performance" | "fast_grouped";

const OBJECT_TYPE_DIMENSIONS: Record<ObjectType, Dimension> = {
  country: "country_code",
  user: "author_username"
};

const TOP_TYPE_PLANS: Record<TopType, { dimension: Dimension; distinctField: DistinctField }> = {
  blog: { dimension: "blog_title", distinctField: "country_code" },
  user: { dimension: "author_username", distinctField: "blog_id" },
  country: { dimension: "country_code", distinctField: "blog_id" }
};

const parseLiteral = <T extends string>(
  value: unknown,
  allowed: readonly T[],
  field: string
): T => {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    throw new AnalyticsValidationError([
      { field, message: `must be one of ${allowed.join(", ")}` }
    ]);
  }
  return match;
};

export const parseObjectType = (value: unknown): ObjectType =>
  parseLiteral(value, OBJECT_TYPES, "object_type");

export const parseTopType = (value: unknown): TopType => parseLiteral(value, TOP_TYPES, "top");

/** Span strictly above 365 days buckets by month, above 30 by week, otherwise by day. */
export const selectBucketWidth = (spanDays: number): BucketWidth => {
  if (spanDays > MONTHLY_BUCKET_MIN_SPAN_DAYS) {
    return "month";
  }
  if (spanDays > WEEKLY_BUCKET_MIN_SPAN_DAYS) {
    return "week";
  }
  return "day";
};

/**
 * Percent change against the previous bucket, rounded to two decimals with
 * halves away from zero; 0 for the first bucket or a zero baseline. Counts are
 * integers, so the rounding is done on exact integer hundredths of a percent.
 */
export const computeGrowth = (views: readonly number[]): number[] => {
  return views.map((current, index) => {
    if (index === 0) {
      return 0;
    }

    const previous = views[index - 1];
    if (previous === 0) {
      return 0;
    }

    const difference = current - previous;
    const scaled = Math.abs(difference) * 10_000;
    const hundredths = Math.floor((2 * scaled + Math.abs(previous)) / (2 * Math.abs(previous)));
    if (hundredths === 0) {
      return 0;
    }

    return (Math.sign(difference) * Math.sign(previous) * hundredths) / 100;
  });
};

const toLabel = (key: string | null): string => key ?? UNKNOWN_GROUP_LABEL;

const byZThenKey = (left: AnalyticsPoint, right: AnalyticsPoint): number =>
  right.z - left.z || left.x.localeCompare(right.x);

const byYThenKey = (left: AnalyticsPoint, right: AnalyticsPoint): number =>
  right.y - left.y || left.x.localeCompare(right.x);

export type AnalyticsPlannerOptions = {
  rawSource: RawEventSource;
  summarySource: SummarySource;
  cache?: AnalyticsCache | null;
};

/**
 * The four analytics query shapes. Each combines the flat filter with an
 * optional expression, then reads through the cache when one is configured.
 */
export class AnalyticsPlanner {
  private readonly rawSource: RawEventSource;
  private readonly summarySource: SummarySource;
  private readonly cache: AnalyticsCache | null;

  constructor(options: AnalyticsPlannerOptions) {
    this.rawSource = options.rawSource;
    this.summarySource = options.summarySource;
    this.cache = options.cache ?? null;
  }

  private rawPredicate(filter: FlatFilter, expression: FilterExpression | null): Predicate {
    const flat = normalizeFlatFilter(filter);
    if (!expression) {
      return flat;
    }
    return and(
      flat,
      buildExpressionPredicate(expression, RAW_EVENT_ALLOWED_FIELDS, resolveRawEventField)
    );
  }

  private summaryPredicate(filter: FlatFilter, expression: FilterExpression | null): Predicate {
    const flat = normalizeSummaryFilter(filter);
    if (!expression) {
      return flat;
    }
    return and(
      flat,
      buildExpressionPredicate(expression, SUMMARY_ALLOWED_FIELDS, resolveSummaryField)
    );
  }

  private async run(
    operation: AnalyticsOperation,
    params: Record<string, unknown>,
    expression: FilterExpression | null,
    compute: () => Promise<AnalyticsPoint[]>
  ): Promise<AnalyticsPoint[]> {
    if (!this.cache) {
      return compute();
    }

    const keyParams = {
      ...params,
      expression: expression ? canonicalizeFilterExpression(expression) : null
    };
    return this.cache.getOrCompute(operation, keyParams, compute);
  }

  async groupedAnalytics(
    objectType: ObjectType,
    filter: FlatFilter,
    expression: FilterExpression | null = null
  ): Promise<AnalyticsPoint[]> {
    const predicate = this.rawPredicate(filter, expression);

    return this.run("grouped", { object_type: objectType, filter }, expression, async () => {
      const groups = await this.rawSource.groupBy(
        predicate,
        OBJECT_TYPE_DIMENSIONS[objectType],
        "blog_id"
      );

      return groups
        .map((group) => ({ x: toLabel(group.key), y: group.distinctCount, z: group.count }))
        .sort(byZThenKey);
    });
  }

  async topAnalytics(
    topType: TopType,
    filter: FlatFilter,
    expression: FilterExpression | null = null
  ): Promise<AnalyticsPoint[]> {
    const predicate = this.rawPredicate(filter, expression);
    const plan = TOP_TYPE_PLANS[topType];

    return this.run("top", { top: topType, filter }, expression, async () => {
      const groups = await this.rawSource.groupBy(predicate, plan.dimension, plan.distinctField);

      return groups
        .map((group) => ({ x: toLabel(group.key), y: group.count, z: group.distinctCount }))
        .sort(byYThenKey)
        .slice(0, TOP_RESULTS_LIMIT);
    });
  }

  async performanceAnalytics(
    filter: FlatFilter,
    expression: FilterExpression | null = null
  ): Promise<AnalyticsPoint[]> {
    const predicate = this.rawPredicate(filter, expression);

    return this.run("performance", { filter }, expression, async () => {
      const range = await this.rawSource.minMaxTimestamp(predicate);
      if (!range) {
        return [];
      }

      const bucketWidth = selectBucketWidth(wholeDaysBetween(range.min, range.max));
      const buckets = await this.rawSource.timeBucketed(predicate, bucketWidth);
      const growth = computeGrowth(buckets.map((bucket) => bucket.count));

      return buckets.map((bucket, index) => ({
        x: `${formatDateYYYYMMDD(bucket.bucketStart)} (${bucket.distinctBlogCount} blogs)`,
        y: bucket.count,
        z: growth[index] ?? 0
      }));
    });
  }

  async fastGroupedAnalytics(
    objectType: ObjectType,
    filter: FlatFilter,
    expression: FilterExpression | null = null
  ): Promise<AnalyticsPoint[]> {
    const predicate = this.summaryPredicate(filter, expression);

    return this.run("fast_grouped", { object_type: objectType, filter }, expression, async () => {
      const groups = await this.summarySource.groupBySummary(
        predicate,
        OBJECT_TYPE_DIMENSIONS[objectType]
      );

      return groups
        .map((group) => ({
          x: toLabel(group.key),
          y: group.sumUniqueBlogs,
          z: group.sumTotalViews
        }))
        .sort(byZThenKey);
    });
  }
}
