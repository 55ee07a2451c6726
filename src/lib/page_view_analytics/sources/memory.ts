import { truncateUtc } from "../../utils/dates";
import { compilePredicate, type Predicate } from "../predicate";
import {
  DIMENSIONS,
  type BucketWidth,
  type DailySummary,
  type Dimension,
  type DistinctField,
  type PageViewRecord
} from "../types";
import { coercePredicateValues } from "./field_values";
import {
  SUMMARY_DIMENSIONS,
  assertDimension,
  readPageViewField,
  readSummaryField,
  resolveRawEventFieldType,
  resolveSummaryFieldType
} from "./fields";
import type {
  GroupedCount,
  RawEventSource,
  SummaryGroup,
  SummarySource,
  TimeBucket,
  TimestampRange
} from "./types";

const toGroupKey = (value: string | number | boolean | null | undefined): string | null => {
  return value === null || value === undefined ? null : String(value);
};

type GroupAccumulator = {
  key: string | null;
  count: number;
  distinct: Set<string>;
};

/** Evaluates predicates over an in-process array of joined page views. */
export class MemoryRawEventSource implements RawEventSource {
  constructor(private readonly records: readonly PageViewRecord[]) {}

  private select(predicate: Predicate): PageViewRecord[] {
    const matches = compilePredicate(
      coercePredicateValues(predicate, resolveRawEventFieldType),
      readPageViewField
    );
    return this.records.filter(matches);
  }

  async count(predicate: Predicate): Promise<number> {
    return this.select(predicate).length;
  }

  async countDistinct(predicate: Predicate, field: DistinctField): Promise<number> {
    const values = new Set<string>();
    for (const record of this.select(predicate)) {
      const key = toGroupKey(readPageViewField(record, field));
      if (key !== null) {
        values.add(key);
      }
    }
    return values.size;
  }

  async groupBy(
    predicate: Predicate,
    dimension: Dimension,
    distinctField: DistinctField
  ): Promise<GroupedCount[]> {
    const column = assertDimension(dimension, DIMENSIONS, "the in-memory event source");
    const groups = new Map<string | null, GroupAccumulator>();

    for (const record of this.select(predicate)) {
      const key = toGroupKey(readPageViewField(record, column));
      let group = groups.get(key);
      if (!group) {
        group = { key, count: 0, distinct: new Set() };
        groups.set(key, group);
      }

      group.count += 1;
      const distinctValue = toGroupKey(readPageViewField(record, distinctField));
      if (distinctValue !== null) {
        group.distinct.add(distinctValue);
      }
    }

    return Array.from(groups.values(), (group) => ({
      key: group.key,
      count: group.count,
      distinctCount: group.distinct.size
    }));
  }

  async timeBucketed(predicate: Predicate, bucketWidth: BucketWidth): Promise<TimeBucket[]> {
    const buckets = new Map<number, { count: number; blogs: Set<number> }>();

    for (const record of this.select(predicate)) {
      const bucketStartMs = truncateUtc(record.timestamp, bucketWidth).getTime();
      let bucket = buckets.get(bucketStartMs);
      if (!bucket) {
        bucket = { count: 0, blogs: new Set() };
        buckets.set(bucketStartMs, bucket);
      }

      bucket.count += 1;
      bucket.blogs.add(record.blog_id);
    }

    return Array.from(buckets.entries())
      .sort(([left], [right]) => left - right)
      .map(([bucketStartMs, bucket]) => ({
        bucketStart: new Date(bucketStartMs),
        count: bucket.count,
        distinctBlogCount: bucket.blogs.size
      }));
  }

  async minMaxTimestamp(predicate: Predicate): Promise<TimestampRange | null> {
    let min: number | null = null;
    let max: number | null = null;

    for (const record of this.select(predicate)) {
      const value = record.timestamp.getTime();
      min = min === null ? value : Math.min(min, value);
      max = max === null ? value : Math.max(max, value);
    }

    if (min === null || max === null) {
      return null;
    }

    return { min: new Date(min), max: new Date(max) };
  }
}

export class MemorySummarySource implements SummarySource {
  constructor(private readonly summaries: readonly DailySummary[]) {}

  async groupBySummary(predicate: Predicate, dimension: Dimension): Promise<SummaryGroup[]> {
    const column = assertDimension(dimension, SUMMARY_DIMENSIONS, "the in-memory summary source");
    const matches = compilePredicate(
      coercePredicateValues(predicate, resolveSummaryFieldType),
      readSummaryField
    );
    const groups = new Map<string | null, SummaryGroup>();

    for (const summary of this.summaries) {
      if (!matches(summary)) {
        continue;
      }

      const key = toGroupKey(readSummaryField(summary, column));
      const group = groups.get(key) ?? { key, sumUniqueBlogs: 0, sumTotalViews: 0 };
      group.sumUniqueBlogs += summary.unique_blog_count;
      group.sumTotalViews += summary.total_views;
      groups.set(key, group);
    }

    return Array.from(groups.values());
  }
}
