import type { Predicate } from "../predicate";
import type { BucketWidth, Dimension, DistinctField } from "../types";

/** One group of raw events; `key` is null when the grouped column is empty. */
export type GroupedCount = {
  key: string | null;
  count: number;
  distinctCount: number;
};

export type TimeBucket = {
  bucketStart: Date;
  count: number;
  distinctBlogCount: number;
};

export type TimestampRange = {
  min: Date;
  max: Date;
};

export type SummaryGroup = {
  key: string | null;
  sumUniqueBlogs: number;
  sumTotalViews: number;
};

export interface RawEventSource {
  count(predicate: Predicate): Promise<number>;
  countDistinct(predicate: Predicate, field: DistinctField): Promise<number>;
  groupBy(predicate: Predicate, dimension: Dimension, distinctField: DistinctField): Promise<GroupedCount[]>;
  /** Only buckets holding at least one event, oldest first. */
  timeBucketed(predicate: Predicate, bucketWidth: BucketWidth): Promise<TimeBucket[]>;
  minMaxTimestamp(predicate: Predicate): Promise<TimestampRange | null>;
}

export interface SummarySource {
  groupBySummary(predicate: Predicate, dimension: Dimension): Promise<SummaryGroup[]>;
}
