import { getAnalyticsDbPool, type AnalyticsDbClient } from "@/lib/analytics_db/pool";

import type { Predicate } from "../predicate";
import { DIMENSIONS, type BucketWidth, type Dimension, type DistinctField } from "../types";
import {
  SUMMARY_DIMENSIONS,
  assertDimension,
  resolveRawEventField,
  resolveSummaryField,
  type RawEventField,
  type SummaryField
} from "./fields";
import { compilePredicateToSql, type SqlColumn } from "./sql_predicate";
import type {
  GroupedCount,
  RawEventSource,
  SummaryGroup,
  SummarySource,
  TimeBucket,
  TimestampRange
} from "./types";

const RAW_EVENT_COLUMNS: Record<RawEventField, SqlColumn> = {
  timestamp: { sql: "bv.timestamp", type: "timestamp" },
  country_code: { sql: "c.code", type: "text" },
  author_username: { sql: "a.username", type: "text" },
  blog_id: { sql: "bv.blog_id", type: "integer" },
  blog_title: { sql: "b.title", type: "text" },
  viewer_id: { sql: "bv.viewer_id", type: "integer" },
  ip_address: { sql: "host(bv.ip_address)", type: "text" }
};

const SUMMARY_COLUMNS: Record<SummaryField, SqlColumn> = {
  date: { sql: "s.date", type: "date" },
  country_code: { sql: "c.code", type: "text" },
  author_username: { sql: "a.username", type: "text" }
};

const RAW_EVENT_FROM_SQL = `
  FROM blog_views bv
  JOIN blogs b ON b.id = bv.blog_id
  JOIN authors a ON a.id = b.author_id
  LEFT JOIN countries c ON c.id = bv.country_id
`;

const SUMMARY_FROM_SQL = `
  FROM daily_analytics_summary s
  LEFT JOIN countries c ON c.id = s.country_id
  LEFT JOIN authors a ON a.id = s.author_id
`;

const resolveRawEventColumn = (field: string): SqlColumn | null => {
  const resolved = resolveRawEventField(field);
  return resolved ? RAW_EVENT_COLUMNS[resolved] : null;
};

const resolveSummaryColumn = (field: string): SqlColumn | null => {
  const resolved = resolveSummaryField(field);
  return resolved ? SUMMARY_COLUMNS[resolved] : null;
};

const toNumber = (value: unknown): number => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }

  if (typeof value === "bigint") {
    return Number(value);
  }

  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  return 0;
};

const toNullableString = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  return typeof value === "string" ? value : String(value);
};

const toDate = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  if (typeof value === "string") {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  return null;
};

/** Raw page views joined with blog, author and country. */
export class PostgresRawEventSource implements RawEventSource {
  constructor(private readonly client: AnalyticsDbClient = getAnalyticsDbPool()) {}

  private async queryRows(text: string, values: unknown[]): Promise<Array<Record<string, unknown>>> {
    const result = await this.client.query(text, values);
    return result.rows;
  }

  async count(predicate: Predicate): Promise<number> {
    const where = compilePredicateToSql(predicate, resolveRawEventColumn);
    const rows = await this.queryRows(
      `
        SELECT COUNT(*) AS total
        ${RAW_EVENT_FROM_SQL}
        WHERE ${where.sql}
      `,
      where.params
    );

    return toNumber(rows[0]?.total);
  }

  async countDistinct(predicate: Predicate, field: DistinctField): Promise<number> {
    const where = compilePredicateToSql(predicate, resolveRawEventColumn);
    const rows = await this.queryRows(
      `
        SELECT COUNT(DISTINCT ${RAW_EVENT_COLUMNS[field].sql}) AS total
        ${RAW_EVENT_FROM_SQL}
        WHERE ${where.sql}
      `,
      where.params
    );

    return toNumber(rows[0]?.total);
  }

  async groupBy(
    predicate: Predicate,
    dimension: Dimension,
    distinctField: DistinctField
  ): Promise<GroupedCount[]> {
    const column = RAW_EVENT_COLUMNS[assertDimension(dimension, DIMENSIONS, "the PostgreSQL event source")];
    const where = compilePredicateToSql(predicate, resolveRawEventColumn);
    const rows = await this.queryRows(
      `
        SELECT
          ${column.sql} AS group_key,
          COUNT(*) AS total,
          COUNT(DISTINCT ${RAW_EVENT_COLUMNS[distinctField].sql}) AS distinct_total
        ${RAW_EVENT_FROM_SQL}
        WHERE ${where.sql}
        GROUP BY ${column.sql}
      `,
      where.params
    );

    return rows.map((row) => ({
      key: toNullableString(row.group_key),
      count: toNumber(row.total),
      distinctCount: toNumber(row.distinct_total)
    }));
  }

  async timeBucketed(predicate: Predicate, bucketWidth: BucketWidth): Promise<TimeBucket[]> {
    const where = compilePredicateToSql(predicate, resolveRawEventColumn, 2);
    const rows = await this.queryRows(
      `
        SELECT
          date_trunc($1, bv.timestamp, 'UTC') AS bucket_start,
          COUNT(*) AS total,
          COUNT(DISTINCT bv.blog_id) AS distinct_blogs
        ${RAW_EVENT_FROM_SQL}
        WHERE ${where.sql}
        GROUP BY bucket_start
        ORDER BY bucket_start ASC
      `,
      [bucketWidth, ...where.params]
    );

    const buckets: TimeBucket[] = [];
    for (const row of rows) {
      const bucketStart = toDate(row.bucket_start);
      if (!bucketStart) {
        continue;
      }

      buckets.push({
        bucketStart,
        count: toNumber(row.total),
        distinctBlogCount: toNumber(row.distinct_blogs)
      });
    }

    return buckets;
  }

  async minMaxTimestamp(predicate: Predicate): Promise<TimestampRange | null> {
    const where = compilePredicateToSql(predicate, resolveRawEventColumn);
    const rows = await this.queryRows(
      `
        SELECT
          MIN(bv.timestamp) AS min_timestamp,
          MAX(bv.timestamp) AS max_timestamp
        ${RAW_EVENT_FROM_SQL}
        WHERE ${where.sql}
      `,
      where.params
    );

    const min = toDate(rows[0]?.min_timestamp);
    const max = toDate(rows[0]?.max_timestamp);
    if (!min || !max) {
      return null;
    }

    return { min, max };
  }
}

/** Daily rollup rows keyed by date, country and author. */
export class PostgresSummarySource implements SummarySource {
  constructor(private readonly client: AnalyticsDbClient = getAnalyticsDbPool()) {}

  async groupBySummary(predicate: Predicate, dimension: Dimension): Promise<SummaryGroup[]> {
    const column =
      SUMMARY_COLUMNS[assertDimension(dimension, SUMMARY_DIMENSIONS, "the PostgreSQL summary source")];
    const where = compilePredicateToSql(predicate, resolveSummaryColumn);
    const { rows } = await this.client.query(
      `
        SELECT
          ${column.sql} AS group_key,
          COALESCE(SUM(s.unique_blog_count), 0) AS unique_blogs,
          COALESCE(SUM(s.total_views), 0) AS total_views
        ${SUMMARY_FROM_SQL}
        WHERE ${where.sql}
        GROUP BY ${column.sql}
      `,
      where.params
    );

    return rows.map((row) => ({
      key: toNullableString(row.group_key),
      sumUniqueBlogs: toNumber(row.unique_blogs),
      sumTotalViews: toNumber(row.total_views)
    }));
  }
}
