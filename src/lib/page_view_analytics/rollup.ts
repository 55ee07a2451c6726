import { getAnalyticsDbPool, type AnalyticsDbClient } from "@/lib/analytics_db/pool";

import { createScopedLogger, type Logger } from "../logger";
import { addUtcDays, formatDateYYYYMMDD, parseDateYYYYMMDD, toUtcDateOnly } from "../utils/dates";
import { AnalyticsValidationError } from "./errors";
import type { DailySummary, PageViewRecord } from "./types";

export type AnalyticsDbTransactionalPool = {
  connect(): Promise<AnalyticsDbClient & { release(): void }>;
};

export type RebuildDailySummariesOptions = {
  /** First UTC date to rebuild; null rebuilds from the earliest page view. */
  fromDate: string | null;
  logger?: Logger;
};

export type RebuildDailySummariesResult = {
  fromDate: string | null;
  deleted: number;
  inserted: number;
};

const groupKey = (date: string, countryCode: string | null, author: string | null): string =>
  JSON.stringify([date, countryCode, author]);

const compareNullable = (left: string | null, right: string | null): number => {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  return left.localeCompare(right);
};

/** Daily rows per (UTC date, country, author), ordered by those keys. */
export const computeDailySummaries = (records: readonly PageViewRecord[]): DailySummary[] => {
  const groups = new Map<string, { summary: DailySummary; blogs: Set<number> }>();

  for (const record of records) {
    const date = formatDateYYYYMMDD(record.timestamp);
    const key = groupKey(date, record.country_code, record.author_username);
    let group = groups.get(key);
    if (!group) {
      group = {
        summary: {
          date,
          country_code: record.country_code,
          author_username: record.author_username,
          total_views: 0,
          unique_blog_count: 0
        },
        blogs: new Set()
      };
      groups.set(key, group);
    }

    group.summary.total_views += 1;
    group.blogs.add(record.blog_id);
    group.summary.unique_blog_count = group.blogs.size;
  }

  return Array.from(groups.values(), (group) => group.summary).sort(
    (left, right) =>
      left.date.localeCompare(right.date) ||
      compareNullable(left.country_code, right.country_code) ||
      compareNullable(left.author_username, right.author_username)
  );
};

type ResolveRollupStartDateOptions = {
  days?: number | null;
  now?: Date;
};

export const resolveRollupStartDate = (options: ResolveRollupStartDateOptions = {}): string | null => {
  const { days } = options;
  if (days === null || days === undefined) {
    return null;
  }

  if (!Number.isInteger(days) || days < 0) {
    throw new AnalyticsValidationError([{ field: "days", message: "must be a non-negative integer" }]);
  }

  const today = toUtcDateOnly(options.now ?? new Date());
  return formatDateYYYYMMDD(addUtcDays(today, -days));
};

const resolveEarliestDate = async (client: AnalyticsDbClient): Promise<string | null> => {
  const { rows } = await client.query(
    `
      SELECT to_char(MIN(timestamp) AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS earliest
      FROM blog_views
    `
  );

  const earliest = rows[0]?.earliest;
  return typeof earliest === "string" ? earliest : null;
};

/**
 * Replaces every summary on or after `fromDate` with fresh aggregates in one
 * transaction, so readers see either the old range or the new one.
 */
export const rebuildDailySummaries = async (
  options: RebuildDailySummariesOptions,
  pool: AnalyticsDbTransactionalPool = getAnalyticsDbPool()
): Promise<RebuildDailySummariesResult> => {
  const log = options.logger ?? createScopedLogger("analytics.rollup");

  if (options.fromDate !== null && !parseDateYYYYMMDD(options.fromDate)) {
    throw new AnalyticsValidationError([{ field: "fromDate", message: "must be YYYY-MM-DD" }]);
  }

  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    const fromDate = options.fromDate ?? (await resolveEarliestDate(client));
    if (!fromDate) {
      await client.query("COMMIT");
      log.warn({}, "no page views to roll up");
      return { fromDate: null, deleted: 0, inserted: 0 };
    }

    const deleted = await client.query(
      `
        DELETE FROM daily_analytics_summary
        WHERE date >= $1::date
      `,
      [fromDate]
    );

    const inserted = await client.query(
      `
        INSERT INTO daily_analytics_summary (
          date,
          country_id,
          author_id,
          total_views,
          unique_blog_count
        )
        SELECT
          (bv.timestamp AT TIME ZONE 'UTC')::date AS view_date,
          bv.country_id,
          b.author_id,
          COUNT(*) AS total_views,
          COUNT(DISTINCT bv.blog_id) AS unique_blog_count
        FROM blog_views bv
        JOIN blogs b ON b.id = bv.blog_id
        WHERE bv.timestamp >= ($1::date)::timestamp AT TIME ZONE 'UTC'
        GROUP BY view_date, bv.country_id, b.author_id
      `,
      [fromDate]
    );

    await client.query("COMMIT");

    const result = {
      fromDate,
      deleted: deleted.rowCount ?? 0,
      inserted: inserted.rowCount ?? 0
    };
    log.info(result, "daily summaries replaced");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      log.error(
        { fromDate: options.fromDate, error: rollbackError },
        "daily summary rollback failed"
      );
    }
    log.error({ fromDate: options.fromDate, error }, "daily summary rebuild failed");
    throw error;
  } finally {
    client.release();
  }
};
