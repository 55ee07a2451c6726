import { getAnalyticsDbPool, type AnalyticsDbClient } from "@/lib/analytics_db/pool";

import type { AnalyticsCacheBackend } from "./store";

/** Shared across processes through the `analytics_cache` table. */
export class PostgresCacheBackend implements AnalyticsCacheBackend {
  constructor(private readonly client: AnalyticsDbClient = getAnalyticsDbPool()) {}

  async get(key: string): Promise<string | null> {
    const { rows } = await this.client.query(
      `
        SELECT value
        FROM analytics_cache
        WHERE cache_key = $1
          AND expires_at > NOW()
      `,
      [key]
    );

    const value = rows[0]?.value;
    return typeof value === "string" ? value : null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.query(
      `
        INSERT INTO analytics_cache (cache_key, value, expires_at)
        VALUES ($1, $2, NOW() + make_interval(secs => $3))
        ON CONFLICT (cache_key) DO UPDATE
        SET
          value = EXCLUDED.value,
          expires_at = EXCLUDED.expires_at
      `,
      [key, value, ttlSeconds]
    );
  }
}
