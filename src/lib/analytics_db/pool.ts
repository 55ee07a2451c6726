import { env } from "@/lib/env";
import { Pool } from "pg";

let pool: Pool | null = null;

export const getAnalyticsDbPool = (): Pool => {
  const connectionString = env.ANALYTICS_DATABASE_URL;
  if (!connectionString) {
    throw new Error("ANALYTICS_DATABASE_URL is required before using the analytics database.");
  }

  if (!pool) {
    pool = new Pool({ connectionString });
  }

  return pool;
};

/** Minimal query surface shared by `Pool` and `PoolClient`; tests pass fakes. */
export type AnalyticsDbClient = {
  query: (
    text: string,
    values?: unknown[]
  ) => Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
};
