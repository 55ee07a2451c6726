import { describe, expect, it } from "vitest";

import {
  AnalyticsPlanner,
  FieldNotAllowedError,
  MemoryRawEventSource,
  MemorySummarySource,
  computeDailySummaries,
  createAnalyticsCache,
  createMemoryCacheBackend,
  parseFilterExpression,
  parseFlatFilter,
  type PageViewRecord
} from "@/lib/page_view_analytics";

const records: PageViewRecord[] = [
  {
    id: 1,
    blog_id: 1,
    blog_title: "B1",
    author_username: "alice",
    country_code: "US",
    viewer_id: null,
    ip_address: null,
    timestamp: new Date("2024-05-01T10:00:00.000Z")
  },
  {
    id: 2,
    blog_id: 2,
    blog_title: "B2",
    author_username: "bob",
    country_code: "UK",
    viewer_id: 3,
    ip_address: "127.0.0.1",
    timestamp: new Date("2024-05-02T10:00:00.000Z")
  }
];

const createPlanner = () =>
  new AnalyticsPlanner({
    rawSource: new MemoryRawEventSource(records),
    summarySource: new MemorySummarySource(computeDailySummaries(records)),
    cache: createAnalyticsCache({ backend: createMemoryCacheBackend() })
  });

describe("page view analytics entry point", () => {
  it("answers a flat filter combined with an expression", async () => {
    const filter = parseFlatFilter({ start_date: "2024-05-01", end_date: "2024-05-31" });
    const expression = parseFilterExpression({
      conditions: [{ field: "blog.author.username", op: "startswith", value: "B" }]
    });

    await expect(createPlanner().groupedAnalytics("country", filter, expression)).resolves.toEqual([
      { x: "UK", y: 1, z: 1 }
    ]);
  });

  it("surfaces allow-list failures as typed errors", async () => {
    const expression = parseFilterExpression({ conditions: [{ field: "viewer.secret", value: 1 }] });

    await expect(
      createPlanner().topAnalytics("blog", parseFlatFilter({}), expression)
    ).rejects.toBeInstanceOf(FieldNotAllowedError);
  });
});
