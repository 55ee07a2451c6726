import { describe, expect, it } from "vitest";

import { createMemoryCacheBackend } from "./memory";

describe("memory cache backend", () => {
  it("serves values until the ttl elapses", async () => {
    let currentTime = 1_000;
    const backend = createMemoryCacheBackend({ now: () => currentTime });

    await backend.set("analytics:grouped:abc", "[]", 900);
    expect(await backend.get("analytics:grouped:abc")).toBe("[]");

    currentTime += 899_999;
    expect(await backend.get("analytics:grouped:abc")).toBe("[]");

    currentTime += 1;
    expect(await backend.get("analytics:grouped:abc")).toBeNull();
    expect(backend.size()).toBe(0);
  });

  it("overwrites existing entries", async () => {
    const backend = createMemoryCacheBackend({ now: () => 0 });

    await backend.set("key", "first", 60);
    await backend.set("key", "second", 60);

    expect(await backend.get("key")).toBe("second");
    expect(await backend.get("missing")).toBeNull();
  });

  it("drops expired entries whenever a new one is written", async () => {
    let currentTime = 0;
    const backend = createMemoryCacheBackend({ now: () => currentTime });

    for (let request = 0; request < 5; request += 1) {
      await backend.set(`analytics:grouped:${request}`, "[]", 900);
      currentTime += 900_001;
    }

    expect(backend.size()).toBe(1);
    expect(await backend.get("analytics:grouped:4")).toBeNull();
  });

  it("evicts the oldest writes beyond the entry cap", async () => {
    const backend = createMemoryCacheBackend({ now: () => 0, maxEntries: 2 });

    await backend.set("first", "1", 60);
    await backend.set("second", "2", 60);
    await backend.set("first", "1b", 60);
    await backend.set("third", "3", 60);

    expect(backend.size()).toBe(2);
    expect(await backend.get("second")).toBeNull();
    expect(await backend.get("first")).toBe("1b");
    expect(await backend.get("third")).toBe("3");
  });
});
