import type { AnalyticsCacheBackend } from "./store";

export const MEMORY_CACHE_MAX_ENTRIES = 1_024;

type CacheEntry = {
  value: string;
  expiresAtMs: number;
};

type CreateMemoryCacheBackendOptions = {
  now?: () => number;
  maxEntries?: number;
};

export type MemoryCacheBackend = AnalyticsCacheBackend & {
  size(): number;
  clear(): void;
};

/**
 * Process-local backend. Expired entries are dropped when read and on every
 * write, after which the oldest writes are evicted down to `maxEntries`.
 */
export const createMemoryCacheBackend = (
  options: CreateMemoryCacheBackendOptions = {}
): MemoryCacheBackend => {
  const now = options.now ?? Date.now;
  const maxEntries = options.maxEntries ?? MEMORY_CACHE_MAX_ENTRIES;
  const entries = new Map<string, CacheEntry>();

  const prune = (currentNow: number): void => {
    for (const [key, entry] of entries) {
      if (entry.expiresAtMs <= currentNow) {
        entries.delete(key);
      }
    }

    while (entries.size > maxEntries) {
      const oldestKey = entries.keys().next().value;
      if (oldestKey === undefined) {
        break;
      }

      entries.delete(oldestKey);
    }
  };

  return {
    async get(key) {
      const entry = entries.get(key);
      if (!entry) {
        return null;
      }

      if (entry.expiresAtMs <= now()) {
        entries.delete(key);
        return null;
      }

      return entry.value;
    },

    async set(key, value, ttlSeconds) {
      const currentNow = now();
      // Re-inserting moves the key to the end of the eviction order.
      entries.delete(key);
      entries.set(key, {
        value,
        expiresAtMs: currentNow + ttlSeconds * 1000
      });
      prune(currentNow);
    },

    size() {
      return entries.size;
    },

    clear() {
      entries.clear();
    }
  };
};
