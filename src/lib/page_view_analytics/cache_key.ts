import { createHash } from "node:crypto";

const CACHE_KEY_PREFIX = "analytics";

// Order and duplicates carry no meaning in these lists.
const UNORDERED_SET_KEYS = new Set(["country_codes", "exclude_country_codes"]);

const canonicalizeSet = (values: unknown[]): string[] => {
  return Array.from(new Set(values.map((entry) => canonicalize(entry)))).sort();
};

/**
 * Deterministic JSON: object keys sorted recursively, `undefined` members
 * dropped, dates as ISO strings and the country code lists sorted.
 */
export const canonicalize = (value: unknown): string => {
  if (value === undefined || value === null) {
    return "null";
  }

  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  if (typeof value !== "object") {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const parts = value.map((entry) => canonicalize(entry));
    return `[${parts.join(",")}]`;
  }

  const entries = Object.entries(value)
    .filter(([, entryValue]) => entryValue !== undefined)
    .sort(([left], [right]) => left.localeCompare(right));
  const parts = entries.map(([key, entryValue]) => {
    const serialized =
      UNORDERED_SET_KEYS.has(key) && Array.isArray(entryValue)
        ? `[${canonicalizeSet(entryValue).join(",")}]`
        : canonicalize(entryValue);
    return `${JSON.stringify(key)}:${serialized}`;
  });
  return `{${parts.join(",")}}`;
};

export const buildAnalyticsCacheKey = (operation: string, params: unknown): string => {
  const digest = createHash("sha256").update(canonicalize(params), "utf8").digest("hex");
  return `${CACHE_KEY_PREFIX}:${operation}:${digest}`;
};
