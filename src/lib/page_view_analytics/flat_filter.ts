import {
  DAY_IN_MS,
  addUtcDays,
  formatDateYYYYMMDD,
  parseDateYYYYMMDD,
  parseIsoDateTime
} from "../utils/dates";
import { hasControlCharacters, normalizeString } from "../utils/strings";
import { AnalyticsValidationError } from "./errors";
import { and, compare, inSet, not, type Predicate } from "./predicate";
import {
  EMPTY_FLAT_FILTER,
  FILTER_RANGES,
  type FilterRange,
  type FlatFilter,
  type ValidationIssue
} from "./types";

const MIN_YEAR = 1900;
const MAX_YEAR = 9998;
const MAX_COUNTRY_CODE_LENGTH = 5;
const MAX_USERNAME_LENGTH = 150;

const MINUTE_MS = 60_000;

const RANGE_DAYS: Record<FilterRange, number> = {
  day: 1,
  week: 7,
  month: 30,
  year: 365
};

const RANGE_SET = new Set<string>(FILTER_RANGES);

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const isFilterRange = (value: string): value is FilterRange => RANGE_SET.has(value);

const isAbsent = (value: unknown): value is null | undefined => value === null || value === undefined;

const isDateOnly = (value: string): boolean => value.length === 10;

const parseIntegerValue = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }

  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }

  return null;
};

const parseYear = (value: unknown, issues: ValidationIssue[]): number | null => {
  if (isAbsent(value)) {
    return null;
  }

  const year = parseIntegerValue(value);
  if (year === null || year < MIN_YEAR || year > MAX_YEAR) {
    issues.push({ field: "year", message: `must be an integer between ${MIN_YEAR} and ${MAX_YEAR}` });
    return null;
  }

  return year;
};

/** Keeps date-only input as `YYYY-MM-DD`; timestamps become UTC ISO strings. */
const parseDateBound = (
  field: "start_date" | "end_date",
  value: unknown,
  issues: ValidationIssue[]
): string | null => {
  if (isAbsent(value)) {
    return null;
  }

  const raw = typeof value === "string" ? value.trim() : "";
  const date = parseDateYYYYMMDD(raw);
  if (date) {
    return formatDateYYYYMMDD(date);
  }

  const dateTime = parseIsoDateTime(raw);
  if (dateTime) {
    return dateTime.toISOString();
  }

  issues.push({ field, message: "must be YYYY-MM-DD or an ISO-8601 timestamp with offset" });
  return null;
};

const parseCountryCodes = (
  field: "country_codes" | "exclude_country_codes",
  value: unknown,
  issues: ValidationIssue[]
): string[] => {
  if (isAbsent(value)) {
    return [];
  }

  if (!Array.isArray(value)) {
    issues.push({ field, message: "must be a list of country codes" });
    return [];
  }

  const codes: string[] = [];
  for (const entry of value) {
    const code = normalizeString(entry);
    if (!code || code.length > MAX_COUNTRY_CODE_LENGTH || hasControlCharacters(code)) {
      issues.push({
        field,
        message: `entries must be non-empty codes of ${MAX_COUNTRY_CODE_LENGTH} characters or fewer`
      });
      return [];
    }
    codes.push(code.toUpperCase());
  }

  return Array.from(new Set(codes));
};

const parseUsername = (value: unknown, issues: ValidationIssue[]): string | null => {
  if (isAbsent(value)) {
    return null;
  }

  const username = normalizeString(value);
  if (!username || username.length > MAX_USERNAME_LENGTH || hasControlCharacters(username)) {
    issues.push({
      field: "author_username",
      message: `must be a non-empty string of ${MAX_USERNAME_LENGTH} characters or fewer`
    });
    return null;
  }

  return username;
};

const parseBlogId = (value: unknown, issues: ValidationIssue[]): number | null => {
  if (isAbsent(value)) {
    return null;
  }

  const blogId = parseIntegerValue(value);
  if (blogId === null || blogId <= 0) {
    issues.push({ field: "blog_id", message: "must be a positive integer" });
    return null;
  }

  return blogId;
};

const lowerBoundInstant = (bound: string): number => {
  return new Date(isDateOnly(bound) ? `${bound}T00:00:00.000Z` : bound).getTime();
};

const upperBoundInstant = (bound: string): number => {
  return isDateOnly(bound)
    ? new Date(`${bound}T00:00:00.000Z`).getTime() + DAY_IN_MS - 1
    : new Date(bound).getTime();
};

/**
 * Validates the flat request contract. `range` rewrites start/end to
 * `[now - range, now]` and wins over explicit dates in the same payload.
 */
export const parseFlatFilter = (payload: unknown, now: Date = new Date()): FlatFilter => {
  if (isAbsent(payload)) {
    return { ...EMPTY_FLAT_FILTER };
  }

  if (!isRecord(payload)) {
    throw new AnalyticsValidationError([{ field: "filter", message: "must be an object" }]);
  }

  const issues: ValidationIssue[] = [];

  let range: FilterRange | null = null;
  if (!isAbsent(payload.range)) {
    const rawRange = typeof payload.range === "string" ? payload.range.trim().toLowerCase() : "";
    if (isFilterRange(rawRange)) {
      range = rawRange;
    } else {
      issues.push({ field: "range", message: `must be one of ${FILTER_RANGES.join(", ")}` });
    }
  }

  const filter: FlatFilter = {
    year: parseYear(payload.year, issues),
    start_date: parseDateBound("start_date", payload.start_date, issues),
    end_date: parseDateBound("end_date", payload.end_date, issues),
    country_codes: parseCountryCodes("country_codes", payload.country_codes, issues),
    exclude_country_codes: parseCountryCodes(
      "exclude_country_codes",
      payload.exclude_country_codes,
      issues
    ),
    author_username: parseUsername(payload.author_username, issues),
    blog_id: parseBlogId(payload.blog_id, issues)
  };

  if (range) {
    // Whole minutes keep repeated range requests on one cache key.
    const windowStart = new Date(Math.floor(now.getTime() / MINUTE_MS) * MINUTE_MS);
    const windowEnd = new Date(Math.ceil(now.getTime() / MINUTE_MS) * MINUTE_MS);
    filter.start_date = addUtcDays(windowStart, -RANGE_DAYS[range]).toISOString();
    filter.end_date = windowEnd.toISOString();
  }

  if (
    filter.start_date &&
    filter.end_date &&
    lowerBoundInstant(filter.start_date) > upperBoundInstant(filter.end_date)
  ) {
    issues.push({ field: "start_date", message: "must be on or before end_date" });
  }

  if (issues.length > 0) {
    throw new AnalyticsValidationError(issues);
  }

  return filter;
};

const yearStart = (year: number): string => `${String(year).padStart(4, "0")}-01-01`;

const countryPredicates = (filter: FlatFilter): Predicate[] => {
  const predicates: Predicate[] = [];
  if (filter.country_codes.length > 0) {
    predicates.push(inSet("country_code", filter.country_codes));
  }
  if (filter.exclude_country_codes.length > 0) {
    predicates.push(not(inSet("country_code", filter.exclude_country_codes)));
  }
  return predicates;
};

/**
 * Lowers a flat filter onto raw page views. A date-only `end_date` includes
 * the whole day; a timestamp `end_date` is an inclusive instant.
 */
export const normalizeFlatFilter = (filter: FlatFilter): Predicate => {
  const predicates: Predicate[] = [];

  if (filter.year !== null) {
    predicates.push(
      compare("timestamp", "gte", `${yearStart(filter.year)}T00:00:00.000Z`),
      compare("timestamp", "lt", `${yearStart(filter.year + 1)}T00:00:00.000Z`)
    );
  } else {
    if (filter.start_date) {
      const lower = isDateOnly(filter.start_date)
        ? `${filter.start_date}T00:00:00.000Z`
        : filter.start_date;
      predicates.push(compare("timestamp", "gte", lower));
    }
    if (filter.end_date) {
      predicates.push(
        isDateOnly(filter.end_date)
          ? compare(
              "timestamp",
              "lt",
              addUtcDays(new Date(`${filter.end_date}T00:00:00.000Z`), 1).toISOString()
            )
          : compare("timestamp", "lte", filter.end_date)
      );
    }
  }

  predicates.push(...countryPredicates(filter));

  if (filter.author_username) {
    predicates.push(compare("author_username", "eq", filter.author_username));
  }
  if (filter.blog_id !== null) {
    predicates.push(compare("blog_id", "eq", filter.blog_id));
  }

  return and(...predicates);
};

/**
 * Lowers a flat filter onto daily summaries: bounds compare on UTC dates.
 * Summaries carry no blog id, so `blog_id` cannot be honoured here.
 */
export const normalizeSummaryFilter = (filter: FlatFilter): Predicate => {
  if (filter.blog_id !== null) {
    throw new AnalyticsValidationError([
      { field: "blog_id", message: "is not available on pre-aggregated summaries" }
    ]);
  }

  const predicates: Predicate[] = [];

  if (filter.year !== null) {
    predicates.push(
      compare("date", "gte", yearStart(filter.year)),
      compare("date", "lt", yearStart(filter.year + 1))
    );
  } else {
    if (filter.start_date) {
      predicates.push(compare("date", "gte", filter.start_date.slice(0, 10)));
    }
    if (filter.end_date) {
      predicates.push(compare("date", "lte", filter.end_date.slice(0, 10)));
    }
  }

  predicates.push(...countryPredicates(filter));

  if (filter.author_username) {
    predicates.push(compare("author_username", "eq", filter.author_username));
  }

  return and(...predicates);
};
