import { InvalidDimensionError } from "../errors";
import type { FieldReader } from "../predicate";
import type { DailySummary, Dimension, PageViewRecord } from "../types";
import type { FieldValueType } from "./field_values";

export const RAW_EVENT_FIELDS = [
  "timestamp",
  "country_code",
  "author_username",
  "blog_id",
  "blog_title",
  "viewer_id",
  "ip_address"
] as const;

export const SUMMARY_FIELDS = ["date", "country_code", "author_username"] as const;

export type RawEventField = (typeof RAW_EVENT_FIELDS)[number];
export type SummaryField = (typeof SUMMARY_FIELDS)[number];

// Dotted spellings of the joined columns, mirroring blog -> author and country relations.
const RAW_EVENT_FIELD_ALIASES = new Map<string, RawEventField>([
  ["blog.id", "blog_id"],
  ["blog.title", "blog_title"],
  ["blog.author.username", "author_username"],
  ["country.code", "country_code"],
  ["viewer.id", "viewer_id"]
]);

const SUMMARY_FIELD_ALIASES = new Map<string, SummaryField>([
  ["country.code", "country_code"],
  ["author.username", "author_username"]
]);

/** Allow-lists handed to the expression engine: column names plus their dotted spellings. */
export const RAW_EVENT_ALLOWED_FIELDS: readonly string[] = [
  ...RAW_EVENT_FIELDS,
  ...RAW_EVENT_FIELD_ALIASES.keys()
];

export const SUMMARY_ALLOWED_FIELDS: readonly string[] = [
  ...SUMMARY_FIELDS,
  ...SUMMARY_FIELD_ALIASES.keys()
];

const RAW_EVENT_FIELD_SET = new Set<string>(RAW_EVENT_FIELDS);
const SUMMARY_FIELD_SET = new Set<string>(SUMMARY_FIELDS);

const isRawEventField = (value: string): value is RawEventField => RAW_EVENT_FIELD_SET.has(value);
const isSummaryField = (value: string): value is SummaryField => SUMMARY_FIELD_SET.has(value);

export const resolveRawEventField = (field: string): RawEventField | null => {
  if (isRawEventField(field)) {
    return field;
  }

  return RAW_EVENT_FIELD_ALIASES.get(field) ?? null;
};

export const resolveSummaryField = (field: string): SummaryField | null => {
  if (isSummaryField(field)) {
    return field;
  }

  return SUMMARY_FIELD_ALIASES.get(field) ?? null;
};

const RAW_EVENT_FIELD_TYPES: Record<RawEventField, FieldValueType> = {
  timestamp: "timestamp",
  country_code: "text",
  author_username: "text",
  blog_id: "integer",
  blog_title: "text",
  viewer_id: "integer",
  ip_address: "text"
};

const SUMMARY_FIELD_TYPES: Record<SummaryField, FieldValueType> = {
  date: "date",
  country_code: "text",
  author_username: "text"
};

export const resolveRawEventFieldType = (field: string): FieldValueType | null => {
  const resolved = resolveRawEventField(field);
  return resolved ? RAW_EVENT_FIELD_TYPES[resolved] : null;
};

export const resolveSummaryFieldType = (field: string): FieldValueType | null => {
  const resolved = resolveSummaryField(field);
  return resolved ? SUMMARY_FIELD_TYPES[resolved] : null;
};

/** Timestamps read as UTC ISO strings, the form leaf values are coerced to. */
export const readPageViewField: FieldReader<PageViewRecord> = (record, field) => {
  const resolved = resolveRawEventField(field);
  switch (resolved) {
    case "timestamp":
      return record.timestamp.toISOString();
    case "country_code":
      return record.country_code;
    case "author_username":
      return record.author_username;
    case "blog_id":
      return record.blog_id;
    case "blog_title":
      return record.blog_title;
    case "viewer_id":
      return record.viewer_id;
    case "ip_address":
      return record.ip_address;
    default:
      return undefined;
  }
};

export const readSummaryField: FieldReader<DailySummary> = (record, field) => {
  const resolved = resolveSummaryField(field);
  switch (resolved) {
    case "date":
      return record.date;
    case "country_code":
      return record.country_code;
    case "author_username":
      return record.author_username;
    default:
      return undefined;
  }
};

/** Summaries are keyed by country and author only. */
export const SUMMARY_DIMENSIONS = ["country_code", "author_username"] as const satisfies readonly Dimension[];

export const assertDimension = <TDimension extends Dimension>(
  dimension: string,
  supported: readonly TDimension[],
  source: string
): TDimension => {
  const match = supported.find((candidate) => candidate === dimension);
  if (!match) {
    throw new InvalidDimensionError(dimension, source);
  }
  return match;
};
