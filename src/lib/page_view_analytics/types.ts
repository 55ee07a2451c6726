import type { BucketWidth } from "../utils/dates";

export type { BucketWidth };

export const OBJECT_TYPES = ["country", "user"] as const;
export const TOP_TYPES = ["blog", "user", "country"] as const;
export const DIMENSIONS = ["country_code", "author_username", "blog_title"] as const;
export const DISTINCT_FIELDS = ["blog_id", "country_code"] as const;
export const FILTER_RANGES = ["day", "week", "month", "year"] as const;

export type ObjectType = (typeof OBJECT_TYPES)[number];
export type TopType = (typeof TOP_TYPES)[number];
export type Dimension = (typeof DIMENSIONS)[number];
export type DistinctField = (typeof DISTINCT_FIELDS)[number];
export type FilterRange = (typeof FILTER_RANGES)[number];

/** A blog view joined with its blog and author, as sources expose it. */
export type PageViewRecord = {
  id: number;
  blog_id: number;
  blog_title: string;
  author_username: string;
  country_code: string | null;
  viewer_id: number | null;
  ip_address: string | null;
  timestamp: Date;
};

export type DailySummary = {
  date: string;
  country_code: string | null;
  author_username: string | null;
  total_views: number;
  unique_blog_count: number;
};

export type AnalyticsPoint = {
  x: string;
  y: number;
  z: number;
};

export type FlatFilter = {
  year: number | null;
  start_date: string | null;
  end_date: string | null;
  country_codes: string[];
  exclude_country_codes: string[];
  author_username: string | null;
  blog_id: number | null;
};

export const EMPTY_FLAT_FILTER: FlatFilter = {
  year: null,
  start_date: null,
  end_date: null,
  country_codes: [],
  exclude_country_codes: [],
  author_username: null,
  blog_id: null
};

export type ValidationIssue = {
  field: string;
  message: string;
};

export const UNKNOWN_GROUP_LABEL = "(unknown)";
