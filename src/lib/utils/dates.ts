export const DAY_IN_MS = 24 * 60 * 60 * 1000;

export type BucketWidth = "day" | "week" | "month";

const YYYY_MM_DD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/;

export const toUtcDateOnly = (value: Date): Date => {
  return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));
};

export const addUtcDays = (value: Date, offsetDays: number): Date => {
  return new Date(value.getTime() + offsetDays * DAY_IN_MS);
};

export const formatDateYYYYMMDD = (value: Date): string => {
  const year = value.getUTCFullYear();
  const month = `${value.getUTCMonth() + 1}`.padStart(2, "0");
  const day = `${value.getUTCDate()}`.padStart(2, "0");
  return `${year}-${month}-${day}`;
};

export const parseDateYYYYMMDD = (value: string | null | undefined): Date | null => {
  if (!value) {
    return null;
  }

  const match = value.match(YYYY_MM_DD_PATTERN);
  if (!match) {
    return null;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() + 1 !== month ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
};

/** Full ISO-8601 timestamp with an explicit offset. Date-only strings are rejected. */
export const parseIsoDateTime = (value: string | null | undefined): Date | null => {
  if (!value || !ISO_DATE_TIME_PATTERN.test(value)) {
    return null;
  }

  if (!parseDateYYYYMMDD(value.slice(0, 10))) {
    return null;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

/** Start of the UTC bucket holding `value`. Weeks start on Monday. */
export const truncateUtc = (value: Date, width: BucketWidth): Date => {
  if (width === "month") {
    return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), 1));
  }

  const day = toUtcDateOnly(value);
  if (width === "day") {
    return day;
  }

  const daysSinceMonday = (day.getUTCDay() + 6) % 7;
  return addUtcDays(day, -daysSinceMonday);
};

/** Whole days between two instants, rounded toward zero. */
export const wholeDaysBetween = (start: Date, end: Date): number => {
  return Math.trunc((end.getTime() - start.getTime()) / DAY_IN_MS);
};
