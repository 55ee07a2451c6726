import { FieldNotAllowedError } from "../errors";
import {
  ALWAYS_FALSE,
  and,
  inSet,
  not,
  or,
  type FilterScalar,
  type Predicate
} from "../predicate";

export type FieldValueType = "text" | "integer" | "timestamp" | "date";

export type FieldTypeResolver = (field: string) => FieldValueType | null;

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const toInteger = (value: string | number): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Converts a filter value to the column's type, or null when the value can
 * never match it. Timestamps become UTC ISO strings, which order the same as
 * the instants they name.
 */
export const coerceFieldValue = (
  type: FieldValueType,
  value: FilterScalar
): string | number | null => {
  if (value === null || typeof value === "boolean") {
    return null;
  }

  switch (type) {
    case "integer":
      return toInteger(value);
    case "text":
      return String(value);
    case "timestamp": {
      if (typeof value !== "string") {
        return null;
      }
      const parsed = Date.parse(value);
      return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
    }
    case "date":
      return typeof value === "string" && DATE_ONLY_PATTERN.test(value) ? value : null;
  }
};

/**
 * Rewrites every leaf value to its column's type so in-process evaluation
 * compares the way the database does. Unknown fields throw before any record
 * is read.
 */
export const coercePredicateValues = (
  predicate: Predicate,
  resolveType: FieldTypeResolver
): Predicate => {
  const typeOf = (field: string): FieldValueType => {
    const type = resolveType(field);
    if (!type) {
      throw new FieldNotAllowedError(field);
    }
    return type;
  };

  const coerce = (node: Predicate): Predicate => {
    switch (node.kind) {
      case "always":
        return node;
      case "compare": {
        const type = typeOf(node.field);
        if (node.value === null) {
          return node;
        }
        if (node.operator === "contains" || node.operator === "startswith") {
          return { ...node, value: String(node.value) };
        }
        const value = coerceFieldValue(type, node.value);
        return value === null ? ALWAYS_FALSE : { ...node, value };
      }
      case "in": {
        const type = typeOf(node.field);
        const values = node.values
          .map((value) => coerceFieldValue(type, value))
          .filter((value): value is string | number => value !== null);
        return inSet(node.field, values);
      }
      case "and":
        return and(...node.children.map(coerce));
      case "or":
        return or(...node.children.map(coerce));
      case "not":
        return not(coerce(node.child));
    }
  };

  return coerce(predicate);
};
