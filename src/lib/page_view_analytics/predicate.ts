import { FieldNotAllowedError } from "./errors";

export const FILTER_OPERATORS = [
  "eq",
  "neq",
  "gt",
  "gte",
  "lt",
  "lte",
  "contains",
  "startswith"
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

/** `neq` is lowered to NOT(eq) so sources only see these. */
export type ComparisonOperator = Exclude<FilterOperator, "neq">;

export type FilterScalar = string | number | boolean | null;

export type Predicate =
  | { kind: "always"; value: boolean }
  | { kind: "compare"; field: string; operator: ComparisonOperator; value: FilterScalar }
  | { kind: "in"; field: string; values: FilterScalar[] }
  | { kind: "and"; children: Predicate[] }
  | { kind: "or"; children: Predicate[] }
  | { kind: "not"; child: Predicate };

export const ALWAYS_TRUE: Predicate = { kind: "always", value: true };
export const ALWAYS_FALSE: Predicate = { kind: "always", value: false };

const FILTER_OPERATOR_SET = new Set<string>(FILTER_OPERATORS);

export const isFilterOperator = (value: string): value is FilterOperator => {
  return FILTER_OPERATOR_SET.has(value);
};

export const compare = (
  field: string,
  operator: FilterOperator,
  value: FilterScalar
): Predicate => {
  if (operator === "neq") {
    return not({ kind: "compare", field, operator: "eq", value });
  }

  return { kind: "compare", field, operator, value };
};

export const inSet = (field: string, values: FilterScalar[]): Predicate => {
  if (values.length === 0) {
    return ALWAYS_FALSE;
  }

  return { kind: "in", field, values: [...values] };
};

export const and = (...children: Predicate[]): Predicate => {
  const kept: Predicate[] = [];
  for (const child of children) {
    if (child.kind === "always") {
      if (!child.value) {
        return ALWAYS_FALSE;
      }
      continue;
    }
    kept.push(child);
  }

  if (kept.length === 0) {
    return ALWAYS_TRUE;
  }

  return kept.length === 1 ? kept[0] : { kind: "and", children: kept };
};

export const or = (...children: Predicate[]): Predicate => {
  if (children.length === 0) {
    return ALWAYS_TRUE;
  }

  const kept: Predicate[] = [];
  for (const child of children) {
    if (child.kind === "always") {
      if (child.value) {
        return ALWAYS_TRUE;
      }
      continue;
    }
    kept.push(child);
  }

  if (kept.length === 0) {
    return ALWAYS_FALSE;
  }

  return kept.length === 1 ? kept[0] : { kind: "or", children: kept };
};

export const not = (child: Predicate): Predicate => {
  if (child.kind === "always") {
    return child.value ? ALWAYS_FALSE : ALWAYS_TRUE;
  }

  if (child.kind === "not") {
    return child.child;
  }

  return { kind: "not", child };
};

/**
 * Reads a field off a record. Returns `undefined` for fields the record type
 * does not expose; evaluation turns that into FieldNotAllowedError.
 */
export type FieldReader<TRecord> = (record: TRecord, field: string) => FilterScalar | undefined;

const toComparableNumber = (value: FilterScalar): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

const scalarEquals = (left: FilterScalar, right: FilterScalar): boolean => {
  if (right === null || left === null) {
    return left === right;
  }

  if (typeof left === "number" || typeof right === "number") {
    const leftNumber = toComparableNumber(left);
    const rightNumber = toComparableNumber(right);
    return leftNumber !== null && leftNumber === rightNumber;
  }

  return left === right;
};

const orderScalars = (left: FilterScalar, right: FilterScalar): number | null => {
  if (left === null || right === null || typeof left === "boolean" || typeof right === "boolean") {
    return null;
  }

  if (typeof left === "string" && typeof right === "string") {
    if (left === right) {
      return 0;
    }
    return left < right ? -1 : 1;
  }

  const leftNumber = toComparableNumber(left);
  const rightNumber = toComparableNumber(right);
  if (leftNumber === null || rightNumber === null) {
    return null;
  }

  return leftNumber - rightNumber;
};

export const compareScalars = (
  left: FilterScalar,
  operator: ComparisonOperator,
  right: FilterScalar
): boolean => {
  switch (operator) {
    case "eq":
      return scalarEquals(left, right);
    case "contains":
      return (
        left !== null &&
        right !== null &&
        String(left).toLowerCase().includes(String(right).toLowerCase())
      );
    case "startswith":
      return (
        left !== null &&
        right !== null &&
        String(left).toLowerCase().startsWith(String(right).toLowerCase())
      );
    default: {
      const order = orderScalars(left, right);
      if (order === null) {
        return false;
      }

      if (operator === "gt") {
        return order > 0;
      }
      if (operator === "gte") {
        return order >= 0;
      }
      if (operator === "lt") {
        return order < 0;
      }
      return order <= 0;
    }
  }
};

export const evaluatePredicate = <TRecord>(
  predicate: Predicate,
  record: TRecord,
  readField: FieldReader<TRecord>
): boolean => {
  const read = (field: string): FilterScalar => {
    const value = readField(record, field);
    if (value === undefined) {
      throw new FieldNotAllowedError(field);
    }
    return value;
  };

  switch (predicate.kind) {
    case "always":
      return predicate.value;
    case "compare":
      return compareScalars(read(predicate.field), predicate.operator, predicate.value);
    case "in": {
      const value = read(predicate.field);
      return value !== null && predicate.values.some((candidate) => scalarEquals(value, candidate));
    }
    case "and":
      return predicate.children.every((child) => evaluatePredicate(child, record, readField));
    case "or":
      return predicate.children.some((child) => evaluatePredicate(child, record, readField));
    case "not":
      return !evaluatePredicate(predicate.child, record, readField);
  }
};

/** Builds a reusable record filter; throws on the first unknown field it meets. */
export const compilePredicate = <TRecord>(
  predicate: Predicate,
  readField: FieldReader<TRecord>
): ((record: TRecord) => boolean) => {
  return (record) => evaluatePredicate(predicate, record, readField);
};
