import { env } from "../env";
import {
  AnalyticsValidationError,
  ExpressionTooDeepError,
  FieldNotAllowedError,
  UnsupportedOperatorError
} from "./errors";
import {
  and,
  compare,
  isFilterOperator,
  not,
  or,
  type FilterOperator,
  type FilterScalar,
  type Predicate
} from "./predicate";

export const FILTER_COMBINATORS = ["and", "or", "not"] as const;
export type FilterCombinator = (typeof FILTER_COMBINATORS)[number];

export type FilterLeaf = {
  kind: "leaf";
  field: string;
  operator: FilterOperator;
  value: FilterScalar;
};

export type FilterGroup = {
  kind: "group";
  combinator: FilterCombinator;
  children: FilterExpression[];
};

export type FilterExpression = FilterLeaf | FilterGroup;

export type ParseFilterExpressionOptions = {
  maxDepth?: number;
};

const FIELD_PATH_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const MAX_FIELD_PATH_LENGTH = 120;

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const isScalar = (value: unknown): value is FilterScalar => {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
};

const isCombinator = (value: string): value is FilterCombinator => {
  return value === "and" || value === "or" || value === "not";
};

const fail = (field: string, message: string): never => {
  throw new AnalyticsValidationError([{ field, message }]);
};

const isGroupNode = (node: Record<string, unknown>): boolean => {
  return "conditions" in node || "operator" in node;
};

const parseLeaf = (node: Record<string, unknown>, path: string): FilterLeaf => {
  const field = node.field;
  if (typeof field !== "string" || field.trim().length === 0) {
    return fail(`${path}.field`, "Condition missing 'field'.");
  }

  const normalizedField = field.trim();
  if (normalizedField.length > MAX_FIELD_PATH_LENGTH || !FIELD_PATH_PATTERN.test(normalizedField)) {
    return fail(`${path}.field`, "must be a dotted path of identifiers");
  }

  const rawOperator = node.op ?? "eq";
  if (typeof rawOperator !== "string") {
    return fail(`${path}.op`, "must be a string");
  }

  const operator = rawOperator.trim().toLowerCase();
  if (!isFilterOperator(operator)) {
    throw new UnsupportedOperatorError(rawOperator);
  }

  if (!("value" in node)) {
    return fail(`${path}.value`, "is required");
  }

  const value = node.value;
  if (!isScalar(value)) {
    return fail(`${path}.value`, "must be a string, number, boolean or null");
  }

  return { kind: "leaf", field: normalizedField, operator, value };
};

const parseNode = (
  node: unknown,
  path: string,
  depth: number,
  maxDepth: number
): FilterExpression => {
  if (depth > maxDepth) {
    throw new ExpressionTooDeepError(maxDepth);
  }

  if (!isRecord(node)) {
    return fail(path, "must be an object");
  }

  if (!isGroupNode(node)) {
    return parseLeaf(node, path);
  }

  const rawCombinator = node.operator ?? "and";
  const combinator = typeof rawCombinator === "string" ? rawCombinator.trim().toLowerCase() : null;
  if (combinator === null || !isCombinator(combinator)) {
    return fail(`${path}.operator`, `must be one of ${FILTER_COMBINATORS.join(", ")}`);
  }

  const conditions = node.conditions ?? [];
  if (!Array.isArray(conditions)) {
    return fail(`${path}.conditions`, "Field 'conditions' must be a list.");
  }

  const children = conditions.map((child, index) =>
    parseNode(child, `${path}.conditions[${index}]`, depth + 1, maxDepth)
  );

  return { kind: "group", combinator, children };
};

/**
 * Decodes an untrusted `{operator, conditions}` payload. A node carrying
 * `conditions` or `operator` is a group; anything else is a leaf
 * `{field, op, value}`. An absent payload is the empty AND group.
 */
export const parseFilterExpression = (
  payload: unknown,
  options: ParseFilterExpressionOptions = {}
): FilterExpression => {
  const maxDepth = options.maxDepth ?? env.ANALYTICS_FILTER_MAX_DEPTH;
  if (payload === null || payload === undefined) {
    return { kind: "group", combinator: "and", children: [] };
  }

  if (isRecord(payload) && Object.keys(payload).length === 0) {
    return { kind: "group", combinator: "and", children: [] };
  }

  return parseNode(payload, "filter", 1, maxDepth);
};

const isFieldAllowed = (field: string, allowedFields: ReadonlySet<string>): boolean => {
  if (allowedFields.has(field)) {
    return true;
  }

  const [baseField] = field.split(".");
  return allowedFields.has(baseField);
};

/**
 * Lowers an expression to a Predicate. `not` is NAND over its children, so an
 * empty `not` group selects nothing while empty `and`/`or` select everything.
 * With `resolveField`, a field that passes the allow-list but names no column
 * is rejected here rather than by whichever source meets it first.
 */
export const buildExpressionPredicate = (
  expression: FilterExpression,
  allowedFields: Iterable<string>,
  resolveField?: (field: string) => unknown
): Predicate => {
  const allowed = new Set(allowedFields);

  const build = (node: FilterExpression): Predicate => {
    if (node.kind === "leaf") {
      if (!isFieldAllowed(node.field, allowed)) {
        throw new FieldNotAllowedError(node.field);
      }
      if (resolveField && resolveField(node.field) === null) {
        throw new FieldNotAllowedError(node.field);
      }
      return compare(node.field, node.operator, node.value);
    }

    const children = node.children.map(build);
    switch (node.combinator) {
      case "and":
        return and(...children);
      case "or":
        return or(...children);
      case "not":
        return not(and(...children));
    }
  };

  return build(expression);
};

const sortKey = (expression: FilterExpression): string => JSON.stringify(expression);

/**
 * Children of every group sorted by their own canonical form. AND, OR and
 * NAND are all commutative, so the result selects the same rows.
 */
export const canonicalizeFilterExpression = (expression: FilterExpression): FilterExpression => {
  if (expression.kind === "leaf") {
    return {
      kind: "leaf",
      field: expression.field,
      operator: expression.operator,
      value: expression.value
    };
  }

  const children = expression.children
    .map(canonicalizeFilterExpression)
    .map((child) => ({ child, key: sortKey(child) }))
    .sort((left, right) => (left.key < right.key ? -1 : left.key > right.key ? 1 : 0))
    .map((entry) => entry.child);

  return { kind: "group", combinator: expression.combinator, children };
};
