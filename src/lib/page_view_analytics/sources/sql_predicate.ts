import { FieldNotAllowedError } from "../errors";
import type { ComparisonOperator, FilterScalar, Predicate } from "../predicate";
import { coerceFieldValue, type FieldValueType } from "./field_values";

export type SqlColumnType = FieldValueType;

export type SqlColumn = {
  sql: string;
  type: SqlColumnType;
};

export type SqlColumnResolver = (field: string) => SqlColumn | null;

export type CompiledSql = {
  sql: string;
  params: unknown[];
};

const ORDERING_SQL: Record<"gt" | "gte" | "lt" | "lte", string> = {
  gt: ">",
  gte: ">=",
  lt: "<",
  lte: "<="
};

const ARRAY_CASTS: Record<SqlColumnType, string> = {
  text: "text[]",
  integer: "bigint[]",
  timestamp: "timestamptz[]",
  date: "date[]"
};

const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, (match) => `\\${match}`);

const PARAMETER_CASTS: Record<SqlColumnType, string> = {
  text: "",
  integer: "::bigint",
  timestamp: "::timestamptz",
  date: "::date"
};

/**
 * Compiles a predicate into a parameterized boolean SQL expression. Columns
 * come only from `resolveColumn`; every value is bound as `$n` starting at
 * `firstParameterIndex`. Each leaf is NULL-free so NOT keeps two-valued logic.
 */
export const compilePredicateToSql = (
  predicate: Predicate,
  resolveColumn: SqlColumnResolver,
  firstParameterIndex = 1
): CompiledSql => {
  const params: unknown[] = [];

  const bind = (value: unknown): string => {
    params.push(value);
    return `$${firstParameterIndex + params.length - 1}`;
  };

  const column = (field: string): SqlColumn => {
    const resolved = resolveColumn(field);
    if (!resolved) {
      throw new FieldNotAllowedError(field);
    }
    return resolved;
  };

  const compileCompare = (
    target: SqlColumn,
    operator: ComparisonOperator,
    value: FilterScalar
  ): string => {
    if (operator === "eq" && value === null) {
      return `(${target.sql} IS NULL)`;
    }

    if (operator === "contains" || operator === "startswith") {
      if (value === null) {
        return "FALSE";
      }
      const escaped = escapeLikePattern(String(value));
      const pattern = operator === "contains" ? `%${escaped}%` : `${escaped}%`;
      const subject = target.type === "text" ? target.sql : `${target.sql}::text`;
      return `COALESCE(${subject} ILIKE ${bind(pattern)} ESCAPE '\\', FALSE)`;
    }

    const parameter = coerceFieldValue(target.type, value);
    if (parameter === null) {
      return "FALSE";
    }

    const placeholder = `${bind(parameter)}${PARAMETER_CASTS[target.type]}`;
    if (operator === "eq") {
      return `COALESCE(${target.sql} = ${placeholder}, FALSE)`;
    }

    // Byte-order comparison for text, matching in-process string ordering.
    const subject = target.type === "text" ? `${target.sql} COLLATE "C"` : target.sql;
    return `COALESCE(${subject} ${ORDERING_SQL[operator]} ${placeholder}, FALSE)`;
  };

  const compile = (node: Predicate): string => {
    switch (node.kind) {
      case "always":
        return node.value ? "TRUE" : "FALSE";
      case "compare":
        return compileCompare(column(node.field), node.operator, node.value);
      case "in": {
        const target = column(node.field);
        const values = node.values
          .map((value) => coerceFieldValue(target.type, value))
          .filter((value): value is string | number => value !== null);
        if (values.length === 0) {
          return "FALSE";
        }
        return `COALESCE(${target.sql} = ANY(${bind(values)}::${ARRAY_CASTS[target.type]}), FALSE)`;
      }
      case "and":
        return `(${node.children.map(compile).join(" AND ")})`;
      case "or":
        return `(${node.children.map(compile).join(" OR ")})`;
      case "not":
        return `(NOT ${compile(node.child)})`;
    }
  };

  const sql = compile(predicate);
  return { sql, params };
};
