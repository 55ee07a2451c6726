import { describe, expect, it } from "vitest";

import { FieldNotAllowedError } from "../errors";
import { ALWAYS_TRUE, and, compare, inSet, not, or } from "../predicate";
import { compilePredicateToSql, type SqlColumn } from "./sql_predicate";

const COLUMNS = new Map<string, SqlColumn>([
  ["country_code", { sql: "c.code", type: "text" }],
  ["blog_id", { sql: "bv.blog_id", type: "integer" }],
  ["timestamp", { sql: "bv.timestamp", type: "timestamp" }],
  ["date", { sql: "s.date", type: "date" }]
]);

const resolveColumn = (field: string): SqlColumn | null => COLUMNS.get(field) ?? null;

describe("compilePredicateToSql", () => {
  it("compiles constants", () => {
    expect(compilePredicateToSql(ALWAYS_TRUE, resolveColumn)).toEqual({ sql: "TRUE", params: [] });
  });

  it("binds IN lists and keeps NOT two-valued", () => {
    const predicate = and(inSet("country_code", ["US", "UK"]), not(inSet("country_code", ["SPAM"])));

    expect(compilePredicateToSql(predicate, resolveColumn)).toEqual({
      sql: "(COALESCE(c.code = ANY($1::text[]), FALSE) AND (NOT COALESCE(c.code = ANY($2::text[]), FALSE)))",
      params: [["US", "UK"], ["SPAM"]]
    });
  });

  it("casts integer and timestamp parameters", () => {
    expect(compilePredicateToSql(compare("blog_id", "eq", "7"), resolveColumn)).toEqual({
      sql: "COALESCE(bv.blog_id = $1::bigint, FALSE)",
      params: [7]
    });
    expect(
      compilePredicateToSql(compare("timestamp", "gte", "2024-05-01T02:00:00+02:00"), resolveColumn)
    ).toEqual({
      sql: "COALESCE(bv.timestamp >= $1::timestamptz, FALSE)",
      params: ["2024-05-01T00:00:00.000Z"]
    });
    expect(compilePredicateToSql(compare("date", "lte", "2024-05-03"), resolveColumn)).toEqual({
      sql: "COALESCE(s.date <= $1::date, FALSE)",
      params: ["2024-05-03"]
    });
  });

  it("compiles values that cannot match a column to FALSE", () => {
    expect(compilePredicateToSql(compare("blog_id", "eq", "abc"), resolveColumn)).toEqual({
      sql: "FALSE",
      params: []
    });
    expect(compilePredicateToSql(compare("country_code", "gt", true), resolveColumn)).toEqual({
      sql: "FALSE",
      params: []
    });
  });

  it("compares null with IS NULL", () => {
    expect(compilePredicateToSql(compare("country_code", "eq", null), resolveColumn)).toEqual({
      sql: "(c.code IS NULL)",
      params: []
    });
    expect(compilePredicateToSql(compare("country_code", "neq", null), resolveColumn)).toEqual({
      sql: "(NOT (c.code IS NULL))",
      params: []
    });
  });

  it("escapes LIKE wildcards for contains and startswith", () => {
    expect(compilePredicateToSql(compare("country_code", "contains", "5%_off"), resolveColumn)).toEqual({
      sql: "COALESCE(c.code ILIKE $1 ESCAPE '\\', FALSE)",
      params: ["%5\\%\\_off%"]
    });
    expect(compilePredicateToSql(compare("blog_id", "startswith", 1), resolveColumn)).toEqual({
      sql: "COALESCE(bv.blog_id::text ILIKE $1 ESCAPE '\\', FALSE)",
      params: ["1%"]
    });
  });

  it("orders text by byte value", () => {
    expect(compilePredicateToSql(compare("country_code", "lt", "M"), resolveColumn)).toEqual({
      sql: 'COALESCE(c.code COLLATE "C" < $1, FALSE)',
      params: ["M"]
    });
  });

  it("numbers placeholders from the given offset", () => {
    const predicate = or(compare("country_code", "eq", "US"), compare("blog_id", "gt", 2));

    expect(compilePredicateToSql(predicate, resolveColumn, 3)).toEqual({
      sql: "(COALESCE(c.code = $3, FALSE) OR COALESCE(bv.blog_id > $4::bigint, FALSE))",
      params: ["US", 2]
    });
  });

  it("never inlines caller values", () => {
    const hostile = "US'); DROP TABLE blog_views; --";
    const compiled = compilePredicateToSql(compare("country_code", "eq", hostile), resolveColumn);

    expect(compiled.sql).toBe("COALESCE(c.code = $1, FALSE)");
    expect(compiled.params).toEqual([hostile]);
  });

  it("rejects fields without a column", () => {
    expect(() => compilePredicateToSql(compare("password", "eq", "x"), resolveColumn)).toThrow(
      FieldNotAllowedError
    );
  });
});
