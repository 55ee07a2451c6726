import { describe, expect, it } from "vitest";

import {
  AnalyticsValidationError,
  ExpressionTooDeepError,
  FieldNotAllowedError,
  UnsupportedOperatorError
} from "./errors";
import {
  buildExpressionPredicate,
  canonicalizeFilterExpression,
  parseFilterExpression,
  type FilterExpression
} from "./filter_expression";
import { ALWAYS_FALSE, ALWAYS_TRUE, FILTER_OPERATORS, evaluatePredicate } from "./predicate";
import { RAW_EVENT_ALLOWED_FIELDS, readPageViewField, resolveRawEventField } from "./sources/fields";
import type { PageViewRecord } from "./types";

const view = (overrides: Partial<PageViewRecord> = {}): PageViewRecord => ({
  id: 1,
  blog_id: 10,
  blog_title: "Hello World",
  author_username: "alice",
  country_code: "US",
  viewer_id: null,
  ip_address: null,
  timestamp: new Date("2024-05-01T12:00:00.000Z"),
  ...overrides
});

const matches = (payload: unknown, record: PageViewRecord): boolean => {
  const predicate = buildExpressionPredicate(
    parseFilterExpression(payload),
    RAW_EVENT_ALLOWED_FIELDS
  );
  return evaluatePredicate(predicate, record, readPageViewField);
};

const nest = (levels: number): unknown => {
  let node: unknown = { field: "country_code", op: "eq", value: "US" };
  for (let level = 0; level < levels; level += 1) {
    node = { operator: "and", conditions: [node] };
  }
  return node;
};

describe("parseFilterExpression", () => {
  it("treats an absent payload as the empty AND group", () => {
    const empty: FilterExpression = { kind: "group", combinator: "and", children: [] };
    expect(parseFilterExpression(undefined)).toEqual(empty);
    expect(parseFilterExpression(null)).toEqual(empty);
    expect(parseFilterExpression({})).toEqual(empty);
  });

  it("defaults the combinator to and and the operator to eq", () => {
    expect(parseFilterExpression({ conditions: [{ field: "country_code", value: "US" }] })).toEqual({
      kind: "group",
      combinator: "and",
      children: [{ kind: "leaf", field: "country_code", operator: "eq", value: "US" }]
    });
  });

  it("rejects conditions that are not a list", () => {
    expect(() => parseFilterExpression({ operator: "and", conditions: "nope" })).toThrow(
      AnalyticsValidationError
    );
  });

  it("rejects a leaf without a field", () => {
    try {
      parseFilterExpression({ conditions: [{ op: "eq", value: 1 }] });
      throw new Error("expected parse to fail");
    } catch (error) {
      expect(error).toBeInstanceOf(AnalyticsValidationError);
      expect(error instanceof AnalyticsValidationError ? error.issues : []).toEqual([
        { field: "filter.conditions[0].field", message: "Condition missing 'field'." }
      ]);
    }
  });

  it("rejects non-scalar values and unknown combinators", () => {
    expect(() =>
      parseFilterExpression({ conditions: [{ field: "country_code", value: ["US"] }] })
    ).toThrow(AnalyticsValidationError);
    expect(() => parseFilterExpression({ operator: "xor", conditions: [] })).toThrow(
      AnalyticsValidationError
    );
  });

  it("rejects unknown leaf operators", () => {
    expect(() =>
      parseFilterExpression({ conditions: [{ field: "country_code", op: "regex", value: ".*" }] })
    ).toThrow(UnsupportedOperatorError);
  });

  it("caps nesting depth", () => {
    expect(() => parseFilterExpression(nest(2), { maxDepth: 3 })).not.toThrow();
    expect(() => parseFilterExpression(nest(3), { maxDepth: 3 })).toThrow(ExpressionTooDeepError);
  });

  it("reads the default depth cap from ANALYTICS_FILTER_MAX_DEPTH", () => {
    const previous = process.env.ANALYTICS_FILTER_MAX_DEPTH;
    process.env.ANALYTICS_FILTER_MAX_DEPTH = "4";
    try {
      expect(() => parseFilterExpression(nest(3))).not.toThrow();
      expect(() => parseFilterExpression(nest(4))).toThrow(ExpressionTooDeepError);
    } finally {
      if (previous === undefined) {
        delete process.env.ANALYTICS_FILTER_MAX_DEPTH;
      } else {
        process.env.ANALYTICS_FILTER_MAX_DEPTH = previous;
      }
    }
  });
});

describe("buildExpressionPredicate", () => {
  it("combines conditions with and, or and not", () => {
    const payload = {
      operator: "or",
      conditions: [
        { field: "country_code", op: "eq", value: "UK" },
        {
          operator: "not",
          conditions: [{ field: "blog.author.username", op: "startswith", value: "AL" }]
        }
      ]
    };

    expect(matches(payload, view())).toBe(false);
    expect(matches(payload, view({ country_code: "UK" }))).toBe(true);
    expect(matches(payload, view({ author_username: "bob" }))).toBe(true);
  });

  it("treats not as the negation of the conjunction of its children", () => {
    const payload = {
      operator: "not",
      conditions: [
        { field: "country_code", value: "US" },
        { field: "blog_id", op: "gt", value: 5 }
      ]
    };

    expect(matches(payload, view())).toBe(false);
    expect(matches(payload, view({ blog_id: 2 }))).toBe(true);
    expect(matches(payload, view({ country_code: "UK" }))).toBe(true);
  });

  it("maps empty groups to constants", () => {
    const build = (combinator: string) =>
      buildExpressionPredicate(
        parseFilterExpression({ operator: combinator, conditions: [] }),
        RAW_EVENT_ALLOWED_FIELDS
      );

    expect(build("and")).toEqual(ALWAYS_TRUE);
    expect(build("or")).toEqual(ALWAYS_TRUE);
    expect(build("not")).toEqual(ALWAYS_FALSE);
  });

  it("evaluates neq and contains", () => {
    expect(matches({ conditions: [{ field: "country_code", op: "neq", value: "US" }] }, view())).toBe(
      false
    );
    expect(
      matches({ conditions: [{ field: "blog.title", op: "contains", value: "WORLD" }] }, view())
    ).toBe(true);
  });

  it("rejects fields outside the allow-list for every operator", () => {
    for (const operator of FILTER_OPERATORS) {
      const expression = parseFilterExpression({
        conditions: [{ field: "password", op: operator, value: "x" }]
      });
      expect(() => buildExpressionPredicate(expression, RAW_EVENT_ALLOWED_FIELDS)).toThrow(
        FieldNotAllowedError
      );
    }
  });

  it("accepts dotted paths through their first segment", () => {
    const expression = parseFilterExpression({
      conditions: [{ field: "country.code", value: "US" }]
    });

    expect(() => buildExpressionPredicate(expression, ["country"])).not.toThrow();
    expect(() => buildExpressionPredicate(expression, ["blog"])).toThrow(FieldNotAllowedError);
  });

  it("rejects dotted paths the field resolver does not know", () => {
    const expression = parseFilterExpression({
      operator: "and",
      conditions: [
        { field: "country_code", value: "US" },
        { field: "country_code.secret", value: "x" }
      ]
    });

    expect(() => buildExpressionPredicate(expression, RAW_EVENT_ALLOWED_FIELDS)).not.toThrow();
    expect(() =>
      buildExpressionPredicate(expression, RAW_EVENT_ALLOWED_FIELDS, resolveRawEventField)
    ).toThrow(FieldNotAllowedError);
  });
});

describe("canonicalizeFilterExpression", () => {
  it("produces the same form regardless of child order", () => {
    const first = parseFilterExpression({
      operator: "or",
      conditions: [
        { field: "country_code", value: "US" },
        { operator: "and", conditions: [{ field: "blog_id", value: 2 }, { field: "blog_id", value: 1 }] }
      ]
    });
    const second = parseFilterExpression({
      operator: "or",
      conditions: [
        { operator: "and", conditions: [{ field: "blog_id", value: 1 }, { field: "blog_id", value: 2 }] },
        { field: "country_code", value: "US" }
      ]
    });

    expect(canonicalizeFilterExpression(first)).toEqual(canonicalizeFilterExpression(second));
  });
});
