import type { ValidationIssue } from "./types";

export type AnalyticsErrorCode =
  | "validation_error"
  | "field_not_allowed"
  | "unsupported_operator"
  | "expression_too_deep"
  | "invalid_dimension";

export class AnalyticsError extends Error {
  code: AnalyticsErrorCode;
  status: number;

  constructor(code: AnalyticsErrorCode, status: number, message: string) {
    super(message);
    this.name = "AnalyticsError";
    this.code = code;
    this.status = status;
  }
}

export class AnalyticsValidationError extends AnalyticsError {
  issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    super("validation_error", 400, `Invalid analytics request: ${summary}`);
    this.name = "AnalyticsValidationError";
    this.issues = issues;
  }
}

export class FieldNotAllowedError extends AnalyticsError {
  field: string;

  constructor(field: string) {
    super("field_not_allowed", 400, `Filtering by field '${field}' is not allowed.`);
    this.name = "FieldNotAllowedError";
    this.field = field;
  }
}

export class UnsupportedOperatorError extends AnalyticsError {
  operator: string;

  constructor(operator: string) {
    super("unsupported_operator", 400, `Operator '${operator}' is not supported.`);
    this.name = "UnsupportedOperatorError";
    this.operator = operator;
  }
}

export class ExpressionTooDeepError extends AnalyticsError {
  maxDepth: number;

  constructor(maxDepth: number) {
    super("expression_too_deep", 400, `Filter expression nests deeper than ${maxDepth} levels.`);
    this.name = "ExpressionTooDeepError";
    this.maxDepth = maxDepth;
  }
}

/** Planner asked a source for a grouping it cannot serve: a bug, not bad input. */
export class InvalidDimensionError extends AnalyticsError {
  dimension: string;

  constructor(dimension: string, source: string) {
    super("invalid_dimension", 500, `Dimension '${dimension}' is not supported by ${source}.`);
    this.name = "InvalidDimensionError";
    this.dimension = dimension;
  }
}

export const isAnalyticsError = (value: unknown): value is AnalyticsError => {
  return value instanceof AnalyticsError;
};
