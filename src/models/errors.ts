/**
 * Typed failures raised by the analytics core.
 *
 * Every error carries a `kind` discriminant and a `details` record naming the
 * input that violated a precondition. The core never formats user-facing text;
 * callers map these to messages (see src/api/routes.ts and src/report/).
 */

export type AnalyticsErrorKind =
  | "InsufficientHistory"
  | "EmptyCandidateSet"
  | "DivisionUndefined"
  | "InvalidInput"
  | "ZeroReturnUndefined"
  | "UndefinedExponentiation";

export type ErrorDetails = Record<string, string | number | boolean | null>;

export abstract class AnalyticsError extends Error {
  abstract readonly kind: AnalyticsErrorKind;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails) {
    super(message);
    this.details = details;
  }
}

/**
 * Thrown when a series does not span enough history to derive a statistic.
 */
export class InsufficientHistoryError extends AnalyticsError {
  readonly kind = "InsufficientHistory" as const;

  constructor(input: string, required: number, actual: number, unit: string) {
    super(`${input} needs at least ${required} ${unit}, got ${actual}`, {
      input,
      required,
      actual,
      unit,
    });
    this.name = "InsufficientHistoryError";
  }
}

export class EmptyCandidateSetError extends AnalyticsError {
  readonly kind = "EmptyCandidateSet" as const;

  constructor() {
    super("Cannot rank an empty candidate set", { input: "candidates" });
    this.name = "EmptyCandidateSetError";
  }
}

/**
 * Thrown when a reciprocal or ratio would divide by zero.
 */
export class DivisionUndefinedError extends AnalyticsError {
  readonly kind = "DivisionUndefined" as const;

  constructor(subject: string, field: string) {
    super(`${field} of ${subject} is zero; its reciprocal is undefined`, {
      subject,
      field,
    });
    this.name = "DivisionUndefinedError";
  }
}

export class InvalidInputError extends AnalyticsError {
  readonly kind = "InvalidInput" as const;

  constructor(input: string, constraint: string, value: number | string | null) {
    super(`Invalid ${input}: expected ${constraint}, got ${String(value)}`, {
      input,
      constraint,
      value,
    });
    this.name = "InvalidInputError";
  }
}

export class ZeroReturnUndefinedError extends AnalyticsError {
  readonly kind = "ZeroReturnUndefined" as const;

  constructor() {
    super("annualReturn is 0; the annuity inversion divides by zero", {
      input: "annualReturn",
      value: 0,
    });
    this.name = "ZeroReturnUndefinedError";
  }
}

/**
 * Thrown when a negative growth rate would be raised to a fractional power.
 */
export class UndefinedExponentiationError extends AnalyticsError {
  readonly kind = "UndefinedExponentiation" as const;

  constructor(annualReturn: number, horizonYears: number) {
    super(
      `annualReturn ${annualReturn} is negative and horizonYears ${horizonYears} is not a whole number`,
      { input: "horizonYears", annualReturn, horizonYears }
    );
    this.name = "UndefinedExponentiationError";
  }
}

export function isAnalyticsError(value: unknown): value is AnalyticsError {
  return value instanceof AnalyticsError;
}
