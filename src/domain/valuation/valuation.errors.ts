import type { ZodIssue } from "zod";

export type ParameterViolation = {
  parameter: string;
  constraint: string;
};

/**
 * Input rejected before any computation. `parameter` is the first violated key;
 * `violations` lists every failed constraint.
 */
export class InvalidParameterError extends Error {
  readonly parameter: string;
  readonly violations: ParameterViolation[];

  constructor(violations: ParameterViolation[]) {
    const first = violations[0] ?? { parameter: "unknown", constraint: "invalid input" };
    super(
      `Valuation: invalid parameter ${first.parameter} (${first.constraint}).` +
        (violations.length > 1 ? ` ${violations.length - 1} more violation(s).` : "")
    );
    this.name = "InvalidParameterError";
    this.parameter = first.parameter;
    this.violations = violations;
  }

  static fromZodIssues(issues: ZodIssue[], prefix?: string): InvalidParameterError {
    return new InvalidParameterError(
      issues.map((issue) => {
        const path = issue.path.join(".");
        const parameter = prefix ? (path ? `${prefix}.${path}` : prefix) : path || "input";
        return { parameter, constraint: issue.message };
      })
    );
  }
}

/**
 * Option pricing could not be evaluated (ln of a non-positive ratio, zero horizon, non-finite result).
 * Distinct from InvalidParameterError: inputs passed validation but the pricing step has no answer.
 */
export class BlackScholesDomainError extends Error {
  /** Reason without the "Black-Scholes option pricing failed:" prefix. */
  readonly detail: string;
  readonly scenarioName?: string;

  constructor(detail: string, options?: { cause?: unknown; scenarioName?: string }) {
    super(`Black-Scholes option pricing failed: ${detail}`, { cause: options?.cause });
    this.name = "BlackScholesDomainError";
    this.detail = detail;
    this.scenarioName = options?.scenarioName;
  }
}
