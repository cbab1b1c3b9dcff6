/**
 * Dev-only shared invariant helpers for Engine Health.
 * Deterministic predicates and tolerances — no side effects.
 */

/** Relative tolerance for currency comparisons at the 1e10 scale. */
export const REL_TOLERANCE = 1e-9;

export function approxEqual(a: number, b: number, relTolerance = REL_TOLERANCE): boolean {
  return Math.abs(a - b) <= relTolerance * Math.max(1, Math.abs(a), Math.abs(b));
}

export function noNaNOrInfinity(arr: readonly number[]): boolean {
  return arr.every((v) => Number.isFinite(v));
}

export function allEqual(arr: readonly number[]): boolean {
  return arr.every((v) => v === arr[0]);
}

/** Each value >= the previous one, allowing `tolerance` of slack. */
export function isNonDecreasing(series: readonly number[], tolerance = 0): boolean {
  return series.every((v, i) => i === 0 || v >= (series[i - 1] ?? v) - tolerance);
}

export function isStrictlyDecreasing(series: readonly number[]): boolean {
  return series.every((v, i) => i === 0 || v < (series[i - 1] ?? Number.POSITIVE_INFINITY));
}
