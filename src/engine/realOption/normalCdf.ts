/**
 * Standard normal CDF Φ(x), double precision.
 * Hart (1968) rational approximation as published by G. West, "Better approximations to
 * cumulative normal functions" (2005). Absolute error ~1e-16 over the real line.
 */

const TAIL_CUTOFF = 37;
const RATIONAL_CUTOFF = 7.07106781186547;
const SQRT_2PI = 2.506628274631;

const P = [
  3.52624965998911e-2, 0.700383064443688, 6.37396220353165, 33.912866078383, 112.079291497871,
  221.213596169931, 220.206867912376,
] as const;

const Q = [
  8.83883476483184e-2, 1.75566716318264, 16.064177579207, 86.7807322029461, 296.564248779674,
  637.333633378831, 793.826512519948, 440.413735824752,
] as const;

/** Horner evaluation, highest-order coefficient first. */
function horner(coefficients: readonly number[], x: number): number {
  let acc = 0;
  for (const c of coefficients) acc = acc * x + c;
  return acc;
}

/** Upper tail Q(|x|) = 1 - Φ(|x|). */
function upperTail(absX: number): number {
  if (absX > TAIL_CUTOFF) return 0;
  const exponential = Math.exp((-absX * absX) / 2);
  if (absX < RATIONAL_CUTOFF) {
    return (exponential * horner(P, absX)) / horner(Q, absX);
  }
  // continued fraction for the far tail
  let build = absX + 0.65;
  build = absX + 4 / build;
  build = absX + 3 / build;
  build = absX + 2 / build;
  build = absX + 1 / build;
  return exponential / build / SQRT_2PI;
}

export function normalCdf(x: number): number {
  if (Number.isNaN(x)) return Number.NaN;
  const tail = upperTail(Math.abs(x));
  return x > 0 ? 1 - tail : tail;
}
