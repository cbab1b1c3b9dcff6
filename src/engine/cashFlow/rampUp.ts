import { RAMP_UP_YEARS } from "@/config/valuationDefaults";

/**
 * Output share in year index t (0-based): linear ramp to full output by year RAMP_UP_YEARS, 1 thereafter.
 * t=0 → 1/3, t=1 → 2/3, t≥2 → 1.
 */
export function rampUpFactor(yearIndex: number): number {
  return Math.min(1, (yearIndex + 1) / RAMP_UP_YEARS);
}
