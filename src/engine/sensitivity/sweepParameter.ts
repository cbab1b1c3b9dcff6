/**
 * One-at-a-time sensitivity: re-run evaluate() with a single parameter overridden.
 */

import type { ValuationParameterKey, ValuationParameters } from "@/domain/valuation/valuation.schema";
import { evaluate, computeNpv } from "@/engine/valuation";
import { dlog } from "@/lib/debug";

export type SweepRow = {
  value: number;
  presentValue: number;
  optionValue: number;
  npv: number;
};

/**
 * Rows follow the order of `values`. Errors from evaluate() propagate unchanged.
 */
export function sweepParameter(
  params: ValuationParameters,
  parameter: ValuationParameterKey,
  values: readonly number[]
): SweepRow[] {
  const rows = values.map((value) => {
    const overridden: ValuationParameters = { ...params, [parameter]: value };
    const { presentValue, optionValue } = evaluate(overridden);
    return {
      value,
      presentValue,
      optionValue,
      npv: computeNpv(presentValue, overridden.initialInvestment),
    };
  });
  dlog("[sweep]", { parameter, points: rows.length });
  return rows;
}

