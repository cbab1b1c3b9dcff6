/**
 * Cash-flow & valuation engine: projection → present value → option value.
 */

import { parseValuationParameters } from "@/domain/valuation/valuation.factory";
import type { ValuationParameters } from "@/domain/valuation/valuation.schema";
import type { OptionPricing, ValuationResult } from "@/domain/valuation/valuation.types";
import { projectCashFlows, discountCashFlows } from "@/engine/cashFlow";
import { priceRealOption } from "@/engine/realOption";
import { dlog, derr } from "@/lib/debug";

/**
 * Values the plant for one parameter set.
 * When options.includeDebug is true, result.debug carries the per-year lines, discount factors and d1/d2.
 * @throws InvalidParameterError before any computation when params fail validation.
 * @throws BlackScholesDomainError when the discounted cash flows are not positive.
 */
export function evaluate(
  params: ValuationParameters,
  options?: { includeDebug?: boolean }
): ValuationResult {
  const p = parseValuationParameters(params);

  const { cashFlows, lines } = projectCashFlows(p);
  const { presentValue, discountFactors } = discountCashFlows(cashFlows, p.discountRate);

  let pricing: OptionPricing;
  try {
    pricing = priceRealOption({
      presentValue,
      initialInvestment: p.initialInvestment,
      timeToMaturity: p.timeToMaturity,
      discountRate: p.discountRate,
      volatility: p.volatility,
    });
  } catch (e) {
    derr("[valuation] option pricing failed", { presentValue, error: e });
    throw e;
  }

  dlog("[valuation] evaluated", {
    years: cashFlows.length,
    presentValue,
    optionValue: pricing.optionValue,
  });

  const result: ValuationResult = {
    presentValue,
    optionValue: pricing.optionValue,
    cashFlows,
  };

  if (options?.includeDebug) {
    result.debug = Object.freeze({
      lines: Object.freeze(lines.map((l) => Object.freeze(l))),
      discountFactors: Object.freeze(discountFactors),
      d1: pricing.d1,
      d2: pricing.d2,
    });
  }

  return Object.freeze(result);
}

/** NPV = present value − initial investment (same convention for base case and scenarios). */
export function computeNpv(presentValue: number, initialInvestment: number): number {
  return presentValue - initialInvestment;
}
