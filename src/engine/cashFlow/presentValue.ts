import type { CashFlowSeries, DiscountedCashFlows } from "./types";

/**
 * End-of-year discounting: cashFlows[0] is year 1 and is discounted one full period.
 * PV = Σ cf[t-1] / (1 + r)^t for t = 1..N.
 */
export function discountCashFlows(cashFlows: CashFlowSeries, discountRate: number): DiscountedCashFlows {
  const discountFactors: number[] = [];
  let presentValue = 0;
  for (let t = 1; t <= cashFlows.length; t++) {
    const growth = Math.pow(1 + discountRate, t);
    discountFactors.push(1 / growth);
    presentValue += (cashFlows[t - 1] ?? 0) / growth;
  }
  return { presentValue, discountFactors };
}
