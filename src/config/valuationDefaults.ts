import type { ValuationParameters } from "@/domain/valuation/valuation.schema";

/** Share of the capital cost spent on maintenance every year. */
export const MAINTENANCE_COST_RATE = 0.025;

/** Years until the plant reaches full output (linear ramp). */
export const RAMP_UP_YEARS = 3;

/** Reference plant: AUD 8.5bn capex, 25-year horizon. */
export const DEFAULT_VALUATION_PARAMETERS: ValuationParameters = Object.freeze({
  initialInvestment: 8_500_000_000,
  baseCashFlow: 1_200_000_000,
  discountRate: 0.07,
  volatility: 0.25,
  timeToMaturity: 25,
  growthRate: 0.02,
  decommissioningCost: 900_000_000,
});
