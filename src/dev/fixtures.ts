/**
 * Dev-only fixtures for Engine Health checks.
 * Deterministic parameter sets — same every run.
 */

import { DEFAULT_VALUATION_PARAMETERS } from "@/config/valuationDefaults";
import type { ValuationParameters } from "@/domain/valuation/valuation.schema";

export type ValuationFixture = {
  id: string;
  params: ValuationParameters;
};

function f(id: string, overrides: Partial<ValuationParameters>): ValuationFixture {
  return { id, params: Object.freeze({ ...DEFAULT_VALUATION_PARAMETERS, ...overrides }) };
}

/**
 * Valid plants whose every net cash flow is positive, so PV and option value are defined.
 * Used for invariant checks (no hard-coded numbers).
 */
export const baselineFixtures: ValuationFixture[] = [
  f("reference", {}),
  f("small-modular", {
    initialInvestment: 2_000_000_000,
    baseCashFlow: 400_000_000,
    discountRate: 0.06,
    volatility: 0.3,
    timeToMaturity: 30,
    growthRate: 0.015,
    decommissioningCost: 200_000_000,
  }),
  f("short-life", {
    initialInvestment: 1_000_000_000,
    baseCashFlow: 300_000_000,
    discountRate: 0.1,
    volatility: 0.2,
    timeToMaturity: 5,
    growthRate: 0,
    decommissioningCost: 0,
  }),
  f("declining-revenue", {
    initialInvestment: 5_000_000_000,
    baseCashFlow: 900_000_000,
    discountRate: 0.08,
    volatility: 0.35,
    timeToMaturity: 20,
    growthRate: -0.01,
    decommissioningCost: 500_000_000,
  }),
];

/** Valid inputs whose discounted cash flows are negative: pricing must fail, not return 0. */
export const underwaterFixture: ValuationFixture = f("underwater", { baseCashFlow: 1_000_000 });

/** Each entry breaks exactly one constraint. */
export const invalidFixtures: Array<{ parameter: keyof ValuationParameters; params: ValuationParameters }> = [
  { parameter: "initialInvestment", params: { ...DEFAULT_VALUATION_PARAMETERS, initialInvestment: 0 } },
  { parameter: "baseCashFlow", params: { ...DEFAULT_VALUATION_PARAMETERS, baseCashFlow: -1 } },
  { parameter: "discountRate", params: { ...DEFAULT_VALUATION_PARAMETERS, discountRate: 1 } },
  { parameter: "volatility", params: { ...DEFAULT_VALUATION_PARAMETERS, volatility: 0 } },
  { parameter: "timeToMaturity", params: { ...DEFAULT_VALUATION_PARAMETERS, timeToMaturity: 2.5 } },
  { parameter: "decommissioningCost", params: { ...DEFAULT_VALUATION_PARAMETERS, decommissioningCost: -1 } },
];
