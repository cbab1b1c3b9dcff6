/**
 * Cash-flow engine — types.
 */

import type { CashFlowLine, CashFlowSeries } from "@/domain/valuation/valuation.types";

export type { CashFlowLine, CashFlowSeries };

/** Inputs consumed by the projection (subset of ValuationParameters). */
export type ProjectionInputs = {
  initialInvestment: number;
  baseCashFlow: number;
  growthRate: number;
  timeToMaturity: number;
  decommissioningCost: number;
};

/** Result of projectCashFlows. */
export type CashFlowProjection = {
  cashFlows: CashFlowSeries;
  lines: CashFlowLine[];
};

export type DiscountedCashFlows = {
  presentValue: number;
  discountFactors: number[];
};
