/**
 * Real-option pricing — types.
 */

import type { OptionPricing } from "@/domain/valuation/valuation.types";

export type { OptionPricing };

/**
 * Call-option analogue of an investment decision.
 * presentValue is the underlying, initialInvestment the strike; discountRate doubles as the risk-free rate.
 */
export type RealOptionInputs = {
  presentValue: number;
  initialInvestment: number;
  timeToMaturity: number;
  discountRate: number;
  volatility: number;
};
