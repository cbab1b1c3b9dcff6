/**
 * Valuation result types (engine outputs; derived, immutable).
 */

/** Net cash flow per year; index 0 is year 1. */
export type CashFlowSeries = readonly number[];

export type CashFlowLine = {
  /** 1-based operating year. */
  year: number;
  rampUpFactor: number;
  grossCashFlow: number;
  maintenanceCost: number;
  /** Non-zero in the final year only. */
  decommissioningCost: number;
  netCashFlow: number;
};

export type OptionPricing = {
  optionValue: number;
  d1: number;
  d2: number;
};

export type ValuationDebug = {
  lines: readonly Readonly<CashFlowLine>[];
  discountFactors: readonly number[];
  d1: number;
  d2: number;
};

export type ValuationResult = {
  presentValue: number;
  optionValue: number;
  cashFlows: CashFlowSeries;
  /** Present only when evaluate() is called with includeDebug. */
  debug?: ValuationDebug;
};

export type ScenarioResult = {
  scenarioName: string;
  utilisationRate: number;
  adjustedPresentValue: number;
  optionValue: number;
};

export type ScenarioOutcome =
  | { status: "ok"; result: ScenarioResult }
  | { status: "error"; scenarioName: string; error: Error };
