/**
 * Scenario evaluator — types.
 */

import type { Scenario } from "@/domain/valuation/valuation.schema";
import type { ScenarioOutcome, ScenarioResult } from "@/domain/valuation/valuation.types";

export type { Scenario, ScenarioOutcome, ScenarioResult };

export type ScenarioEvaluationArgs = {
  /** Base-case present value from evaluate(). */
  basePresentValue: number;
  initialInvestment: number;
  timeToMaturity: number;
  discountRate: number;
  volatility: number;
  /** Defaults to UTILISATION_SCENARIOS (Low, Medium, High, Optimal). */
  scenarios?: readonly Scenario[];
};
