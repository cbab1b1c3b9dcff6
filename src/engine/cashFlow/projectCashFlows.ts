/**
 * Annual net cash-flow projection (pure, deterministic).
 */

import { MAINTENANCE_COST_RATE } from "@/config/valuationDefaults";
import type { CashFlowLine, CashFlowProjection, ProjectionInputs } from "./types";
import { rampUpFactor } from "./rampUp";

/**
 * Projects one net cash flow per year for timeToMaturity years.
 * net[t] = baseCashFlow * (1 + growthRate)^t * rampUp(t) - initialInvestment * MAINTENANCE_COST_RATE,
 * with decommissioningCost taken off the final year only.
 * Inputs are assumed validated (see parseValuationParameters).
 */
export function projectCashFlows(inputs: ProjectionInputs): CashFlowProjection {
  const { initialInvestment, baseCashFlow, growthRate, timeToMaturity, decommissioningCost } = inputs;
  const maintenanceCost = initialInvestment * MAINTENANCE_COST_RATE;

  const lines: CashFlowLine[] = [];
  for (let t = 0; t < timeToMaturity; t++) {
    const ramp = rampUpFactor(t);
    const grossCashFlow = baseCashFlow * Math.pow(1 + growthRate, t) * ramp;
    lines.push({
      year: t + 1,
      rampUpFactor: ramp,
      grossCashFlow,
      maintenanceCost,
      decommissioningCost: 0,
      netCashFlow: grossCashFlow - maintenanceCost,
    });
  }

  const last = lines[lines.length - 1];
  if (last) {
    last.decommissioningCost = decommissioningCost;
    last.netCashFlow -= decommissioningCost;
  }

  return {
    cashFlows: Object.freeze(lines.map((l) => l.netCashFlow)),
    lines,
  };
}
