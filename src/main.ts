/**
 * Values the reference plant and its adoption scenarios, then prints the report.
 * Run from repo root: npx tsx src/main.ts
 */

import { resolveValuationParameters } from "@/domain/valuation/valuation.factory";
import { evaluate } from "@/engine/valuation";
import { evaluateScenarios } from "@/engine/scenario";
import { buildValuationReport } from "@/lib/valuationReport";

function run(): number {
  const params = resolveValuationParameters();
  try {
    const base = evaluate(params);
    const scenarios = evaluateScenarios({
      basePresentValue: base.presentValue,
      initialInvestment: params.initialInvestment,
      timeToMaturity: params.timeToMaturity,
      discountRate: params.discountRate,
      volatility: params.volatility,
    });
    for (const line of buildValuationReport(base, scenarios, params.initialInvestment)) console.log(line);
    return 0;
  } catch (e) {
    console.error("[report] FAIL:", e instanceof Error ? e.message : e);
    return 1;
  }
}

process.exit(run());
