/**
 * Text report: base case then one block per scenario, each with present value, option value and NPV.
 */

import type { ScenarioResult, ValuationResult } from "@/domain/valuation/valuation.types";
import { computeNpv } from "@/engine/valuation";
import { formatAud, formatPercent } from "./formatCurrency";

export type ValuationReportBlock = {
  title: string;
  presentValue: number;
  optionValue: number;
  npv: number;
};

function block(title: string, presentValue: number, optionValue: number, initialInvestment: number): ValuationReportBlock {
  return { title, presentValue, optionValue, npv: computeNpv(presentValue, initialInvestment) };
}

/** Numbers behind the report, in print order. */
export function buildReportBlocks(
  base: ValuationResult,
  scenarios: ReadonlyMap<string, ScenarioResult>,
  initialInvestment: number
): ValuationReportBlock[] {
  const blocks = [block("Base case", base.presentValue, base.optionValue, initialInvestment)];
  for (const s of scenarios.values()) {
    blocks.push(
      block(
        `${s.scenarioName} adoption (${formatPercent(s.utilisationRate)} utilisation)`,
        s.adjustedPresentValue,
        s.optionValue,
        initialInvestment
      )
    );
  }
  return blocks;
}

export function buildValuationReport(
  base: ValuationResult,
  scenarios: ReadonlyMap<string, ScenarioResult>,
  initialInvestment: number
): string[] {
  const lines: string[] = [];
  for (const b of buildReportBlocks(base, scenarios, initialInvestment)) {
    lines.push(
      b.title,
      `  Present value: ${formatAud(b.presentValue)}`,
      `  Option value:  ${formatAud(b.optionValue)}`,
      `  NPV:           ${formatAud(b.npv)}`
    );
  }
  return lines;
}
