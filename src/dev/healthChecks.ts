/**
 * Dev-only Engine Health check registry.
 * Grouped by: Cash Flow Projection, Discounting, Option Pricing, Scenario Scaling, Error Handling.
 * Deterministic invariants only; no hard-coded expected numbers.
 */

import { MAINTENANCE_COST_RATE } from "@/config/valuationDefaults";
import { UTILISATION_SCENARIOS } from "@/config/utilisationScenarios";
import { BlackScholesDomainError, InvalidParameterError } from "@/domain/valuation/valuation.errors";
import { projectCashFlows, rampUpFactor } from "@/engine/cashFlow";
import { normalCdf } from "@/engine/realOption";
import { evaluate } from "@/engine/valuation";
import { evaluateScenarios } from "@/engine/scenario";
import { sweepParameter } from "@/engine/sensitivity";
import { baselineFixtures, invalidFixtures, underwaterFixture } from "@/dev/fixtures";
import { allEqual, approxEqual, isNonDecreasing, isStrictlyDecreasing, noNaNOrInfinity } from "@/dev/invariants";

const DISCOUNT_RATE_SWEEP = [0.03, 0.05, 0.07, 0.09, 0.12];
const VOLATILITY_SWEEP = [0.05, 0.1, 0.2, 0.3, 0.45, 0.6, 0.9];

export type CheckStatus = "pass" | "warn" | "fail";

export type CheckResult = {
  status: CheckStatus;
  message: string;
  details?: unknown;
};

export type CheckGroup =
  | "Cash Flow Projection"
  | "Discounting"
  | "Option Pricing"
  | "Scenario Scaling"
  | "Error Handling";

export type GroupedCheck = {
  group: CheckGroup;
  name: string;
  run: () => CheckResult;
};

function fromErrors(errors: string[], passMessage: string): CheckResult {
  if (errors.length > 0) return { status: "fail", message: errors.join("; "), details: { errors } };
  return { status: "pass", message: passMessage };
}

export const groupedHealthChecks: GroupedCheck[] = [
  // ---------- Cash Flow Projection ----------
  {
    group: "Cash Flow Projection",
    name: "Series length equals time to maturity",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const { cashFlows } = projectCashFlows(params);
        if (cashFlows.length !== params.timeToMaturity)
          errors.push(`${id}: length ${cashFlows.length} !== ${params.timeToMaturity}`);
        if (!noNaNOrInfinity(cashFlows)) errors.push(`${id}: non-finite cash flow`);
      }
      return fromErrors(errors, "one finite cash flow per year");
    },
  },
  {
    group: "Cash Flow Projection",
    name: "Ramp-up reaches full output in year 3",
    run: () => {
      const factors = [0, 1, 2, 3, 10].map(rampUpFactor);
      const expected = [1 / 3, 2 / 3, 1, 1, 1];
      const pass = factors.every((v, i) => v === expected[i]);
      return pass
        ? { status: "pass", message: "1/3, 2/3, then 1" }
        : { status: "fail", message: "ramp-up factors off", details: { factors, expected } };
    },
  },
  {
    group: "Cash Flow Projection",
    name: "Maintenance constant at 2.5% of capex",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const costs = projectCashFlows(params).lines.map((l) => l.maintenanceCost);
        if (!allEqual(costs)) errors.push(`${id}: maintenance varies by year`);
        if (costs[0] !== params.initialInvestment * MAINTENANCE_COST_RATE) errors.push(`${id}: maintenance rate off`);
      }
      return fromErrors(errors, "maintenance = initialInvestment × 0.025 every year");
    },
  },
  {
    group: "Cash Flow Projection",
    name: "Decommissioning only hits the final year",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const withCost = projectCashFlows(params).cashFlows;
        const without = projectCashFlows({ ...params, decommissioningCost: 0 }).cashFlows;
        const last = withCost.length - 1;
        for (let i = 0; i < last; i++) {
          if (withCost[i] !== without[i]) errors.push(`${id}: year ${i + 1} changed`);
        }
        const diff = (without[last] ?? 0) - (withCost[last] ?? 0);
        if (!approxEqual(diff, params.decommissioningCost)) errors.push(`${id}: final-year delta ${diff}`);
      }
      return fromErrors(errors, "only the last element differs, by decommissioningCost");
    },
  },
  // ---------- Discounting ----------
  {
    group: "Discounting",
    name: "PV strictly decreasing in discount rate",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const pvs = sweepParameter(params, "discountRate", DISCOUNT_RATE_SWEEP).map((r) => r.presentValue);
        if (!isStrictlyDecreasing(pvs)) errors.push(`${id}: ${pvs.join(", ")}`);
      }
      return fromErrors(errors, "higher discount rate ⇒ lower PV");
    },
  },
  // ---------- Option Pricing ----------
  {
    group: "Option Pricing",
    name: "Φ symmetric around 0",
    run: () => {
      const xs = [0, 0.5, 1, 1.96, 3, 8, 40];
      const bad = xs.filter((x) => !approxEqual(normalCdf(x) + normalCdf(-x), 1, 1e-15));
      if (normalCdf(0) !== 0.5) bad.push(0);
      return bad.length === 0
        ? { status: "pass", message: "Φ(x) + Φ(−x) = 1, Φ(0) = 0.5" }
        : { status: "fail", message: `asymmetric at ${bad.join(", ")}` };
    },
  },
  {
    group: "Option Pricing",
    name: "Option value non-decreasing in volatility",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const values = sweepParameter(params, "volatility", VOLATILITY_SWEEP).map((r) => r.optionValue);
        if (!isNonDecreasing(values, 1e-3)) errors.push(`${id}: ${values.join(", ")}`);
      }
      return fromErrors(errors, "higher volatility ⇒ option value does not fall");
    },
  },
  {
    group: "Option Pricing",
    name: "Option value within no-arbitrage bounds",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const { presentValue, optionValue } = evaluate(params);
        const floor = Math.max(
          0,
          presentValue - params.initialInvestment * Math.exp(-params.discountRate * params.timeToMaturity)
        );
        if (optionValue < floor - 1e-3) errors.push(`${id}: option ${optionValue} < floor ${floor}`);
        if (optionValue > presentValue + 1e-3) errors.push(`${id}: option ${optionValue} > PV ${presentValue}`);
      }
      return fromErrors(errors, "max(0, PV − I·e^(−rT)) ≤ option ≤ PV");
    },
  },
  // ---------- Scenario Scaling ----------
  {
    group: "Scenario Scaling",
    name: "Adjusted PV = base PV × utilisation, in definition order",
    run: () => {
      const errors: string[] = [];
      for (const { id, params } of baselineFixtures) {
        const base = evaluate(params);
        const results = evaluateScenarios({ ...params, basePresentValue: base.presentValue });
        const names = [...results.keys()];
        if (names.join() !== UTILISATION_SCENARIOS.map((s) => s.name).join())
          errors.push(`${id}: order ${names.join(", ")}`);
        for (const s of UTILISATION_SCENARIOS) {
          const r = results.get(s.name);
          if (!r || r.adjustedPresentValue !== base.presentValue * s.utilisationRate)
            errors.push(`${id}/${s.name}: adjusted PV off`);
        }
      }
      return fromErrors(errors, "linear rescale, order preserved");
    },
  },
  // ---------- Error Handling ----------
  {
    group: "Error Handling",
    name: "Invalid parameters rejected before computation",
    run: () => {
      const errors: string[] = [];
      for (const { parameter, params } of invalidFixtures) {
        try {
          evaluate(params);
          errors.push(`${parameter}: accepted`);
        } catch (e) {
          if (!(e instanceof InvalidParameterError) || e.parameter !== parameter)
            errors.push(`${parameter}: wrong error ${e instanceof Error ? e.name : String(e)}`);
        }
      }
      return fromErrors(errors, "InvalidParameterError names the violated parameter");
    },
  },
  {
    group: "Error Handling",
    name: "Non-positive PV fails option pricing",
    run: () => {
      try {
        const result = evaluate(underwaterFixture.params);
        return { status: "fail", message: "underwater plant was priced", details: result };
      } catch (e) {
        if (e instanceof BlackScholesDomainError) return { status: "pass", message: "BlackScholesDomainError raised" };
        return { status: "fail", message: `wrong error: ${e instanceof Error ? e.message : String(e)}` };
      }
    },
  },
];

export type RunResult = {
  results: Array<{ group: CheckGroup; name: string; status: CheckStatus; message: string; details?: unknown }>;
  durationMs: number;
};

export function runAllChecks(): RunResult {
  const start = performance.now();
  const results = groupedHealthChecks.map((c) => ({
    group: c.group,
    name: c.name,
    ...c.run(),
  }));
  const durationMs = performance.now() - start;
  return { results, durationMs };
}
