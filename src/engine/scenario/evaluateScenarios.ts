/**
 * Utilisation scenarios over a base-case present value (pure, deterministic).
 * adjustedPV = basePV × utilisationRate; the projection is not re-run, the aggregate PV is rescaled.
 */

import { BlackScholesDomainError } from "@/domain/valuation/valuation.errors";
import { parseMarketParameters, parseScenarios } from "@/domain/valuation/valuation.factory";
import type { MarketParameters } from "@/domain/valuation/valuation.schema";
import { priceRealOption } from "@/engine/realOption";
import { dlog, dwarn } from "@/lib/debug";
import type { Scenario, ScenarioEvaluationArgs, ScenarioOutcome, ScenarioResult } from "./types";

function evaluateOne(basePresentValue: number, market: MarketParameters, scenario: Scenario): ScenarioResult {
  const adjustedPresentValue = basePresentValue * scenario.utilisationRate;
  try {
    const { optionValue } = priceRealOption({ ...market, presentValue: adjustedPresentValue });
    return Object.freeze({
      scenarioName: scenario.name,
      utilisationRate: scenario.utilisationRate,
      adjustedPresentValue,
      optionValue,
    });
  } catch (e) {
    if (e instanceof BlackScholesDomainError) {
      throw new BlackScholesDomainError(
        `scenario "${scenario.name}" (utilisation ${scenario.utilisationRate}, adjusted PV ${adjustedPresentValue}): ${e.detail}`,
        { cause: e, scenarioName: scenario.name }
      );
    }
    throw e;
  }
}

function prepare(args: ScenarioEvaluationArgs): { market: MarketParameters; scenarios: readonly Scenario[] } {
  const market = parseMarketParameters({
    initialInvestment: args.initialInvestment,
    timeToMaturity: args.timeToMaturity,
    discountRate: args.discountRate,
    volatility: args.volatility,
  });
  return { market, scenarios: parseScenarios(args.scenarios) };
}

/**
 * Re-prices the option for every scenario, keyed by scenario name in definition order.
 * One failing scenario aborts the batch.
 * @throws InvalidParameterError for invalid market parameters or scenario records.
 * @throws BlackScholesDomainError with scenarioName set when a scenario's adjusted PV cannot be priced.
 */
export function evaluateScenarios(args: ScenarioEvaluationArgs): ReadonlyMap<string, ScenarioResult> {
  const { market, scenarios } = prepare(args);
  const results = new Map<string, ScenarioResult>();
  for (const scenario of scenarios) {
    results.set(scenario.name, evaluateOne(args.basePresentValue, market, scenario));
  }
  dlog("[scenarios] evaluated", { count: results.size, basePresentValue: args.basePresentValue });
  return results;
}

/**
 * Same as evaluateScenarios but collects a pricing failure per scenario instead of aborting.
 * Validation failures still throw: they apply to the whole batch.
 */
export function evaluateScenariosSettled(args: ScenarioEvaluationArgs): ReadonlyMap<string, ScenarioOutcome> {
  const { market, scenarios } = prepare(args);
  const outcomes = new Map<string, ScenarioOutcome>();
  for (const scenario of scenarios) {
    try {
      outcomes.set(scenario.name, { status: "ok", result: evaluateOne(args.basePresentValue, market, scenario) });
    } catch (e) {
      if (!(e instanceof BlackScholesDomainError)) throw e;
      dwarn("[scenarios] scenario failed", { scenario: scenario.name, message: e.message });
      outcomes.set(scenario.name, { status: "error", scenarioName: scenario.name, error: e });
    }
  }
  return outcomes;
}
