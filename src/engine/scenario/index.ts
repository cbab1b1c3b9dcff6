/**
 * Scenario evaluator — utilisation rescaling of base-case present value.
 */

export type { Scenario, ScenarioEvaluationArgs, ScenarioOutcome, ScenarioResult } from "./types";

export { evaluateScenarios, evaluateScenariosSettled } from "./evaluateScenarios";
