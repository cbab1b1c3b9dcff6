import { DEFAULT_VALUATION_PARAMETERS } from "@/config/valuationDefaults";
import { UTILISATION_SCENARIOS } from "@/config/utilisationScenarios";
import {
  MarketParametersSchema,
  ScenarioListSchema,
  ValuationParametersSchema,
  type MarketParameters,
  type Scenario,
  type ValuationParameters,
} from "./valuation.schema";
import { InvalidParameterError } from "./valuation.errors";

/**
 * Validates raw input into a frozen ValuationParameters record.
 * @throws InvalidParameterError naming every violated constraint.
 */
export function parseValuationParameters(input: unknown): ValuationParameters {
  const parsed = ValuationParametersSchema.safeParse(input);
  if (!parsed.success) throw InvalidParameterError.fromZodIssues(parsed.error.issues);
  return Object.freeze(parsed.data);
}

/** Default plant parameters with optional overrides, validated. */
export function resolveValuationParameters(overrides?: Partial<ValuationParameters>): ValuationParameters {
  return parseValuationParameters({ ...DEFAULT_VALUATION_PARAMETERS, ...overrides });
}

export function parseMarketParameters(input: unknown): MarketParameters {
  const parsed = MarketParametersSchema.safeParse(input);
  if (!parsed.success) throw InvalidParameterError.fromZodIssues(parsed.error.issues);
  return parsed.data;
}

/** Falls back to the standard adoption scenarios when none are given. */
export function parseScenarios(input?: readonly Scenario[]): readonly Scenario[] {
  if (input === undefined) return UTILISATION_SCENARIOS;
  const parsed = ScenarioListSchema.safeParse(input);
  if (!parsed.success) throw InvalidParameterError.fromZodIssues(parsed.error.issues, "scenarios");
  return Object.freeze(parsed.data);
}
