import { z } from "zod";

/**
 * Valuation inputs shared by the engine, scenarios and sweeps.
 * Open intervals use gt/lt so 0 and 1 are rejected.
 */

export const CurrencyAmountSchema = z.number().finite();

/** Fraction strictly between 0 and 1 (discount rate, volatility). */
const openUnitInterval = (label: string) =>
  z
    .number()
    .gt(0, `${label} must be in (0, 1)`)
    .lt(1, `${label} must be in (0, 1)`);

export const MarketParametersSchema = z.object({
  initialInvestment: CurrencyAmountSchema.gt(0, "initial investment must be > 0"),
  discountRate: openUnitInterval("discount rate"),
  volatility: openUnitInterval("volatility"),
  /** Whole years; the option horizon and the projection length. */
  timeToMaturity: z
    .number()
    .int("time to maturity must be a whole number of years")
    .gt(0, "time to maturity must be > 0"),
});
export type MarketParameters = z.infer<typeof MarketParametersSchema>;

export const ValuationParametersSchema = MarketParametersSchema.extend({
  baseCashFlow: CurrencyAmountSchema.gt(0, "base cash flow must be > 0"),
  /** Annual growth of the gross cash flow; may be negative. */
  growthRate: z.number().finite("growth rate must be finite"),
  decommissioningCost: CurrencyAmountSchema.min(0, "decommissioning cost must be >= 0"),
});
export type ValuationParameters = Readonly<z.infer<typeof ValuationParametersSchema>>;

/** Numeric inputs that can be swept one at a time. */
export type ValuationParameterKey = keyof ValuationParameters;

/**
 * Utilisation scenario: label + multiplier applied to base-case present value.
 */
export const ScenarioSchema = z.object({
  name: z.string().min(1, "scenario name must not be empty"),
  utilisationRate: z
    .number()
    .gt(0, "utilisation rate must be in (0, 1]")
    .max(1, "utilisation rate must be in (0, 1]"),
});
export type Scenario = Readonly<z.infer<typeof ScenarioSchema>>;

export const ScenarioListSchema = z
  .array(ScenarioSchema)
  .min(1, "at least one scenario is required")
  .superRefine((scenarios, ctx) => {
    const seen = new Set<string>();
    scenarios.forEach((s, i) => {
      if (seen.has(s.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "name"],
          message: `scenario name "${s.name}" must be unique`,
        });
      }
      seen.add(s.name);
    });
  });
