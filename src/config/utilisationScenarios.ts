import type { Scenario } from "@/domain/valuation/valuation.schema";

/** Adoption scenarios in reporting order. */
export const UTILISATION_SCENARIOS: readonly Scenario[] = Object.freeze([
  { name: "Low", utilisationRate: 0.1 },
  { name: "Medium", utilisationRate: 0.2 },
  { name: "High", utilisationRate: 0.4 },
  { name: "Optimal", utilisationRate: 0.9 },
]);
