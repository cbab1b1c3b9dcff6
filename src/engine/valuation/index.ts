/**
 * Valuation engine — pure deterministic functions.
 */

export type { ValuationResult, ValuationDebug } from "@/domain/valuation/valuation.types";

export { evaluate, computeNpv } from "./evaluate";
