/**
 * Cash-flow engine — projection and discounting.
 */

export type { CashFlowLine, CashFlowSeries, CashFlowProjection, DiscountedCashFlows, ProjectionInputs } from "./types";

export { rampUpFactor } from "./rampUp";
export { projectCashFlows } from "./projectCashFlows";
export { discountCashFlows } from "./presentValue";
