export type { OptionPricing, RealOptionInputs } from "./types";

export { normalCdf } from "./normalCdf";
export { priceRealOption } from "./blackScholes";
