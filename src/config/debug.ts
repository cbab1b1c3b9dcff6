/**
 * Debug flags for development. Defaults must be false for production.
 * Engine logging (evaluate, scenarios, sweeps) is gated by DEBUG_VALUATION; set DEBUG_VALUATION=1 to enable.
 */
export const DEBUG_VALUATION = process.env.DEBUG_VALUATION === "1";
