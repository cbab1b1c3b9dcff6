import { DEBUG_VALUATION } from "@/config/debug";

export const isDev = () => process.env.NODE_ENV !== "production";

/** Engine logging is on only outside production and when DEBUG_VALUATION is set. */
export const isEngineLogEnabled = () => isDev() && DEBUG_VALUATION;

export const dlog = (...args: unknown[]) => {
  if (isEngineLogEnabled()) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (isEngineLogEnabled()) console.warn(...args);
};

export const derr = (...args: unknown[]) => {
  if (isEngineLogEnabled()) console.error(...args);
};
