/**
 * Black-Scholes call value of the option to invest (pure, deterministic).
 */

import { BlackScholesDomainError } from "@/domain/valuation/valuation.errors";
import { normalCdf } from "./normalCdf";
import type { OptionPricing, RealOptionInputs } from "./types";

/**
 * d1 = (ln(PV/I) + (r + σ²/2)·T) / (σ·√T), d2 = d1 − σ·√T
 * option = PV·Φ(d1) − I·e^(−rT)·Φ(d2)
 * @throws BlackScholesDomainError when ln or √T has no real answer, or the result is not finite.
 */
export function priceRealOption(inputs: RealOptionInputs): OptionPricing {
  const { presentValue, initialInvestment, timeToMaturity, discountRate, volatility } = inputs;

  if (!Number.isFinite(presentValue) || presentValue <= 0) {
    throw new BlackScholesDomainError(
      `present value must be > 0 to take ln(PV / I) (got ${presentValue}).`
    );
  }
  if (!Number.isFinite(initialInvestment) || initialInvestment <= 0) {
    throw new BlackScholesDomainError(
      `initial investment must be > 0 to take ln(PV / I) (got ${initialInvestment}).`
    );
  }
  if (!Number.isFinite(timeToMaturity) || timeToMaturity <= 0) {
    throw new BlackScholesDomainError(
      `time to maturity must be > 0 for σ·√T (got ${timeToMaturity}).`
    );
  }
  if (!Number.isFinite(volatility) || volatility <= 0) {
    throw new BlackScholesDomainError(`volatility must be > 0 for σ·√T (got ${volatility}).`);
  }

  const volSqrtT = volatility * Math.sqrt(timeToMaturity);
  const d1 =
    (Math.log(presentValue / initialInvestment) +
      (discountRate + 0.5 * volatility * volatility) * timeToMaturity) /
    volSqrtT;
  const d2 = d1 - volSqrtT;

  const optionValue =
    presentValue * normalCdf(d1) -
    initialInvestment * Math.exp(-discountRate * timeToMaturity) * normalCdf(d2);

  if (!Number.isFinite(d1) || !Number.isFinite(optionValue)) {
    throw new BlackScholesDomainError(
      `result is not finite (d1=${d1}, option=${optionValue}).`
    );
  }

  return { optionValue, d1, d2 };
}
