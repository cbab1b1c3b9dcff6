import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_VALUATION_PARAMETERS } from "@/config/valuationDefaults";
import { BlackScholesDomainError, InvalidParameterError } from "@/domain/valuation/valuation.errors";
import type { ValuationParameters } from "@/domain/valuation/valuation.schema";
import { evaluate, computeNpv } from "./evaluate";

const CENT = 0.01;

function within(actual: number, expected: number, tolerance: number, label: string): void {
  assert(Math.abs(actual - expected) <= tolerance, `${label}: expected ≈ ${expected}, got ${actual}`);
}

function rejects(overrides: Partial<ValuationParameters>, parameter: string): void {
  assert.throws(
    () => evaluate({ ...DEFAULT_VALUATION_PARAMETERS, ...overrides }),
    (e: unknown) => e instanceof InvalidParameterError && e.parameter === parameter
  );
}

describe("evaluate", () => {
  it("values the reference plant", () => {
    const result = evaluate(DEFAULT_VALUATION_PARAMETERS);
    within(result.presentValue, 12_999_035_439.48, CENT, "present value");
    within(result.optionValue, 11_600_372_593.65, CENT, "option value");
    within(computeNpv(result.presentValue, DEFAULT_VALUATION_PARAMETERS.initialInvestment), 4_499_035_439.48, CENT, "NPV");
    assert.strictEqual(result.cashFlows.length, 25);
  });

  it("values a short-lived plant", () => {
    const result = evaluate({
      initialInvestment: 1_000_000_000,
      baseCashFlow: 300_000_000,
      discountRate: 0.1,
      volatility: 0.2,
      timeToMaturity: 5,
      growthRate: 0,
      decommissioningCost: 0,
    });
    within(result.presentValue, 778_003_551.6699677, 1e-4, "present value");
    within(result.optionValue, 226_307_774.22396642, 1e-4, "option value");
    assert.deepStrictEqual(
      result.cashFlows.map((v) => Math.round(v)),
      [75_000_000, 175_000_000, 275_000_000, 275_000_000, 275_000_000]
    );
  });

  it("omits debug unless requested", () => {
    assert.strictEqual(evaluate(DEFAULT_VALUATION_PARAMETERS).debug, undefined);
    const { debug, cashFlows } = evaluate(DEFAULT_VALUATION_PARAMETERS, { includeDebug: true });
    assert(debug);
    assert.strictEqual(debug.lines.length, 25);
    assert.strictEqual(debug.discountFactors.length, 25);
    assert.deepStrictEqual(
      debug.lines.map((l) => l.netCashFlow),
      [...cashFlows]
    );
    within(debug.d1, 2.3648471953994035, 1e-9, "d1");
    within(debug.d1 - debug.d2, 0.25 * 5, 1e-12, "d1 − d2");
  });

  it("freezes the result and its debug payload", () => {
    const result = evaluate(DEFAULT_VALUATION_PARAMETERS, { includeDebug: true });
    assert(result.debug);
    assert(Object.isFrozen(result));
    assert(Object.isFrozen(result.cashFlows));
    assert(Object.isFrozen(result.debug));
    assert(Object.isFrozen(result.debug.lines));
    assert(Object.isFrozen(result.debug.discountFactors));
    assert(result.debug.lines.every((l) => Object.isFrozen(l)));
  });

  it("present value falls as the discount rate rises", () => {
    const pvs = [0.03, 0.05, 0.07, 0.09, 0.15].map(
      (discountRate) => evaluate({ ...DEFAULT_VALUATION_PARAMETERS, discountRate }).presentValue
    );
    for (let i = 1; i < pvs.length; i++) assert((pvs[i] ?? NaN) < (pvs[i - 1] ?? NaN), `pv rose at index ${i}`);
  });

  it("option value does not fall as volatility rises", () => {
    const values = [0.05, 0.15, 0.25, 0.5, 0.95].map(
      (volatility) => evaluate({ ...DEFAULT_VALUATION_PARAMETERS, volatility }).optionValue
    );
    for (let i = 1; i < values.length; i++) {
      assert((values[i] ?? NaN) >= (values[i - 1] ?? NaN) - 1e-3, `option fell at index ${i}`);
    }
  });

  it("rejects invalid parameters before computing", () => {
    rejects({ initialInvestment: 0 }, "initialInvestment");
    rejects({ baseCashFlow: -1 }, "baseCashFlow");
    rejects({ discountRate: 1.0 }, "discountRate");
    rejects({ discountRate: 0 }, "discountRate");
    rejects({ volatility: 0 }, "volatility");
    rejects({ volatility: 1 }, "volatility");
    rejects({ timeToMaturity: 0 }, "timeToMaturity");
    rejects({ timeToMaturity: 12.5 }, "timeToMaturity");
    rejects({ decommissioningCost: -5 }, "decommissioningCost");
    rejects({ growthRate: Number.NaN }, "growthRate");
  });

  it("names the violated constraint in the message", () => {
    assert.throws(
      () => evaluate({ ...DEFAULT_VALUATION_PARAMETERS, discountRate: 1.0 }),
      {
        name: "InvalidParameterError",
        message: "Valuation: invalid parameter discountRate (discount rate must be in (0, 1)).",
      }
    );
  });

  it("raises BlackScholesDomainError when the discounted cash flows are not positive", () => {
    assert.throws(
      () => evaluate({ ...DEFAULT_VALUATION_PARAMETERS, baseCashFlow: 1_000_000 }),
      (e: unknown) =>
        e instanceof BlackScholesDomainError &&
        e.message.startsWith("Black-Scholes option pricing failed: present value must be > 0")
    );
  });

  it("is deterministic", () => {
    assert.deepStrictEqual(evaluate(DEFAULT_VALUATION_PARAMETERS), evaluate(DEFAULT_VALUATION_PARAMETERS));
  });
});
