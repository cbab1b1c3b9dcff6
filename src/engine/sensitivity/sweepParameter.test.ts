import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_VALUATION_PARAMETERS } from "@/config/valuationDefaults";
import { InvalidParameterError } from "@/domain/valuation/valuation.errors";
import { evaluate } from "@/engine/valuation";
import { sweepParameter } from "./sweepParameter";

describe("sweepParameter", () => {
  it("returns one row per value, in input order", () => {
    const rows = sweepParameter(DEFAULT_VALUATION_PARAMETERS, "discountRate", [0.09, 0.05, 0.07]);
    assert.deepStrictEqual(
      rows.map((r) => r.value),
      [0.09, 0.05, 0.07]
    );
  });

  it("matches evaluate() at the reference point", () => {
    const [row] = sweepParameter(DEFAULT_VALUATION_PARAMETERS, "volatility", [0.25]);
    const base = evaluate(DEFAULT_VALUATION_PARAMETERS);
    assert(row);
    assert.strictEqual(row.presentValue, base.presentValue);
    assert.strictEqual(row.optionValue, base.optionValue);
    assert.strictEqual(row.npv, base.presentValue - 8_500_000_000);
  });

  it("uses the swept capex for NPV", () => {
    const [row] = sweepParameter(DEFAULT_VALUATION_PARAMETERS, "initialInvestment", [6_000_000_000]);
    assert(row);
    assert.strictEqual(row.npv, row.presentValue - 6_000_000_000);
  });

  it("leaves PV unchanged across volatility", () => {
    const pvs = sweepParameter(DEFAULT_VALUATION_PARAMETERS, "volatility", [0.1, 0.3, 0.6]).map((r) => r.presentValue);
    assert.strictEqual(new Set(pvs).size, 1);
  });

  it("propagates validation errors", () => {
    assert.throws(
      () => sweepParameter(DEFAULT_VALUATION_PARAMETERS, "volatility", [0.2, 1.2]),
      (e: unknown) => e instanceof InvalidParameterError && e.parameter === "volatility"
    );
  });
});
