import { describe, it } from "node:test";
import assert from "node:assert";
import { discountCashFlows } from "./presentValue";

describe("discountCashFlows present value", () => {
  it("discounts the first cash flow one full period", () => {
    const pv = discountCashFlows([110, 121], 0.1).presentValue;
    assert(Math.abs(pv - 200) < 1e-9, `pv=${pv}`);
  });

  it("is zero for an empty series", () => {
    assert.strictEqual(discountCashFlows([], 0.07).presentValue, 0);
  });

  it("falls as the discount rate rises", () => {
    const flows = [50, 80, 100, 100, 100];
    const pvs = [0.02, 0.05, 0.07, 0.1, 0.2].map((r) => discountCashFlows(flows, r).presentValue);
    for (let i = 1; i < pvs.length; i++) {
      assert((pvs[i] ?? NaN) < (pvs[i - 1] ?? NaN), `pv should fall at index ${i}`);
    }
  });
});

describe("discountCashFlows", () => {
  it("returns one factor per year, 1/(1+r)^t", () => {
    const { discountFactors } = discountCashFlows([1, 1, 1], 0.25);
    const expected = [0.8, 0.64, 0.512];
    assert.strictEqual(discountFactors.length, 3);
    discountFactors.forEach((f, i) => assert(Math.abs(f - (expected[i] ?? NaN)) < 1e-15, `factor ${i}=${f}`));
  });
});
