import { describe, it } from "node:test";
import assert from "node:assert";
import { normalCdf } from "./normalCdf";

function close(actual: number, expected: number, tolerance = 1e-14): void {
  assert(Math.abs(actual - expected) <= tolerance, `expected ≈ ${expected}, got ${actual}`);
}

describe("normalCdf", () => {
  it("is exactly one half at zero", () => {
    assert.strictEqual(normalCdf(0), 0.5);
  });

  it("matches reference values near the centre", () => {
    close(normalCdf(1.96), 0.9750021048517795);
    close(normalCdf(-1), 0.15865525393145707);
    close(normalCdf(0.5), 0.6914624612740131);
    close(normalCdf(-3), 0.0013498980316300957);
  });

  it("is accurate in the tails", () => {
    close(normalCdf(6), 0.9999999990134123);
    assert.strictEqual(normalCdf(40), 1);
    assert.strictEqual(normalCdf(-40), 0);
    assert.strictEqual(normalCdf(Number.NEGATIVE_INFINITY), 0);
    assert.strictEqual(normalCdf(Number.POSITIVE_INFINITY), 1);
  });

  it("is symmetric: Φ(x) + Φ(−x) = 1", () => {
    for (const x of [0.1, 0.7, 1.5, 2.33, 4, 7.5, 12]) close(normalCdf(x) + normalCdf(-x), 1, 1e-15);
  });

  it("is non-decreasing", () => {
    let prev = 0;
    for (let x = -10; x <= 10; x += 0.05) {
      const v = normalCdf(x);
      assert(v >= prev, `Φ decreased at x=${x}`);
      prev = v;
    }
  });

  it("propagates NaN", () => {
    assert(Number.isNaN(normalCdf(Number.NaN)));
  });
});
