/**
 * Dev harness for the valuation engine: reference-plant figures plus the Engine Health registry.
 * Run from repo root: npx tsx __dev__/valuationCheck.ts
 */

import { resolveValuationParameters } from "../src/domain/valuation/valuation.factory";
import { evaluate, computeNpv } from "../src/engine/valuation";
import { evaluateScenarios } from "../src/engine/scenario";
import { runAllChecks } from "../src/dev/healthChecks";

const PREFIX = "[valuationCheck]";

function assertApprox(actual: number, expected: number, tolerance: number, label: string): void {
  const ok = Math.abs(actual - expected) <= tolerance;
  if (!ok) throw new Error(`${label}: expected ≈ ${expected}, got ${actual}`);
}

function checkReferencePlant(): void {
  const params = resolveValuationParameters();
  const base = evaluate(params);
  assertApprox(base.presentValue, 12_999_035_439.48, 0.01, "base PV");
  assertApprox(base.optionValue, 11_600_372_593.65, 0.01, "base option");
  assertApprox(computeNpv(base.presentValue, params.initialInvestment), 4_499_035_439.48, 0.01, "base NPV");

  const scenarios = evaluateScenarios({ ...params, basePresentValue: base.presentValue });
  const low = scenarios.get("Low");
  const optimal = scenarios.get("Optimal");
  if (!low || !optimal) throw new Error("Low/Optimal scenarios missing");
  assertApprox(low.adjustedPresentValue, 1_299_903_543.95, 0.01, "Low PV");
  assertApprox(low.optionValue, 564_234_565.48, 0.01, "Low option");
  assertApprox(optimal.adjustedPresentValue, 11_699_131_895.53, 0.01, "Optimal PV");
  assertApprox(optimal.optionValue, 10_313_593_064.38, 0.01, "Optimal option");
  console.log(`${PREFIX} OK: reference plant matches published figures.`);
}

function run(): number {
  try {
    checkReferencePlant();
  } catch (e) {
    console.error(`${PREFIX} FAIL:`, e instanceof Error ? e.message : e);
    return 1;
  }

  const { results, durationMs } = runAllChecks();
  let failed = 0;
  for (const r of results) {
    const icon = r.status === "pass" ? "✓" : r.status === "warn" ? "!" : "✗";
    console.log(`${PREFIX} ${icon} [${r.group}] ${r.name}: ${r.message}`);
    if (r.status === "fail") failed++;
  }
  console.log(`${PREFIX} ${results.length} checks in ${durationMs.toFixed(1)} ms, ${failed} failed.`);
  return failed > 0 ? 1 : 0;
}

process.exit(run());
