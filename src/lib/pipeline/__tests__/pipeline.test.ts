/**
 * Analysis Pipeline — Tests
 *
 * End-to-end runs over in-memory snapshots: ordering, determinism, frozen
 * outputs, and the two fatal conditions.
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { InputSnapshot } from "@/lib/snapshot/types";
import type { InitiativeHypothesis } from "@/lib/initiatives/types";
import { DEFAULT_RANKING_CONFIG } from "@/lib/configEngine/defaults";
import { RankingConfigError } from "@/lib/configEngine/schema";
import { DuplicateMonthError } from "@/lib/pnl/reconstruct";
import { canonicalJson } from "@/lib/utils/canonicalHash";
import { isDeepFrozen } from "@/lib/utils/deepFreeze";
import { runAnalysis, prepareAnalysis, completeAnalysis } from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const MONTHS = Array.from({ length: 12 }, (_, i) => `2024-${String(i + 1).padStart(2, "0")}`);

const SNAPSHOT: InputSnapshot = {
  gl: MONTHS.map((month, i) => ({
    month,
    revenue: 100_000 + i * 5_000,
    cogs: 40_000 + i * 1_500,
    opex_sales_marketing: 15_000 + i * 900,
    opex_rnd: 12_000,
    opex_gna: 9_000 + (i === 7 ? 30_000 : 0),
    opex_other: 2_000 + (i % 3) * 250,
  })),
  payroll: MONTHS.flatMap((month) => [
    { month, function: "Sales" as const, headcount: 3, fully_loaded_cost: 18_000 },
    { month, function: "G&A" as const, headcount: 2, fully_loaded_cost: 12_000 },
  ]),
  vendors: MONTHS.flatMap((month, i) => [
    { month, vendor: "CloudHost", category: "Infrastructure", amount: 4_000 + (i === 10 ? 20_000 : 0) },
    { month, vendor: "OfficeCo", category: "Facilities", amount: 2_500 },
  ]),
  context: { company_name: "Test Co", industry: "SaaS" },
};

const HYPOTHESES: InitiativeHypothesis[] = [
  { title: "Consolidate infrastructure vendors", category: "Vendor", description: "Two hosting contracts overlap" },
  { title: "Reprice annual plans", category: "Pricing", description: "" },
  { title: "Automate month-end close", category: "Process", description: "" },
  { title: "Restructure G&A team", category: "Headcount", description: "", owner: "CFO" },
];

function allNumbersFinite(value: unknown): boolean {
  if (typeof value === "number") return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(allNumbersFinite);
  if (typeof value === "object" && value !== null) return Object.values(value).every(allNumbersFinite);
  return true;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("runAnalysis", () => {
  const result = runAnalysis({ snapshot: SNAPSHOT, hypotheses: HYPOTHESES, rankingConfig: DEFAULT_RANKING_CONFIG });

  it("ranks every hypothesis with dense 1-based ranks", () => {
    assert.equal(result.initiatives.length, HYPOTHESES.length);
    assert.deepEqual(
      result.initiatives.map((i) => i.rank),
      [1, 2, 3, 4],
    );
    for (let i = 1; i < result.initiatives.length; i++) {
      assert.ok(result.initiatives[i - 1].weighted_score >= result.initiatives[i].weighted_score);
    }
  });

  it("sizes the pricing hypothesis through the fallback without segment data", () => {
    const pricing = result.initiatives.find((i) => i.category === "Pricing");
    assert.ok(pricing);
    assert.equal(pricing.needs_data, true);
    assert.equal(pricing.sizing_basis, "generic_fallback");
  });

  it("surfaces the seeded spikes in the diagnostics", () => {
    assert.deepEqual(
      result.diagnostics.outliers.vendor_spikes.map((s) => [s.vendor, s.month]),
      [["CloudHost", "2024-11"]],
    );
    assert.ok(result.diagnostics.outliers.opex_spikes.some((s) => s.category === "opex_gna" && s.month === "2024-08"));
  });

  it("emits no NaN or infinite values", () => {
    assert.ok(allNumbersFinite(result));
  });

  it("returns frozen outputs", () => {
    assert.ok(Object.isFrozen(result.pnl.months[0]));
    assert.ok(Object.isFrozen(result.diagnostics.completeness));
    assert.ok(Object.isFrozen(result.initiatives[0]));
    assert.ok(isDeepFrozen(result.pnl));
    assert.ok(isDeepFrozen(result.diagnostics));
    assert.ok(isDeepFrozen(result.initiatives));
  });

  it("is deterministic across runs and input order", () => {
    const again = runAnalysis({ snapshot: SNAPSHOT, hypotheses: HYPOTHESES, rankingConfig: DEFAULT_RANKING_CONFIG });
    assert.equal(again.output_hash, result.output_hash);
    assert.equal(
      canonicalJson({ pnl: again.pnl, diagnostics: again.diagnostics, initiatives: again.initiatives }),
      canonicalJson({ pnl: result.pnl, diagnostics: result.diagnostics, initiatives: result.initiatives }),
    );

    const shuffled = runAnalysis({
      snapshot: { ...SNAPSHOT, gl: [...SNAPSHOT.gl].reverse() },
      hypotheses: [...HYPOTHESES].reverse(),
      rankingConfig: DEFAULT_RANKING_CONFIG,
    });
    assert.equal(shuffled.output_hash, result.output_hash);
    assert.match(result.output_hash, /^[0-9a-f]{64}$/);
  });

  it("changes the hash when the ranking config changes the output", () => {
    const other = runAnalysis({
      snapshot: SNAPSHOT,
      hypotheses: HYPOTHESES,
      rankingConfig: { ...DEFAULT_RANKING_CONFIG, risk_multiplier_high: 3 },
    });
    assert.notEqual(other.output_hash, result.output_hash);
  });

  it("produces an empty ranking for no hypotheses", () => {
    const empty = runAnalysis({ snapshot: SNAPSHOT, hypotheses: [], rankingConfig: DEFAULT_RANKING_CONFIG });
    assert.deepEqual(empty.initiatives, []);
    assert.equal(empty.diagnostics.completeness.total_months, 12);
  });

  it("runs on a snapshot with no GL rows", () => {
    const bare = runAnalysis({ snapshot: { gl: [] }, hypotheses: HYPOTHESES, rankingConfig: DEFAULT_RANKING_CONFIG });
    assert.equal(bare.initiatives.length, HYPOTHESES.length);
    assert.ok(bare.initiatives.every((i) => i.impact_low === 0 && i.impact_high === 0));
    assert.deepEqual(bare.diagnostics.completeness.data_gaps[0], "No GL/P&L data provided");
  });

  it("throws on a duplicate GL month", () => {
    const dup: InputSnapshot = { gl: [...SNAPSHOT.gl, { month: "2024-03", revenue: 1, cogs: 0 }] };
    assert.throws(
      () => runAnalysis({ snapshot: dup, hypotheses: [], rankingConfig: DEFAULT_RANKING_CONFIG }),
      DuplicateMonthError,
    );
  });

  it("throws on an invalid ranking config", () => {
    assert.throws(
      () =>
        runAnalysis({
          snapshot: SNAPSHOT,
          hypotheses: HYPOTHESES,
          rankingConfig: { ...DEFAULT_RANKING_CONFIG, time_multiplier_per_week: -0.5 },
        }),
      RankingConfigError,
    );
  });
});

describe("prepareAnalysis / completeAnalysis", () => {
  it("builds the text context for the hypothesis generator", () => {
    const prepared = prepareAnalysis(SNAPSHOT);
    assert.equal(prepared.prompt_context.company_context, "Company Name: Test Co\nIndustry: SaaS");
    assert.equal(prepared.prompt_context.pnl_summary.split("\n")[0], "Latest period (2024-12):");
    assert.equal(prepared.prompt_context.diagnostics_summary.split("\n")[0], "Fixed vs Variable Cost Analysis:");
  });

  it("matches a one-shot run", () => {
    const twoStep = completeAnalysis(prepareAnalysis(SNAPSHOT), HYPOTHESES, DEFAULT_RANKING_CONFIG);
    const oneShot = runAnalysis({ snapshot: SNAPSHOT, hypotheses: HYPOTHESES, rankingConfig: DEFAULT_RANKING_CONFIG });
    assert.equal(twoStep.output_hash, oneShot.output_hash);
  });

  it("applies diagnostics overrides", () => {
    const strict = prepareAnalysis(SNAPSHOT, { z_threshold: 10 });
    assert.deepEqual(strict.diagnostics.outliers.vendor_spikes, []);
    assert.deepEqual(strict.diagnostics.outliers.opex_spikes, []);
  });
});
