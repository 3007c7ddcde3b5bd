/**
 * Diagnostics — Trend Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { reconstructPnl } from "@/lib/pnl/reconstruct";
import { classifyDirection, computeTrend, computeTrends } from "../trends";

describe("classifyDirection", () => {
  it("applies the deadband symmetrically", () => {
    assert.equal(classifyDirection(0.5, 0.1), "increasing");
    assert.equal(classifyDirection(-0.5, 0.1), "decreasing");
    assert.equal(classifyDirection(0.1, 0.1), "flat");
    assert.equal(classifyDirection(-0.05, 0.1), "flat");
  });
});

describe("computeTrend", () => {
  it("fits an increasing series", () => {
    const t = computeTrend([100, 200, 300], "revenue", 0.001);
    assert.equal(t.status, "available");
    if (t.status !== "available") return;
    assert.equal(t.slope, 100);
    assert.equal(t.intercept, 100);
    assert.equal(t.r_squared, 1);
    assert.equal(t.direction, "increasing");
    assert.equal(t.points, 3);
    assert.ok(Math.abs(t.epsilon - 0.2) < 1e-12);
  });

  it("reads a constant series as flat", () => {
    const t = computeTrend([100, 100, 100], "total_opex", 0.001);
    assert.equal(t.status, "available");
    if (t.status !== "available") return;
    assert.equal(t.direction, "flat");
    assert.equal(t.r_squared, 0);
  });

  it("reads a slope inside the deadband as flat", () => {
    // slope 0.5 against a mean of 1000.5 with a 0.1% band (≈1.0)
    const t = computeTrend([1000, 1000.5, 1001], "revenue", 0.001);
    assert.equal(t.status, "available");
    if (t.status !== "available") return;
    assert.equal(t.direction, "flat");
  });

  it("reports insufficient data below 2 points", () => {
    assert.deepEqual(computeTrend([5], "ebitda", 0.001), {
      status: "insufficient_data",
      metric: "ebitda",
      points: 1,
      required: 2,
    });
  });
});

describe("computeTrends", () => {
  it("covers every tracked metric", () => {
    const pnl = reconstructPnl([
      { month: "2024-01", revenue: 1000, cogs: 400, opex_gna: 300 },
      { month: "2024-02", revenue: 900, cogs: 400, opex_gna: 300 },
      { month: "2024-03", revenue: 800, cogs: 400, opex_gna: 300 },
    ]);
    const trends = computeTrends(pnl.months, 0.001);
    assert.deepEqual(Object.keys(trends), [
      "revenue",
      "ebitda",
      "gross_margin_pct",
      "ebitda_margin_pct",
      "total_opex",
    ]);

    const revenue = trends.revenue;
    assert.equal(revenue.status, "available");
    if (revenue.status === "available") assert.equal(revenue.direction, "decreasing");

    const opex = trends.total_opex;
    assert.equal(opex.status, "available");
    if (opex.status === "available") assert.equal(opex.direction, "flat");
  });

  it("marks every metric unavailable for a single month", () => {
    const pnl = reconstructPnl([{ month: "2024-01", revenue: 1000, cogs: 400 }]);
    for (const trend of Object.values(computeTrends(pnl.months, 0.001))) {
      assert.equal(trend.status, "insufficient_data");
    }
  });
});
