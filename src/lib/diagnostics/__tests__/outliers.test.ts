/**
 * Diagnostics — Outlier Detection Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { reconstructPnl } from "@/lib/pnl/reconstruct";
import type { RawMonthlyRow } from "@/lib/pnl/types";
import type { VendorRecord } from "@/lib/snapshot/types";
import { DEFAULT_DIAGNOSTICS_SETTINGS } from "@/lib/configEngine/defaults";
import {
  detectOutliers,
  detectVendorSpikes,
  detectOpexSpikes,
  detectRevenueDeclines,
  vendorMonthlyTotals,
} from "../outliers";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const MONTHS = ["2024-01", "2024-02", "2024-03", "2024-04", "2024-05", "2024-06"];

function glRow(month: string, revenue: number, opexOther = 10): RawMonthlyRow {
  return { month, revenue, cogs: 0, opex_gna: 50, opex_other: opexOther };
}

function vendorSeries(vendor: string, amounts: number[]): VendorRecord[] {
  return amounts.map((amount, i) => ({ month: MONTHS[i], vendor, category: "Software", amount }));
}

const SETTINGS = DEFAULT_DIAGNOSTICS_SETTINGS;

// ---------------------------------------------------------------------------
// Vendor spikes
// ---------------------------------------------------------------------------

describe("vendorMonthlyTotals", () => {
  it("sums records per vendor and month, vendors in code-unit order", () => {
    const totals = vendorMonthlyTotals([
      { month: "2024-02", vendor: "beta", category: "Ops", amount: 5 },
      { month: "2024-01", vendor: "Zeta", category: "Ops", amount: 1 },
      { month: "2024-02", vendor: "beta", category: "Ops", amount: 7 },
      { month: "2024-01", vendor: "beta", category: "Ops", amount: 3 },
    ]);
    assert.deepEqual(totals, [
      { vendor: "Zeta", months: ["2024-01"], amounts: [1] },
      { vendor: "beta", months: ["2024-01", "2024-02"], amounts: [3, 12] },
    ]);
  });
});

describe("detectVendorSpikes", () => {
  it("flags the month whose |z| exceeds the threshold", () => {
    const spikes = detectVendorSpikes(vendorSeries("Acme", [100, 100, 100, 100, 100, 1000]), SETTINGS);
    assert.equal(spikes.length, 1);
    assert.equal(spikes[0].vendor, "Acme");
    assert.equal(spikes[0].month, "2024-06");
    assert.equal(spikes[0].amount, 1000);
    assert.equal(spikes[0].mean, 250);
    assert.ok(spikes[0].z_score > 2);
  });

  it("ignores constant vendors", () => {
    assert.deepEqual(detectVendorSpikes(vendorSeries("Flat", [50, 50, 50, 50, 50, 50]), SETTINGS), []);
  });

  it("ignores vendors with fewer than the minimum months", () => {
    assert.deepEqual(detectVendorSpikes(vendorSeries("Short", [10, 1000]), SETTINGS), []);
  });

  it("orders spikes by month, then vendor", () => {
    const spikes = detectVendorSpikes(
      [
        ...vendorSeries("Zed", [1, 1, 1, 1, 1, 100]),
        ...vendorSeries("Acme", [1, 1, 1, 1, 1, 100]),
      ],
      SETTINGS,
    );
    assert.deepEqual(
      spikes.map((s) => s.vendor),
      ["Acme", "Zed"],
    );
  });
});

// ---------------------------------------------------------------------------
// Opex spikes
// ---------------------------------------------------------------------------

describe("detectOpexSpikes", () => {
  it("flags a category spike and skips flat categories", () => {
    const rows = MONTHS.map((m, i) => glRow(m, 1000, i === 5 ? 100 : 10));
    const spikes = detectOpexSpikes(reconstructPnl(rows).months, SETTINGS);
    assert.equal(spikes.length, 1);
    assert.equal(spikes[0].category, "opex_other");
    assert.equal(spikes[0].month, "2024-06");
    assert.equal(spikes[0].amount, 100);
    assert.equal(spikes[0].mean, 25);
  });

  it("flags nothing on a constant series", () => {
    const rows = MONTHS.map((m) => glRow(m, 1000));
    assert.deepEqual(detectOpexSpikes(reconstructPnl(rows).months, SETTINGS), []);
  });

  it("flags nothing below the minimum point count", () => {
    const rows = [glRow("2024-01", 1000, 10), glRow("2024-02", 1000, 1000)];
    assert.deepEqual(detectOpexSpikes(reconstructPnl(rows).months, SETTINGS), []);
  });
});

// ---------------------------------------------------------------------------
// Revenue declines
// ---------------------------------------------------------------------------

describe("detectRevenueDeclines", () => {
  const rows = [
    glRow("2024-01", 1000),
    glRow("2024-02", 850),
    glRow("2024-03", 850),
    glRow("2024-04", 0),
    glRow("2024-05", 500),
    glRow("2024-06", 450),
  ];

  it("flags drops above the threshold and skips months after zero revenue", () => {
    const declines = detectRevenueDeclines(reconstructPnl(rows).months, SETTINGS);
    assert.deepEqual(declines, [
      {
        kind: "revenue_decline",
        month: "2024-02",
        prev_month: "2024-01",
        prev_revenue: 1000,
        current_revenue: 850,
        decline_pct: 15,
      },
      {
        kind: "revenue_decline",
        month: "2024-04",
        prev_month: "2024-03",
        prev_revenue: 850,
        current_revenue: 0,
        decline_pct: 100,
      },
    ]);
  });

  it("does not flag a drop exactly at the threshold", () => {
    const exact = [glRow("2024-01", 1000), glRow("2024-02", 900)];
    assert.deepEqual(detectRevenueDeclines(reconstructPnl(exact).months, SETTINGS), []);
  });

  it("honours a custom threshold", () => {
    const declines = detectRevenueDeclines(reconstructPnl(rows).months, { revenue_decline_threshold: 0.2 });
    assert.deepEqual(
      declines.map((d) => d.month),
      ["2024-04"],
    );
  });
});

describe("detectOutliers", () => {
  it("returns an empty report for a flat series without vendors", () => {
    const rows = MONTHS.map((m) => glRow(m, 1000));
    assert.deepEqual(detectOutliers(reconstructPnl(rows).months, undefined, SETTINGS), {
      vendor_spikes: [],
      opex_spikes: [],
      revenue_declines: [],
    });
  });
});
