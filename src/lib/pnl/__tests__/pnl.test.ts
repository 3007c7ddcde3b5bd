/**
 * P&L — Tests
 *
 * Tests month helpers, derived fields and series reconstruction.
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { RawMonthlyRow } from "../types";
import { deriveMonthlyFinancials, reconstructPnl, DuplicateMonthError } from "../reconstruct";
import {
  monthOrdinal,
  monthFromOrdinal,
  enumerateMonthRange,
  distinctMonths,
  trailingMonths,
} from "../months";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const JAN_ROW: RawMonthlyRow = {
  month: "2024-01",
  revenue: 2_500_000,
  cogs: 750_000,
  opex_sales_marketing: 400_000,
  opex_rnd: 600_000,
  opex_gna: 300_000,
  opex_other: 200_000,
};

const FEB_ROW: RawMonthlyRow = {
  month: "2024-02",
  revenue: 2_000_000,
  cogs: 500_000,
  opex_gna: 1_000_000,
};

const ZERO_REVENUE_ROW: RawMonthlyRow = {
  month: "2024-03",
  revenue: 0,
  cogs: 100,
  opex_gna: 50,
};

// ---------------------------------------------------------------------------
// Months
// ---------------------------------------------------------------------------

describe("month helpers", () => {
  it("maps month keys to ordinals and back", () => {
    const o = monthOrdinal("2024-01");
    assert.equal(o, 2024 * 12);
    assert.equal(monthFromOrdinal(2024 * 12 + 11), "2024-12");
  });

  it("rejects malformed month keys", () => {
    assert.equal(monthOrdinal("2024-13"), undefined);
    assert.equal(monthOrdinal("2024-00"), undefined);
    assert.equal(monthOrdinal("24-01"), undefined);
  });

  it("enumerates a range across a year boundary", () => {
    assert.deepEqual(enumerateMonthRange("2023-11", "2024-02"), ["2023-11", "2023-12", "2024-01", "2024-02"]);
  });

  it("returns an empty range when inverted", () => {
    assert.deepEqual(enumerateMonthRange("2024-05", "2024-01"), []);
  });

  it("dedupes and sorts months", () => {
    assert.deepEqual(distinctMonths(["2024-03", "2024-01", "2024-03", "2023-12"]), ["2023-12", "2024-01", "2024-03"]);
  });

  it("keeps the trailing months", () => {
    assert.deepEqual(trailingMonths(["2024-01", "2024-02", "2024-03"], 2), ["2024-02", "2024-03"]);
    assert.deepEqual(trailingMonths(["2024-01"], 12), ["2024-01"]);
  });
});

// ---------------------------------------------------------------------------
// Derived fields
// ---------------------------------------------------------------------------

describe("deriveMonthlyFinancials", () => {
  it("derives margins for a typical month", () => {
    const m = deriveMonthlyFinancials(JAN_ROW);
    assert.equal(m.gross_margin, 1_750_000);
    assert.equal(m.gross_margin_pct, 70);
    assert.equal(m.total_opex, 1_500_000);
    assert.equal(m.ebitda, 250_000);
    assert.equal(m.ebitda_margin_pct, 10);
  });

  it("treats missing opex columns as 0", () => {
    const m = deriveMonthlyFinancials(FEB_ROW);
    assert.equal(m.opex_sales_marketing, 0);
    assert.equal(m.opex_rnd, 0);
    assert.equal(m.opex_other, 0);
    assert.equal(m.total_opex, 1_000_000);
    assert.equal(m.ebitda, 500_000);
    assert.equal(m.gross_margin_pct, 75);
    assert.equal(m.ebitda_margin_pct, 25);
  });

  it("reports 0% margins when revenue is 0", () => {
    const m = deriveMonthlyFinancials(ZERO_REVENUE_ROW);
    assert.equal(m.gross_margin, -100);
    assert.equal(m.ebitda, -150);
    assert.equal(m.gross_margin_pct, 0);
    assert.equal(m.ebitda_margin_pct, 0);
  });

  it("keeps the identity ebitda = gross_margin - total_opex", () => {
    for (const row of [JAN_ROW, FEB_ROW, ZERO_REVENUE_ROW]) {
      const m = deriveMonthlyFinancials(row);
      assert.equal(m.ebitda, m.gross_margin - m.total_opex);
      assert.equal(m.total_opex, m.opex_sales_marketing + m.opex_rnd + m.opex_gna + m.opex_other);
    }
  });
});

// ---------------------------------------------------------------------------
// Reconstruction
// ---------------------------------------------------------------------------

describe("reconstructPnl", () => {
  it("sorts rows chronologically", () => {
    const pnl = reconstructPnl([ZERO_REVENUE_ROW, JAN_ROW, FEB_ROW]);
    assert.deepEqual(
      pnl.months.map((m) => m.month),
      ["2024-01", "2024-02", "2024-03"],
    );
  });

  it("lists zero-revenue months", () => {
    const pnl = reconstructPnl([JAN_ROW, ZERO_REVENUE_ROW]);
    assert.deepEqual(pnl.zero_revenue_months, ["2024-03"]);
  });

  it("throws DuplicateMonthError on a repeated month", () => {
    assert.throws(
      () => reconstructPnl([JAN_ROW, FEB_ROW, { ...JAN_ROW, revenue: 1 }]),
      (err: unknown) => err instanceof DuplicateMonthError && err.month === "2024-01",
    );
  });

  it("returns an empty series for no rows", () => {
    assert.deepEqual(reconstructPnl([]), { months: [], zero_revenue_months: [] });
  });

  it("does not mutate its input", () => {
    const rows = [FEB_ROW, JAN_ROW];
    reconstructPnl(rows);
    assert.equal(rows[0].month, "2024-02");
  });
});
