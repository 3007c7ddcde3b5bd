/**
 * Diagnostics — Margin Bridge
 *
 * Month-over-month EBITDA decomposition into revenue, COGS and opex
 * components. The three components sum to the EBITDA change exactly
 * (up to float rounding).
 */

import type { MonthlyFinancials } from "@/lib/pnl/types";
import type { MarginBridgeEntry } from "./types";

export const BRIDGE_TOLERANCE = 1e-6;

/**
 * Pure function — deterministic, no side effects.
 * Series shorter than 2 months produce an empty bridge.
 */
export function computeMarginBridge(months: readonly MonthlyFinancials[]): MarginBridgeEntry[] {
  const bridge: MarginBridgeEntry[] = [];

  for (let i = 1; i < months.length; i++) {
    const prev = months[i - 1];
    const curr = months[i];

    bridge.push({
      month: curr.month,
      prev_month: prev.month,
      revenue_impact: curr.revenue - prev.revenue,
      cogs_impact: prev.cogs - curr.cogs,
      opex_impact: prev.total_opex - curr.total_opex,
      ebitda_change: curr.ebitda - prev.ebitda,
    });
  }

  return bridge;
}

/** |revenue + cogs + opex impacts - ebitda_change| */
export function bridgeResidual(entry: MarginBridgeEntry): number {
  return Math.abs(entry.revenue_impact + entry.cogs_impact + entry.opex_impact - entry.ebitda_change);
}
