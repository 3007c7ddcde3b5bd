/**
 * Vendor consolidation: a saving band on trailing-12-month vendor spend.
 *
 * Spend on vendors whose category reads as software or SaaS gets the wider
 * tool-rationalization band instead. Without vendor records the spend is
 * estimated from annualized other opex.
 */

import { distinctMonths } from "@/lib/pnl/months";
import { compareCodeUnits, formatUsd } from "@/lib/utils/math";
import type { SizingInputs } from "../../types";
import { annualize, annualizedPnlScale, formatPct, formatPctRange, needsData, proxy, sized, trailingWindow } from "../shared";
import type { StrategyOutcome } from "../types";

const SAVINGS_LOW = 0.05;
const SAVINGS_HIGH = 0.15;
const IMPLEMENTATION_PCT = 0.02;
const BROAD_VENDOR_BASE = 10;
const TOP_VENDORS = 5;

const SOFTWARE_SAVINGS_LOW = 0.15;
const SOFTWARE_SAVINGS_HIGH = 0.25;
const SOFTWARE_IMPLEMENTATION_PCT = 0.03;

/** Assumed vendor share of other opex when no vendor records exist */
const PROXY_SHARE_OF_OTHER_OPEX = 0.3;
const PROXY_CONFIDENCE = 0.3;

export function isSoftwareCategory(category: string): boolean {
  const c = category.toLowerCase();
  return c.includes("software") || c.includes("saas");
}

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}

function sizeFromOtherOpex(inputs: SizingInputs): StrategyOutcome {
  const otherOpex = annualizedPnlScale(inputs.pnl).opex.opex_other;
  if (otherOpex <= 0) {
    return needsData("vendor spend data", [
      "Collect vendor spend data (month, vendor, category, amount)",
      "Inventory all vendor contracts",
    ]);
  }

  const estimatedSpend = otherOpex * PROXY_SHARE_OF_OTHER_OPEX;
  return proxy({
    impact_low: estimatedSpend * SAVINGS_LOW,
    impact_high: estimatedSpend * SAVINGS_HIGH,
    implementation_cost_estimate: estimatedSpend * IMPLEMENTATION_PCT,
    time_to_value_weeks: 8,
    risk_level: "Med",
    confidence: PROXY_CONFIDENCE,
    assumptions: [
      `Vendor spend data not available; estimated at ${formatPct(PROXY_SHARE_OF_OTHER_OPEX)} of annualized other opex (${formatUsd(otherOpex)}) = ${formatUsd(estimatedSpend)}`,
      `Consolidation saves ${formatPctRange(SAVINGS_LOW, SAVINGS_HIGH)} of estimated vendor spend`,
    ],
    next_steps: ["Collect vendor spend data (month, vendor, category, amount)", "Inventory all vendor contracts"],
  });
}

export function sizeVendorInitiative(inputs: SizingInputs): StrategyOutcome {
  const vendors = inputs.datasets.vendors ?? [];
  if (vendors.length === 0) return sizeFromOtherOpex(inputs);

  const window = trailingWindow(distinctMonths(vendors.map((v) => v.month)));
  const inWindow = new Set(window);

  const byVendor = new Map<string, number>();
  const softwareVendors = new Set<string>();
  let softwareSpend = 0;
  let otherSpend = 0;
  for (const v of vendors) {
    if (!inWindow.has(v.month)) continue;
    byVendor.set(v.vendor, (byVendor.get(v.vendor) ?? 0) + v.amount);
    if (isSoftwareCategory(v.category)) {
      softwareVendors.add(v.vendor);
      softwareSpend += v.amount;
    } else {
      otherSpend += v.amount;
    }
  }

  const windowSpend = softwareSpend + otherSpend;
  if (windowSpend <= 0) return sizeFromOtherOpex(inputs);

  const annualSpend = annualize(windowSpend, window.length);
  const annualSoftware = annualize(softwareSpend, window.length);
  const annualOther = annualize(otherSpend, window.length);
  const vendorCount = byVendor.size;
  const top = [...byVendor.entries()]
    .sort((a, b) => b[1] - a[1] || compareCodeUnits(a[0], b[0]))
    .slice(0, TOP_VENDORS);

  const assumptions = [
    `Trailing ${window.length}-month vendor spend of ${formatUsd(windowSpend)} across ${vendorCount} vendors, annualized to ${formatUsd(annualSpend)}`,
  ];
  const next_steps = [
    "Inventory all vendor contracts",
    "Identify consolidation candidates among the top vendors",
    "Renegotiate or retire overlapping contracts",
  ];
  if (annualSoftware > 0) {
    assumptions.push(
      `Consolidation saves ${formatPctRange(SAVINGS_LOW, SAVINGS_HIGH)} of annual non-software vendor spend (${formatUsd(annualOther)})`,
      `Software/SaaS rationalization saves ${formatPctRange(SOFTWARE_SAVINGS_LOW, SOFTWARE_SAVINGS_HIGH)} of annual software spend (${formatUsd(annualSoftware)}, ${plural(softwareVendors.size, "software vendor")})`,
    );
    next_steps.push("Audit software licenses and seat usage");
  } else {
    assumptions.push(`Consolidation saves ${formatPctRange(SAVINGS_LOW, SAVINGS_HIGH)} of annual vendor spend`);
  }
  assumptions.push(
    `Top vendors by trailing spend: ${top.map(([name, amount]) => `${name} (${formatUsd(amount)})`).join(", ")}`,
  );

  return sized({
    impact_low: annualOther * SAVINGS_LOW + annualSoftware * SOFTWARE_SAVINGS_LOW,
    impact_high: annualOther * SAVINGS_HIGH + annualSoftware * SOFTWARE_SAVINGS_HIGH,
    implementation_cost_estimate: annualOther * IMPLEMENTATION_PCT + annualSoftware * SOFTWARE_IMPLEMENTATION_PCT,
    time_to_value_weeks: 8,
    risk_level: "Low",
    confidence: vendorCount > BROAD_VENDOR_BASE ? 0.7 : 0.5,
    assumptions,
    next_steps,
  });
}
