/**
 * Initiative Sizing — Shared Helpers
 */

import type { DiagnosticName } from "@/lib/diagnostics/types";
import { OPEX_CATEGORIES } from "@/lib/pnl/types";
import type { OpexCategory, PnLSeries } from "@/lib/pnl/types";
import { trailingMonths } from "@/lib/pnl/months";
import type { CompanyContext } from "@/lib/snapshot/types";
import { clamp, roundTo, roundToThousand } from "@/lib/utils/math";
import type { InitiativeHypothesis, SizedInitiative, SizingBasis } from "../types";
import {
  CONFIDENCE_CEILING,
  CONFIDENCE_FLOOR,
  TRAILING_WINDOW_MONTHS,
  UNAVAILABLE_DIAGNOSTIC_FACTOR,
} from "./profiles";
import type { SizingEstimate, StrategyOutcome } from "./types";

export function annualize(total: number, months: number): number {
  return months > 0 ? (total * 12) / months : 0;
}

export function sized(estimate: SizingEstimate): StrategyOutcome {
  return { kind: "sized", estimate };
}

export function proxy(estimate: SizingEstimate): StrategyOutcome {
  return { kind: "proxy", estimate };
}

export function needsData(missing: string, next_steps: string[]): StrategyOutcome {
  return { kind: "needs_data", missing, next_steps };
}

export function formatPct(fraction: number): string {
  return `${roundTo(fraction * 100, 2)}%`;
}

export function formatPctRange(low: number, high: number): string {
  return `${formatPct(low)}–${formatPct(high)}`;
}

// ---------------------------------------------------------------------------
// P&L scale
// ---------------------------------------------------------------------------

export interface PnlScale {
  /** Months in the trailing window */
  months: number;
  revenue: number;
  ebitda: number;
  total_opex: number;
  opex: Record<OpexCategory, number>;
}

/**
 * Annualized totals over the trailing window of the canonical series.
 */
export function annualizedPnlScale(pnl: PnLSeries): PnlScale {
  const window = pnl.months.slice(Math.max(0, pnl.months.length - TRAILING_WINDOW_MONTHS));
  const n = window.length;

  const opex: Record<OpexCategory, number> = {
    opex_sales_marketing: 0,
    opex_rnd: 0,
    opex_gna: 0,
    opex_other: 0,
  };
  let revenue = 0;
  let ebitda = 0;
  let total_opex = 0;
  for (const m of window) {
    revenue += m.revenue;
    ebitda += m.ebitda;
    total_opex += m.total_opex;
    for (const c of OPEX_CATEGORIES) opex[c] += m[c];
  }
  for (const c of OPEX_CATEGORIES) opex[c] = annualize(opex[c], n);

  return {
    months: n,
    revenue: annualize(revenue, n),
    ebitda: annualize(ebitda, n),
    total_opex: annualize(total_opex, n),
    opex,
  };
}

/**
 * Trailing window of the distinct months of a record set.
 */
export function trailingWindow(months: readonly string[]): string[] {
  return trailingMonths(months, TRAILING_WINDOW_MONTHS);
}

// ---------------------------------------------------------------------------
// Finalization
// ---------------------------------------------------------------------------

const CONTEXT_SIGNALS: Array<keyof CompanyContext> = [
  "industry",
  "business_model",
  "growth_stage",
  "company_size",
];

/**
 * One assumption line naming the context signals present. Context is never
 * used in arithmetic.
 */
export function contextAssumption(context: CompanyContext | undefined): string | undefined {
  if (!context) return undefined;
  const signals: string[] = [];
  for (const key of CONTEXT_SIGNALS) {
    const value = context[key]?.trim();
    if (value) signals.push(`${key}=${value}`);
  }
  if (signals.length === 0) return undefined;
  return `Context signals (not used in sizing math): ${signals.join("; ")}`;
}

export function unavailableDiagnosticsFactor(unavailable: number): number {
  return UNAVAILABLE_DIAGNOSTIC_FACTOR ** Math.max(0, unavailable);
}

/**
 * Confidence scaled by data completeness (a fully complete snapshot keeps
 * the strategy's confidence, an empty one keeps 75% of it), then by 0.9 for
 * each diagnostic the history was too short to run.
 */
export function adjustConfidence(confidence: number, completenessScore: number, unavailableDiagnostics: number): number {
  const factor = (0.75 + 0.25 * clamp(completenessScore, 0, 1)) * unavailableDiagnosticsFactor(unavailableDiagnostics);
  return roundTo(clamp(confidence * factor, CONFIDENCE_FLOOR, CONFIDENCE_CEILING), 4);
}

export interface FinalizeArgs {
  hypothesis: InitiativeHypothesis;
  estimate: SizingEstimate;
  basis: SizingBasis;
  needs_data: boolean;
  completenessScore: number;
  unavailableDiagnostics: readonly DiagnosticName[];
  context?: CompanyContext;
}

/**
 * Round amounts to the nearest 1,000, order the impact band, clamp
 * confidence, and merge the hypothesis fields.
 */
export function finalizeSizing(args: FinalizeArgs): SizedInitiative {
  const { hypothesis, estimate, unavailableDiagnostics } = args;

  const a = roundToThousand(Math.max(0, estimate.impact_low));
  const b = roundToThousand(Math.max(0, estimate.impact_high));

  const assumptions = [...estimate.assumptions];
  if (unavailableDiagnostics.length > 0) {
    const factor = roundTo(unavailableDiagnosticsFactor(unavailableDiagnostics.length), 4);
    assumptions.push(
      `Confidence reduced ×${factor}; history too short for: ${unavailableDiagnostics.join(", ")}`,
    );
  }
  const contextLine = contextAssumption(args.context);
  if (contextLine) assumptions.push(contextLine);

  const out: SizedInitiative = {
    title: hypothesis.title,
    category: hypothesis.category,
    description: hypothesis.description,
    impact_low: Math.min(a, b),
    impact_high: Math.max(a, b),
    implementation_cost_estimate: roundToThousand(Math.max(0, estimate.implementation_cost_estimate)),
    time_to_value_weeks: Math.max(1, Math.round(estimate.time_to_value_weeks)),
    risk_level: estimate.risk_level,
    confidence: adjustConfidence(estimate.confidence, args.completenessScore, unavailableDiagnostics.length),
    needs_data: args.needs_data,
    sizing_basis: args.basis,
    assumptions,
    next_steps: [...estimate.next_steps],
  };
  if (hypothesis.owner !== undefined) out.owner = hypothesis.owner;
  if (hypothesis.data_evidence !== undefined) out.data_evidence = [...hypothesis.data_evidence];
  return out;
}
