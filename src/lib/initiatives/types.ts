/**
 * Initiatives — Shared Types
 *
 * Hypotheses come from an external generator and carry no numbers. Every
 * figure on a SizedInitiative is produced by the deterministic sizer, and
 * every rank by the ranker.
 */

import type { PnLSeries } from "@/lib/pnl/types";
import type { DiagnosticsBundle } from "@/lib/diagnostics/types";
import type { CompanyContext, OptionalDatasets } from "@/lib/snapshot/types";

export const INITIATIVE_CATEGORIES = ["Vendor", "Headcount", "Pricing", "Process", "Other"] as const;

export type InitiativeCategory = (typeof INITIATIVE_CATEGORIES)[number];

export const RISK_LEVELS = ["Low", "Med", "High"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

// ---------------------------------------------------------------------------
// Hypothesis (input)
// ---------------------------------------------------------------------------

export interface InitiativeHypothesis {
  title: string;
  category: InitiativeCategory;
  description: string;
  owner?: string;
  data_evidence?: string[];
}

// ---------------------------------------------------------------------------
// Sizing
// ---------------------------------------------------------------------------

export type SizingBasis = InitiativeCategory | "generic_fallback";

export interface SizedInitiative extends InitiativeHypothesis {
  /** Annualized, ≤ impact_high */
  impact_low: number;
  /** Annualized */
  impact_high: number;
  implementation_cost_estimate: number;
  time_to_value_weeks: number;
  risk_level: RiskLevel;
  /** 0.2..0.9 */
  confidence: number;
  /** The strategy's own dataset was absent; sized from a stand-in or the generic fallback */
  needs_data: boolean;
  sizing_basis: SizingBasis;
  assumptions: string[];
  next_steps: string[];
}

/**
 * Everything a sizing strategy may read. Stage 1 output, the diagnostics
 * bundle, the optional datasets, and free-text context.
 */
export interface SizingInputs {
  pnl: PnLSeries;
  diagnostics: DiagnosticsBundle;
  datasets: OptionalDatasets;
  context?: CompanyContext;
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

export interface RankedInitiative extends SizedInitiative {
  impact_mid: number;
  weighted_score: number;
  /** 1-based, dense */
  rank: number;
}
