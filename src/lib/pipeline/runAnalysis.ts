/**
 * Analysis Pipeline — Orchestration
 *
 * Stage 1 → stages 2–6 → stage 7 → stage 8 over one immutable snapshot.
 *
 * Two phases, matching how hypotheses arrive:
 *   1. prepareAnalysis(): P&L + diagnostics + the text context handed to the
 *      hypothesis generator
 *   2. completeAnalysis(): size and rank whatever hypotheses came back
 * runAnalysis() does both when the hypotheses are already known.
 *
 * No wall-clock time, randomness or I/O: the same snapshot, hypotheses and
 * config always produce the same output_hash.
 */

import { reconstructPnl } from "@/lib/pnl/reconstruct";
import type { PnLSeries } from "@/lib/pnl/types";
import { runDiagnostics } from "@/lib/diagnostics";
import { formatCompanyContext, formatDiagnosticsSummary, formatPnlSummary } from "@/lib/diagnostics/summary";
import type { DiagnosticsBundle } from "@/lib/diagnostics/types";
import { resolveDiagnosticsSettings } from "@/lib/configEngine/schema";
import type { DiagnosticsSettingsOverride, RankingConfig } from "@/lib/configEngine/types";
import { sizeInitiatives } from "@/lib/initiatives/sizing";
import { rankInitiatives } from "@/lib/initiatives/ranking";
import type { InitiativeHypothesis, RankedInitiative } from "@/lib/initiatives/types";
import type { InputSnapshot } from "@/lib/snapshot/types";
import { logEvent } from "@/lib/obs/log";
import { hashOutputs } from "@/lib/utils/canonicalHash";
import { deepFreeze } from "@/lib/utils/deepFreeze";

export interface PromptContext {
  pnl_summary: string;
  diagnostics_summary: string;
  company_context: string;
}

export interface PreparedAnalysis {
  snapshot: InputSnapshot;
  pnl: PnLSeries;
  diagnostics: DiagnosticsBundle;
  prompt_context: PromptContext;
}

export interface AnalysisRunResult {
  pnl: PnLSeries;
  diagnostics: DiagnosticsBundle;
  initiatives: RankedInitiative[];
  /** SHA-256 of the canonical JSON of pnl, diagnostics and initiatives */
  output_hash: string;
}

export interface AnalysisRunInput {
  snapshot: InputSnapshot;
  hypotheses: readonly InitiativeHypothesis[];
  rankingConfig: RankingConfig;
  diagnosticsSettings?: DiagnosticsSettingsOverride;
}

/**
 * Stages 1–6. Throws DuplicateMonthError or DiagnosticsSettingsError;
 * everything else degrades to explicit markers in the bundle.
 */
export function prepareAnalysis(
  snapshot: InputSnapshot,
  diagnosticsSettings?: DiagnosticsSettingsOverride,
): PreparedAnalysis {
  const settings = resolveDiagnosticsSettings(diagnosticsSettings);

  const pnl = deepFreeze(reconstructPnl(snapshot.gl));
  const diagnostics = runDiagnostics(
    pnl,
    { payroll: snapshot.payroll, vendors: snapshot.vendors, segments: snapshot.segments },
    settings,
  );

  logEvent("debug", "pipeline", "diagnostics complete", {
    months: pnl.months.length,
    completeness: diagnostics.completeness.completeness_score,
    insufficient: diagnostics.completeness.insufficient_data,
  });

  return {
    snapshot,
    pnl,
    diagnostics,
    prompt_context: {
      pnl_summary: formatPnlSummary(pnl),
      diagnostics_summary: formatDiagnosticsSummary(diagnostics),
      company_context: formatCompanyContext(snapshot.context),
    },
  };
}

/**
 * Stages 7–8. An empty hypothesis list is valid and yields no initiatives.
 * Throws RankingConfigError before scoring when the config is invalid.
 */
export function completeAnalysis(
  prepared: PreparedAnalysis,
  hypotheses: readonly InitiativeHypothesis[],
  rankingConfig: RankingConfig,
): AnalysisRunResult {
  const { snapshot, pnl, diagnostics } = prepared;

  const sized = sizeInitiatives(hypotheses, {
    pnl,
    diagnostics,
    datasets: { payroll: snapshot.payroll, vendors: snapshot.vendors, segments: snapshot.segments },
    context: snapshot.context,
  });
  const initiatives = deepFreeze(rankInitiatives(sized, rankingConfig));

  const output_hash = hashOutputs({ pnl, diagnostics, initiatives });

  logEvent("debug", "pipeline", "initiatives ranked", {
    hypotheses: hypotheses.length,
    needs_data: initiatives.filter((i) => i.needs_data).length,
    output_hash,
  });

  return { pnl, diagnostics, initiatives, output_hash };
}

/**
 * Full run over one snapshot.
 *
 * Pure function — deterministic, no side effects beyond debug logging.
 */
export function runAnalysis(input: AnalysisRunInput): AnalysisRunResult {
  const prepared = prepareAnalysis(input.snapshot, input.diagnosticsSettings);
  return completeAnalysis(prepared, input.hypotheses, input.rankingConfig);
}
