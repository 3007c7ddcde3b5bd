/**
 * Diagnostics — Integration Entrypoint
 *
 * Single function: runDiagnostics()
 * Runs stages 2–6 over the canonical series. The stages share no state, so
 * their order here carries no meaning.
 */

import type { PnLSeries } from "@/lib/pnl/types";
import type { OptionalDatasets } from "@/lib/snapshot/types";
import type { DiagnosticsSettings } from "@/lib/configEngine/types";
import { DEFAULT_DIAGNOSTICS_SETTINGS } from "@/lib/configEngine/defaults";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import { computeMarginBridge } from "./marginBridge";
import { detectOutliers } from "./outliers";
import { computeTrends } from "./trends";
import { estimateCostStructure } from "./costStructure";
import { scoreCompleteness } from "./completeness";
import type { DiagnosticsBundle } from "./types";

// Re-export all types for consumer convenience
export type {
  DiagnosticsBundle,
  MarginBridgeEntry,
  Outlier,
  OutlierReport,
  VendorSpikeOutlier,
  OpexSpikeOutlier,
  RevenueDeclineOutlier,
  Trend,
  AvailableTrend,
  UnavailableTrend,
  TrendMetric,
  TrendDirection,
  CostSplit,
  CompletenessReport,
  DiagnosticName,
} from "./types";
export { TREND_METRICS } from "./types";

// Re-export sub-modules for direct access
export { computeMarginBridge, bridgeResidual, BRIDGE_TOLERANCE } from "./marginBridge";
export { detectOutliers, detectVendorSpikes, detectOpexSpikes, detectRevenueDeclines } from "./outliers";
export { computeTrends, computeTrend, classifyDirection } from "./trends";
export { estimateCostStructure, estimateCategorySplit } from "./costStructure";
export { scoreCompleteness, insufficientDiagnostics } from "./completeness";
export { formatPnlSummary, formatDiagnosticsSummary, formatCompanyContext } from "./summary";

/**
 * Build the diagnostics bundle for one run.
 *
 * Pure function — deterministic, no side effects. The result is deep-frozen.
 */
export function runDiagnostics(
  pnl: PnLSeries,
  datasets: OptionalDatasets = {},
  settings: DiagnosticsSettings = DEFAULT_DIAGNOSTICS_SETTINGS,
): DiagnosticsBundle {
  const { months } = pnl;

  return deepFreeze({
    margin_bridge: computeMarginBridge(months),
    outliers: detectOutliers(months, datasets.vendors, settings),
    trends: computeTrends(months, settings.trend_deadband_pct),
    cost_structure: estimateCostStructure(months, settings.cost_split_bands),
    completeness: scoreCompleteness(pnl, datasets, settings),
  });
}
