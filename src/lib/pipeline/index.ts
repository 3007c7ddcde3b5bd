/**
 * Analysis Pipeline — Public API
 */

export { runAnalysis, prepareAnalysis, completeAnalysis } from "./runAnalysis";
export type {
  AnalysisRunInput,
  AnalysisRunResult,
  PreparedAnalysis,
  PromptContext,
} from "./runAnalysis";
