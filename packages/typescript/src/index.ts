export { loadConfig, resolveConfig, DEFAULT_CONFIG_FILE } from "./config.ts";
export type { ResolvedConfig } from "./config.ts";
export { DocumentWorkspace, extractSections, moduleDocName, LEADER_FILE, OVERALL_FILE } from "./documents/workspace.ts";
export { ConfigurationError, HttpStatusError } from "./errors.ts";
export { isConverged } from "./judges/convergence.ts";
export { mergeFeedback, mergeLabeledFeedback } from "./judges/feedback.ts";
export { ScoreBoard, selectBest } from "./judges/selection.ts";
export type { CandidateScore } from "./judges/selection.ts";
export { OpenCodeClient, identityLabel } from "./llm/client.ts";
export type { Generator, Identity } from "./llm/client.ts";
export { TracingGenerator } from "./llm/tracing.ts";
export { RequirementCheckPipeline } from "./pipeline/check.ts";
export { DesignPipeline, parseModuleList } from "./pipeline/design.ts";
export { ModuleSplitPipeline } from "./pipeline/split.ts";
export type { PipelineOptions, PipelineSettings } from "./pipeline/base.ts";
export { AlignmentPropagator, extractRoundSummary } from "./refinement/alignment.ts";
export { LoopState, RefinementConfig, RefinementLoop, callBudgetFor } from "./refinement/loop.ts";
export type { RefinementArtifact, RefinementOutcome } from "./refinement/loop.ts";
export { ResponseParser, parseVerdict, tryParseVerdict } from "./verdicts/parser.ts";
export type { Verdict } from "./verdicts/base.ts";
