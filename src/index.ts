export * from "./types";
export * from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger, CreateLoggerOptions } from "./logger";
export { traceStage } from "./observability/stageTrace";
export {
  createStageErrorArtifact,
  invokeStage,
  isStageErrorArtifact,
  normalizeStageText,
  parseStageOutput
} from "./stages/stageContract";
export type { GenerativeStage } from "./stages/stageContract";
export { SessionStore } from "./services/sessionStore";
export type { SessionStoreLike } from "./services/sessionStore";
export { StyleMemory, scoreTitleSimilarity, tokenizeTitle } from "./services/styleMemory";
export type { StyleMemoryLike } from "./services/styleMemory";
export { FileExporter } from "./services/fileExporter";
export { renderPipelineMarkdown } from "./services/markdownReport";
export { ConsistencyEvaluator, consistencyDeductions } from "./evaluation/consistencyEvaluator";
export { A2AEvaluator, componentWeights, weightedOverallScore } from "./evaluation/a2aEvaluator";
export { PipelineOrchestrator } from "./orchestrator/pipelineOrchestrator";
export type {
  PipelineOrchestratorOptions,
  PipelineStages,
  PipelineStateListener
} from "./orchestrator/pipelineOrchestrator";
export { StoryPlannerAgent } from "./agents/storyPlannerAgent";
export { TestCaseGeneratorAgent } from "./agents/testCaseGeneratorAgent";
export { GlobalValidatorAgent } from "./agents/globalValidatorAgent";
export type { JsonLlmLike, PromptObserver, StagePromptTrace } from "./agents/stagePrompt";
export { OpenAiClient } from "./llm/openaiClient";
export type { OpenAiClientOptions } from "./llm/openaiClient";
export { createRuntime } from "./runtime";
export type { LlmClientLike, Runtime, RuntimeOptions } from "./runtime";
export { buildApp, createSessionId } from "./serverApp";
export type { ServerDeps } from "./serverApp";
export { storyInputSchema } from "./schemas/storyInput";
export type { StoryInputBody } from "./schemas/storyInput";
