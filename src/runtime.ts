import { GlobalValidatorAgent } from "./agents/globalValidatorAgent";
import type { JsonLlmLike, StagePromptTrace } from "./agents/stagePrompt";
import { StoryPlannerAgent } from "./agents/storyPlannerAgent";
import { TestCaseGeneratorAgent } from "./agents/testCaseGeneratorAgent";
import { OpenAiClient } from "./llm/openaiClient";
import type { Logger } from "./logger";
import { PipelineOrchestrator } from "./orchestrator/pipelineOrchestrator";
import { FileExporter } from "./services/fileExporter";
import { SessionStore } from "./services/sessionStore";
import { StyleMemory } from "./services/styleMemory";

export interface LlmClientLike extends JsonLlmLike {
  complete(system: string, user: string): Promise<string>;
  assertModelAvailable?(): Promise<void>;
}

export interface RuntimeOptions {
  logger: Logger;
  llm?: LlmClientLike;
  exportRoot?: string;
}

export interface Runtime {
  logger: Logger;
  llm: LlmClientLike;
  sessions: SessionStore;
  memory: StyleMemory;
  orchestrator: PipelineOrchestrator;
  exporter: FileExporter;
}

export const createRuntime = (options: RuntimeOptions): Runtime => {
  const { logger } = options;
  const llm = options.llm ?? new OpenAiClient({ logger: logger.child({ component: "llm" }) });
  const sessions = new SessionStore();
  const memory = new StyleMemory();

  const promptLogger = logger.child({ component: "prompts" });
  const logPrompt = (trace: StagePromptTrace): void => {
    promptLogger.debug({ stage: trace.stage, system: trace.system, user: trace.user }, `${trace.stage} prompt captured`);
  };

  const orchestrator = new PipelineOrchestrator(
    memory,
    sessions,
    {
      planner: new StoryPlannerAgent(llm, logPrompt),
      generator: new TestCaseGeneratorAgent(llm, logPrompt),
      validator: new GlobalValidatorAgent(llm, logPrompt)
    },
    { logger: logger.child({ component: "orchestrator" }) }
  );

  return {
    logger,
    llm,
    sessions,
    memory,
    orchestrator,
    exporter: new FileExporter(options.exportRoot)
  };
};
