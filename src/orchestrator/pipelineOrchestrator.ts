import { PipelineError, StageOutputError, toErrorMessage } from "../errors";
import type { Logger } from "../logger";
import { traceStage } from "../observability/stageTrace";
import type { SessionStoreLike } from "../services/sessionStore";
import type { StyleMemoryLike } from "../services/styleMemory";
import { type GenerativeStage, invokeStage, isStageErrorArtifact } from "../stages/stageContract";
import type { Artifact, PipelineResult, PipelineState, StageKind, StageName, StoryInput } from "../types";

export interface PipelineStages {
  planner: GenerativeStage;
  generator: GenerativeStage;
  validator: GenerativeStage;
}

export interface PipelineOrchestratorOptions {
  logger: Logger;
  similarExampleLimit?: number;
}

export type PipelineStateListener = (sessionId: string, state: PipelineState) => void;

const stageSlots: Record<StageKind, StageName> = {
  planner: "planner_output",
  generator: "testcase_output",
  validator: "global_validation_output"
};

const stageStates: Record<StageKind, PipelineState> = {
  planner: "PLANNING",
  generator: "GENERATING",
  validator: "VALIDATING"
};

export class PipelineOrchestrator {
  private readonly logger: Logger;
  private readonly similarExampleLimit: number;
  private readonly runStates = new Map<string, PipelineState>();
  private readonly listeners = new Set<PipelineStateListener>();

  constructor(
    private readonly memory: StyleMemoryLike,
    private readonly sessions: SessionStoreLike,
    private readonly stages: PipelineStages,
    options: PipelineOrchestratorOptions
  ) {
    this.logger = options.logger;
    this.similarExampleLimit = options.similarExampleLimit ?? 3;
  }

  getRunState(sessionId: string): PipelineState | undefined {
    return this.runStates.get(sessionId);
  }

  onStateChange(listener: PipelineStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private transition(sessionId: string, state: PipelineState): void {
    this.runStates.set(sessionId, state);
    for (const listener of this.listeners) {
      try {
        listener(sessionId, state);
      } catch (error: unknown) {
        this.logger.warn({ sessionId, state, err: toErrorMessage(error) }, "state listener failed");
      }
    }
  }

  private async runStage(
    sessionId: string,
    kind: StageKind,
    payload: Record<string, unknown>,
    log: Logger
  ): Promise<Artifact> {
    this.transition(sessionId, stageStates[kind]);

    try {
      return await traceStage(log, kind, async () => {
        const output = await invokeStage(kind, this.stages[kind], payload);
        if (isStageErrorArtifact(output)) {
          throw new StageOutputError(kind, output);
        }
        return output;
      });
    } catch (error: unknown) {
      this.transition(sessionId, "FAILED");
      throw new PipelineError(sessionId, kind, error);
    }
  }

  private checkpoint(sessionId: string, kind: StageKind, artifact: Artifact): void {
    try {
      this.sessions.saveStageOutput(sessionId, stageSlots[kind], artifact);
    } catch (error: unknown) {
      this.transition(sessionId, "FAILED");
      throw new PipelineError(sessionId, kind, error);
    }
  }

  async runPipeline(input: StoryInput): Promise<PipelineResult> {
    const { sessionId, title, description, acceptanceCriteria, qaContext } = input;
    const log = this.logger.child({ sessionId });

    // Duplicate ids throw here, before any stage runs.
    this.sessions.startSession(sessionId, title, qaContext);
    this.transition(sessionId, "INIT");
    log.info({ title, acceptanceCriteria: acceptanceCriteria.length }, "pipeline started");

    const plannerOutput = await this.runStage(
      sessionId,
      "planner",
      {
        title,
        description,
        acceptance_criteria: acceptanceCriteria,
        qa_context: qaContext
      },
      log
    );
    this.checkpoint(sessionId, "planner", plannerOutput);

    this.transition(sessionId, "MEMORY_LOOKUP");
    const similarExamples = this.memory.getSimilarExamples(title, this.similarExampleLimit);
    log.debug({ similarExamples: similarExamples.length }, "style memory consulted");

    const generated = await this.runStage(
      sessionId,
      "generator",
      {
        planner_output: plannerOutput,
        qa_context: qaContext,
        similar_examples: similarExamples
      },
      log
    );
    const testcaseOutput: Artifact = "planner_output" in generated ? generated : { ...generated, planner_output: plannerOutput };
    this.checkpoint(sessionId, "generator", testcaseOutput);

    const validationOutput = await this.runStage(
      sessionId,
      "validator",
      {
        planner_output: plannerOutput,
        testcase_output: testcaseOutput,
        qa_context: qaContext
      },
      log
    );
    this.checkpoint(sessionId, "validator", validationOutput);
    this.transition(sessionId, "PERSISTED");

    this.memory.saveExample({
      story_id: sessionId,
      title,
      acceptance_criteria: [...acceptanceCriteria],
      planner_output: plannerOutput,
      testcase_output: testcaseOutput,
      qa_context: qaContext
    });
    this.transition(sessionId, "DONE");
    log.info({ valid: validationOutput.valid }, "pipeline finished");

    return {
      session_id: sessionId,
      title,
      qa_context: qaContext,
      planner_output: plannerOutput,
      testcase_output: testcaseOutput,
      global_validation_output: validationOutput
    };
  }
}
