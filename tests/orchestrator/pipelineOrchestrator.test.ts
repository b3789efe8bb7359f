import { describe, expect, it, vi } from "vitest";
import { DuplicateSessionError, PipelineError, StageOutputError } from "../../src/errors";
import { silentLogger } from "../../src/logger";
import { PipelineOrchestrator } from "../../src/orchestrator/pipelineOrchestrator";
import { SessionStore } from "../../src/services/sessionStore";
import { StyleMemory } from "../../src/services/styleMemory";
import type { PipelineState, StoryInput } from "../../src/types";

const plannerOutput = {
  features: ["Edit display name"],
  scenarios: [{ scenario_id: "SC-1", title: "Rename", acceptance_criteria: "Name changes", tags: [] }],
  notes: [],
  acceptance_criteria_input: ["Name changes"]
};

const testcaseOutput = {
  test_cases: [
    {
      id: "TC-1",
      title: "SC-1 rename",
      preconditions: [],
      steps: ["Given a user", "When they rename", "Then the name changes"],
      expected_result: "New name shown"
    }
  ],
  edge_cases: [],
  bug_risks: []
};

const validationOutput = { valid: true, errors: [], warnings: [] };

const replyWith = (reply: string) => ({ invoke: vi.fn(async (_payload: string) => reply) });

const story = (overrides: Partial<StoryInput> = {}): StoryInput => ({
  sessionId: "session-1",
  title: "User can rename profile",
  description: "Rename flow",
  acceptanceCriteria: ["Name changes"],
  qaContext: "web",
  ...overrides
});

const createHarness = (replies: { planner?: string; generator?: string; validator?: string } = {}) => {
  const sessions = new SessionStore();
  const memory = new StyleMemory();
  const stages = {
    planner: replyWith(replies.planner ?? JSON.stringify(plannerOutput)),
    generator: replyWith(replies.generator ?? `\`\`\`json\n${JSON.stringify(testcaseOutput)}\n\`\`\``),
    validator: replyWith(replies.validator ?? JSON.stringify(validationOutput))
  };
  const orchestrator = new PipelineOrchestrator(memory, sessions, stages, { logger: silentLogger() });
  const states: PipelineState[] = [];
  orchestrator.onStateChange((_sessionId, state) => states.push(state));

  return { sessions, memory, stages, orchestrator, states };
};

describe("PipelineOrchestrator", () => {
  it("runs planner, generator and validator and persists every artifact", async () => {
    const { sessions, memory, stages, orchestrator, states } = createHarness();

    const result = await orchestrator.runPipeline(story());

    expect(result).toEqual({
      session_id: "session-1",
      title: "User can rename profile",
      qa_context: "web",
      planner_output: plannerOutput,
      testcase_output: { ...testcaseOutput, planner_output: plannerOutput },
      global_validation_output: validationOutput
    });

    const session = sessions.getSession("session-1");
    expect(session?.stages).toEqual({
      planner_output: plannerOutput,
      testcase_output: { ...testcaseOutput, planner_output: plannerOutput },
      automation_output: null,
      global_validation_output: validationOutput
    });
    expect(session?.metadata.title).toBe("User can rename profile");
    expect(session?.metadata.qa_context).toBe("web");

    expect(JSON.parse(stages.planner.invoke.mock.calls[0][0])).toEqual({
      title: "User can rename profile",
      description: "Rename flow",
      acceptance_criteria: ["Name changes"],
      qa_context: "web"
    });
    expect(JSON.parse(stages.validator.invoke.mock.calls[0][0])).toEqual({
      planner_output: plannerOutput,
      testcase_output: { ...testcaseOutput, planner_output: plannerOutput },
      qa_context: "web"
    });

    expect(memory.getAllExamples()).toEqual([
      {
        story_id: "session-1",
        title: "User can rename profile",
        acceptance_criteria: ["Name changes"],
        planner_output: plannerOutput,
        testcase_output: { ...testcaseOutput, planner_output: plannerOutput },
        qa_context: "web"
      }
    ]);
    expect(states).toEqual(["INIT", "PLANNING", "MEMORY_LOOKUP", "GENERATING", "VALIDATING", "PERSISTED", "DONE"]);
    expect(orchestrator.getRunState("session-1")).toBe("DONE");
  });

  it("keeps a planner_output the generator already echoed", async () => {
    const echoed = { ...testcaseOutput, planner_output: { features: ["echoed"] } };
    const { orchestrator } = createHarness({ generator: JSON.stringify(echoed) });

    const result = await orchestrator.runPipeline(story());

    expect(result.testcase_output.planner_output).toEqual({ features: ["echoed"] });
  });

  it("hands at most three similar examples to the generator", async () => {
    const { memory, stages, orchestrator } = createHarness();
    for (const id of ["a", "b", "c", "d"]) {
      memory.saveExample({
        story_id: id,
        title: `Rename profile ${id}`,
        acceptance_criteria: [],
        planner_output: {},
        testcase_output: {},
        qa_context: ""
      });
    }

    await orchestrator.runPipeline(story());

    const payload = JSON.parse(stages.generator.invoke.mock.calls[0][0]);
    expect(payload.similar_examples.map((item: { story_id: string }) => item.story_id)).toEqual(["a", "b", "c"]);
    expect(payload.planner_output).toEqual(plannerOutput);
    expect(payload.qa_context).toBe("web");
  });

  it("passes an empty example list when memory has nothing similar", async () => {
    const { stages, orchestrator } = createHarness();

    await orchestrator.runPipeline(story());

    expect(JSON.parse(stages.generator.invoke.mock.calls[0][0]).similar_examples).toEqual([]);
  });

  it("fails at the planner on unparseable output and persists nothing", async () => {
    const { sessions, memory, stages, orchestrator, states } = createHarness({ planner: "Sorry, I cannot help." });

    const failure = await orchestrator.runPipeline(story()).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(PipelineError);
    if (!(failure instanceof PipelineError)) return;
    expect(failure.stage).toBe("planner");
    expect(failure.message).toBe("Pipeline execution failed at stage planner: planner stage returned invalid output");
    expect(failure.cause).toBeInstanceOf(StageOutputError);

    expect(sessions.getSession("session-1")?.stages.planner_output).toBeNull();
    expect(stages.generator.invoke).not.toHaveBeenCalled();
    expect(memory.size).toBe(0);
    expect(states).toEqual(["INIT", "PLANNING", "FAILED"]);
  });

  it("keeps the planner checkpoint when the generator throws", async () => {
    const { sessions, memory, stages, orchestrator } = createHarness();
    stages.generator.invoke.mockRejectedValueOnce(new Error("rate limited"));

    await expect(orchestrator.runPipeline(story())).rejects.toThrow(
      "Pipeline execution failed at stage generator: rate limited"
    );

    const session = sessions.getSession("session-1");
    expect(session?.stages.planner_output).toEqual(plannerOutput);
    expect(session?.stages.testcase_output).toBeNull();
    expect(stages.validator.invoke).not.toHaveBeenCalled();
    expect(memory.size).toBe(0);
    expect(orchestrator.getRunState("session-1")).toBe("FAILED");
  });

  it("fails at the validator on unparseable output and skips the memory write", async () => {
    const { sessions, memory, orchestrator } = createHarness({ validator: "valid: yes" });

    await expect(orchestrator.runPipeline(story())).rejects.toMatchObject({ stage: "validator" });

    const session = sessions.getSession("session-1");
    expect(session?.stages.testcase_output).not.toBeNull();
    expect(session?.stages.global_validation_output).toBeNull();
    expect(memory.size).toBe(0);
  });

  it("rejects a reused session id before running any stage", async () => {
    const { stages, orchestrator } = createHarness();
    await orchestrator.runPipeline(story());

    await expect(orchestrator.runPipeline(story())).rejects.toBeInstanceOf(DuplicateSessionError);
    expect(stages.planner.invoke).toHaveBeenCalledTimes(1);
  });

  it("honours a custom similar example limit", async () => {
    const sessions = new SessionStore();
    const memory = new StyleMemory();
    const lookup = vi.spyOn(memory, "getSimilarExamples");
    const orchestrator = new PipelineOrchestrator(
      memory,
      sessions,
      {
        planner: replyWith(JSON.stringify(plannerOutput)),
        generator: replyWith(JSON.stringify(testcaseOutput)),
        validator: replyWith(JSON.stringify(validationOutput))
      },
      { logger: silentLogger(), similarExampleLimit: 1 }
    );

    await orchestrator.runPipeline(story());

    expect(lookup).toHaveBeenCalledWith("User can rename profile", 1);
  });

  it("does not let edits to the returned result leak into memory or checkpoints", async () => {
    const { sessions, memory, orchestrator } = createHarness();

    const result = await orchestrator.runPipeline(story());
    const features = result.planner_output.features;
    if (!Array.isArray(features)) throw new Error("expected features list");
    features.push("edited by caller");

    expect(memory.getAllExamples()[0].planner_output).toEqual(plannerOutput);
    expect(sessions.getSession("session-1")?.stages.planner_output).toEqual(plannerOutput);
  });

  it("keeps running when a state listener throws", async () => {
    const { orchestrator } = createHarness();
    orchestrator.onStateChange(() => {
      throw new Error("listener broke");
    });

    await expect(orchestrator.runPipeline(story())).resolves.toMatchObject({ session_id: "session-1" });
    expect(orchestrator.getRunState("session-1")).toBe("DONE");
  });

  it("still reports the stage failure when a listener throws on FAILED", async () => {
    const { orchestrator } = createHarness({ planner: "not json" });
    orchestrator.onStateChange((_sessionId, state) => {
      if (state === "FAILED") throw new Error("listener broke");
    });

    await expect(orchestrator.runPipeline(story())).rejects.toBeInstanceOf(PipelineError);
    expect(orchestrator.getRunState("session-1")).toBe("FAILED");
  });

  it("stops notifying a listener after it unsubscribes", async () => {
    const { orchestrator } = createHarness();
    const listener = vi.fn();
    const unsubscribe = orchestrator.onStateChange(listener);
    unsubscribe();

    await orchestrator.runPipeline(story());

    expect(listener).not.toHaveBeenCalled();
  });
});
