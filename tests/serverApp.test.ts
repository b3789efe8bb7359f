import { afterEach, describe, expect, it, vi } from "vitest";
import { DuplicateSessionError, ExportError, PipelineError } from "../src/errors";
import { silentLogger } from "../src/logger";
import { buildApp, safeSegment } from "../src/serverApp";
import { SessionStore } from "../src/services/sessionStore";
import { StyleMemory } from "../src/services/styleMemory";
import type { ExportResult, PipelineResult, PipelineState, StoryInput } from "../src/types";

const resultFor = (input: StoryInput): PipelineResult => ({
  session_id: input.sessionId,
  title: input.title,
  qa_context: input.qaContext,
  planner_output: { features: ["f"] },
  testcase_output: { test_cases: [] },
  global_validation_output: { valid: true }
});

const exportResult = (directory: string, filename: string): ExportResult => ({
  status: "success",
  path: `/exports/${directory}/${filename}`,
  bytes_written: 10
});

const createTestApp = () => {
  const sessions = new SessionStore();
  const memory = new StyleMemory();
  const orchestrator = {
    runPipeline: vi.fn(async (input: StoryInput) => resultFor(input)),
    getRunState: vi.fn((_sessionId: string): PipelineState | undefined => "DONE")
  };
  const exporter = {
    saveMarkdown: vi.fn(async (filename: string, _content: string) => exportResult("markdown", filename)),
    saveJson: vi.fn(async (filename: string, _data: unknown) => exportResult("json", filename))
  };
  const llm = {
    complete: vi.fn(async (_system: string, _user: string) => "pong")
  };

  const app = buildApp({ sessions, memory, orchestrator, exporter, llm, logger: silentLogger() });
  return { app, sessions, memory, orchestrator, exporter, llm };
};

describe("serverApp", () => {
  const apps = new Set<ReturnType<typeof createTestApp>["app"]>();

  const setup = () => {
    const harness = createTestApp();
    apps.add(harness.app);
    return harness;
  };

  afterEach(async () => {
    for (const app of apps) {
      await app.close();
    }
    apps.clear();
  });

  it("reports health and overview", async () => {
    const { app, sessions } = setup();
    sessions.startSession("s-1", "Story", "");

    const health = await app.inject({ method: "GET", url: "/api/health" });
    const overview = await app.inject({ method: "GET", url: "/api/tools/overview" });

    expect(health.json()).toEqual({ ok: true });
    expect(overview.statusCode).toBe(200);
    expect(overview.json()).toMatchObject({ ok: true, service: "storyqa-pipeline", sessions: 1, memoryExamples: 0 });
  });

  it("pings the model and reports provider failures as 502", async () => {
    const { app, llm } = setup();

    const ok = await app.inject({ method: "POST", url: "/api/tools/llm/ping", payload: { prompt: "hello" } });
    expect(ok.statusCode).toBe(200);
    expect(ok.json()).toMatchObject({ ok: true, output: "pong" });
    expect(llm.complete.mock.calls[0][1]).toBe("hello");

    llm.complete.mockRejectedValueOnce(new Error("provider down"));
    const failed = await app.inject({ method: "POST", url: "/api/tools/llm/ping", payload: {} });
    expect(failed.statusCode).toBe(502);
    expect(failed.json()).toMatchObject({ ok: false, error: "provider down" });
    expect(llm.complete.mock.calls[1][1]).toBe("Respond with one short line: pong");
  });

  it("validates pipeline run requests", async () => {
    const { app, orchestrator } = setup();

    const response = await app.inject({ method: "POST", url: "/api/pipeline/runs", payload: { description: "no title" } });

    expect(response.statusCode).toBe(400);
    expect(orchestrator.runPipeline).not.toHaveBeenCalled();
  });

  it("runs the pipeline with the request fields", async () => {
    const { app, orchestrator } = setup();

    const response = await app.inject({
      method: "POST",
      url: "/api/pipeline/runs",
      payload: { session_id: "s-9", title: "  Login  ", acceptance_criteria: ["Works"], qa_context: "web" }
    });

    expect(response.statusCode).toBe(200);
    expect(orchestrator.runPipeline).toHaveBeenCalledWith({
      sessionId: "s-9",
      title: "Login",
      description: "",
      acceptanceCriteria: ["Works"],
      qaContext: "web"
    });
    expect(response.json().result.session_id).toBe("s-9");
  });

  it("generates a session id when none is given", async () => {
    const { app, orchestrator } = setup();

    await app.inject({ method: "POST", url: "/api/pipeline/runs", payload: { title: "Login" } });

    expect(orchestrator.runPipeline.mock.calls[0][0].sessionId).toMatch(/^session-[0-9a-f]{8}$/);
  });

  it("maps duplicate sessions to 409 and stage failures to 502", async () => {
    const { app, orchestrator } = setup();

    orchestrator.runPipeline.mockRejectedValueOnce(new DuplicateSessionError("s-1"));
    const duplicate = await app.inject({ method: "POST", url: "/api/pipeline/runs", payload: { session_id: "s-1", title: "A" } });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json()).toEqual({ error: "Session s-1 already exists", sessionId: "s-1" });

    orchestrator.runPipeline.mockRejectedValueOnce(new PipelineError("s-2", "generator", new Error("timeout")));
    const failed = await app.inject({ method: "POST", url: "/api/pipeline/runs", payload: { session_id: "s-2", title: "B" } });
    expect(failed.statusCode).toBe(502);
    expect(failed.json()).toEqual({
      error: "Pipeline execution failed at stage generator: timeout",
      stage: "generator",
      sessionId: "s-2"
    });
  });

  it("lists and reads sessions", async () => {
    const { app, sessions } = setup();
    sessions.startSession("s-1", "Story", "web");

    const list = await app.inject({ method: "GET", url: "/api/sessions" });
    const found = await app.inject({ method: "GET", url: "/api/sessions/s-1" });
    const missing = await app.inject({ method: "GET", url: "/api/sessions/nope" });

    expect(list.json()).toEqual({ sessions: ["s-1"] });
    expect(found.json().session.metadata.title).toBe("Story");
    expect(found.json().state).toBe("DONE");
    expect(missing.statusCode).toBe(404);
  });

  it("lists memory examples", async () => {
    const { app, memory } = setup();
    memory.saveExample({
      story_id: "s-1",
      title: "Story",
      acceptance_criteria: [],
      planner_output: {},
      testcase_output: {},
      qa_context: ""
    });

    const response = await app.inject({ method: "GET", url: "/api/memory/examples" });

    expect(response.json().count).toBe(1);
    expect(response.json().examples[0].story_id).toBe("s-1");
  });

  it("evaluates artifacts on request", async () => {
    const { app } = setup();

    const response = await app.inject({
      method: "POST",
      url: "/api/evaluations",
      payload: { planner_output: {}, testcase_output: {} }
    });
    const invalid = await app.inject({ method: "POST", url: "/api/evaluations", payload: { planner_output: [] } });

    expect(response.statusCode).toBe(200);
    expect(response.json().consistency.score).toBe(70);
    expect(response.json().a2a.overall_score).toBe(42.5);
    expect(invalid.statusCode).toBe(400);
  });

  it("exports a session as markdown and json", async () => {
    const { app, sessions, exporter } = setup();
    sessions.startSession("s-1", "Story", "");
    sessions.saveStageOutput("s-1", "planner_output", { features: ["f"] });

    const response = await app.inject({ method: "POST", url: "/api/sessions/s-1/export" });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({
      markdown: exportResult("markdown", "s-1.md"),
      json: exportResult("json", "s-1.json")
    });
    expect(exporter.saveMarkdown.mock.calls[0][1]).toContain("# QA package: Story");
    expect(exporter.saveJson.mock.calls[0][1]).toEqual({
      session_id: "s-1",
      title: "Story",
      qa_context: "",
      planner_output: { features: ["f"] },
      testcase_output: {},
      global_validation_output: {}
    });
  });

  it("honours a custom export basename and rejects unsafe ones", async () => {
    const { app, sessions, exporter } = setup();
    sessions.startSession("s-1", "Story", "");
    sessions.saveStageOutput("s-1", "planner_output", { features: ["f"] });

    const custom = await app.inject({ method: "POST", url: "/api/sessions/s-1/export", payload: { basename: "login-qa" } });
    const unsafe = await app.inject({ method: "POST", url: "/api/sessions/s-1/export", payload: { basename: "../up" } });

    expect(custom.statusCode).toBe(201);
    expect(exporter.saveMarkdown.mock.calls[0][0]).toBe("login-qa.md");
    expect(unsafe.statusCode).toBe(400);
  });

  it("passes dot-prefixed basenames through and maps export failures to 400", async () => {
    const { app, sessions, exporter } = setup();
    sessions.startSession("s-1", "Story", "");
    sessions.saveStageOutput("s-1", "planner_output", { features: ["f"] });

    const dotted = await app.inject({ method: "POST", url: "/api/sessions/s-1/export", payload: { basename: "..draft" } });
    expect(dotted.statusCode).toBe(201);
    expect(exporter.saveMarkdown.mock.calls[0][0]).toBe("..draft.md");

    exporter.saveMarkdown.mockRejectedValueOnce(new ExportError("Unsafe export path rejected: x.md"));
    const failed = await app.inject({ method: "POST", url: "/api/sessions/s-1/export" });
    expect(failed.statusCode).toBe(400);
    expect(failed.json()).toEqual({ error: "Unsafe export path rejected: x.md", code: "EXPORT_FAILED" });
  });

  it("refuses to export unknown sessions or sessions without planner output", async () => {
    const { app, sessions } = setup();
    sessions.startSession("s-1", "Story", "");

    const empty = await app.inject({ method: "POST", url: "/api/sessions/s-1/export" });
    const missing = await app.inject({ method: "POST", url: "/api/sessions/nope/export" });

    expect(empty.statusCode).toBe(409);
    expect(missing.statusCode).toBe(404);
  });
});

describe("safeSegment", () => {
  it("replaces path separators and other unsafe characters", () => {
    expect(safeSegment("team/a..b c")).toBe("team_a..b_c");
    expect(safeSegment("session-1a2b3c4d")).toBe("session-1a2b3c4d");
  });
});
