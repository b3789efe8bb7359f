import { randomUUID } from "node:crypto";
import fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "./config";
import { DuplicateSessionError, ExportError, PipelineError, toErrorMessage } from "./errors";
import { A2AEvaluator } from "./evaluation/a2aEvaluator";
import { ConsistencyEvaluator } from "./evaluation/consistencyEvaluator";
import type { Logger } from "./logger";
import { evaluationRequestSchema, exportRequestSchema, storyInputSchema } from "./schemas/storyInput";
import { renderPipelineMarkdown } from "./services/markdownReport";
import type { SessionStoreLike } from "./services/sessionStore";
import type { ExportResult, MemoryExample, PipelineResult, PipelineState, Session, StoryInput } from "./types";

export interface PipelineRunnerLike {
  runPipeline(input: StoryInput): Promise<PipelineResult>;
  getRunState(sessionId: string): PipelineState | undefined;
}

export interface MemoryReaderLike {
  getAllExamples(): MemoryExample[];
  readonly size: number;
}

export interface ExporterLike {
  saveMarkdown(filename: string, content: string): Promise<ExportResult>;
  saveJson(filename: string, data: unknown): Promise<ExportResult>;
}

export interface LlmLike {
  complete(system: string, user: string): Promise<string>;
}

export interface ServerDeps {
  sessions: SessionStoreLike;
  memory: MemoryReaderLike;
  orchestrator: PipelineRunnerLike;
  exporter: ExporterLike;
  llm: LlmLike;
  logger: Logger;
}

interface SessionParams {
  id: string;
}

const llmPingSchema = z.object({
  prompt: z.string().min(1).max(200).default("Respond with one short line: pong")
});

export const safeSegment = (value: string): string => value.replace(/[^a-zA-Z0-9._-]/g, "_");

export const createSessionId = (): string => `session-${randomUUID().replace(/-/g, "").slice(0, 8)}`;

const sessionToResult = (session: Session): PipelineResult | undefined => {
  const plannerOutput = session.stages.planner_output;
  if (!plannerOutput) return undefined;

  return {
    session_id: session.id,
    title: session.metadata.title,
    qa_context: session.metadata.qa_context,
    planner_output: plannerOutput,
    testcase_output: session.stages.testcase_output ?? {},
    global_validation_output: session.stages.global_validation_output ?? {}
  };
};

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: false });
  const consistency = new ConsistencyEvaluator();
  const a2a = new A2AEvaluator();

  app.addHook("onResponse", async (request, reply) => {
    deps.logger.info({ method: request.method, url: request.url, statusCode: reply.statusCode }, "request completed");
  });

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/tools/overview", async () => ({
    ok: true,
    service: "storyqa-pipeline",
    model: config.model,
    openaiBaseUrl: config.openaiBaseUrl,
    sessions: deps.sessions.listSessions().length,
    memoryExamples: deps.memory.size,
    now: new Date().toISOString()
  }));

  app.post("/api/tools/llm/ping", async (request, reply) => {
    const parsed = llmPingSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const started = Date.now();
    try {
      const output = await deps.llm.complete(
        "You are a health-check assistant. Respond in one short plain-text sentence.",
        parsed.data.prompt
      );
      return { ok: true, latencyMs: Date.now() - started, output: output.slice(0, 1000) };
    } catch (error: unknown) {
      return reply.code(502).send({ ok: false, latencyMs: Date.now() - started, error: toErrorMessage(error) });
    }
  });

  app.post("/api/pipeline/runs", async (request, reply) => {
    const parsed = storyInputSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const sessionId = parsed.data.session_id ?? createSessionId();
    try {
      const result = await deps.orchestrator.runPipeline({
        sessionId,
        title: parsed.data.title,
        description: parsed.data.description,
        acceptanceCriteria: parsed.data.acceptance_criteria,
        qaContext: parsed.data.qa_context
      });
      return { result };
    } catch (error: unknown) {
      if (error instanceof DuplicateSessionError) {
        return reply.code(409).send({ error: error.message, sessionId });
      }
      if (error instanceof PipelineError) {
        deps.logger.warn({ sessionId, stage: error.stage, err: error.message }, "pipeline run failed");
        return reply.code(502).send({ error: error.message, stage: error.stage, sessionId });
      }
      throw error;
    }
  });

  app.get("/api/sessions", async () => ({ sessions: deps.sessions.listSessions() }));

  app.get<{ Params: SessionParams }>("/api/sessions/:id", async (request, reply) => {
    const { id } = request.params;
    const session = deps.sessions.getSession(id);
    if (!session) {
      return reply.code(404).send({ error: "Session not found" });
    }
    return { session, state: deps.orchestrator.getRunState(id) ?? null };
  });

  app.get("/api/memory/examples", async () => ({
    count: deps.memory.size,
    examples: deps.memory.getAllExamples()
  }));

  app.post("/api/evaluations", async (request, reply) => {
    const parsed = evaluationRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const { planner_output: plannerOutput, testcase_output: testcaseOutput } = parsed.data;
    return {
      consistency: consistency.evaluate(plannerOutput, testcaseOutput),
      a2a: a2a.evaluate(plannerOutput, testcaseOutput)
    };
  });

  app.post<{ Params: SessionParams }>("/api/sessions/:id/export", async (request, reply) => {
    const { id } = request.params;
    const parsed = exportRequestSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const session = deps.sessions.getSession(id);
    if (!session) {
      return reply.code(404).send({ error: "Session not found" });
    }

    const result = sessionToResult(session);
    if (!result) {
      return reply.code(409).send({ error: "Session has no planner output to export yet" });
    }

    const basename = parsed.data.basename ?? safeSegment(id);
    try {
      const markdown = await deps.exporter.saveMarkdown(`${basename}.md`, renderPipelineMarkdown(result));
      const json = await deps.exporter.saveJson(`${basename}.json`, result);
      return reply.code(201).send({ markdown, json });
    } catch (error: unknown) {
      if (error instanceof ExportError) {
        return reply.code(400).send({ error: error.message, code: error.code });
      }
      throw error;
    }
  });

  return app;
};
