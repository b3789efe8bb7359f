import { assertConfig, config } from "./config";
import { createLogger } from "./logger";
import { createRuntime } from "./runtime";
import { buildApp } from "./serverApp";

const logger = createLogger("storyqa-server");
const runtime = createRuntime({ logger });

runtime.orchestrator.onStateChange((sessionId, state) => {
  logger.debug({ sessionId, state }, "pipeline state changed");
});

const app = buildApp({
  sessions: runtime.sessions,
  memory: runtime.memory,
  orchestrator: runtime.orchestrator,
  exporter: runtime.exporter,
  llm: runtime.llm,
  logger: logger.child({ component: "http" })
});

const start = async (): Promise<void> => {
  assertConfig();
  if (runtime.llm.assertModelAvailable) {
    await runtime.llm.assertModelAvailable();
  }
  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port }, "server listening");
};

start().catch((error: unknown) => {
  logger.error({ err: error }, "server failed to start");
  process.exit(1);
});
