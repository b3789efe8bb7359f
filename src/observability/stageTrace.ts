import { performance } from "node:perf_hooks";
import type { Logger } from "../logger";
import { toErrorMessage } from "../errors";

const elapsedSince = (started: number): number => Math.round((performance.now() - started) * 100) / 100;

export const traceStage = async <T>(logger: Logger, stage: string, run: () => Promise<T>): Promise<T> => {
  logger.info({ stage }, "stage started");
  const started = performance.now();

  try {
    const result = await run();
    logger.info({ stage, durationMs: elapsedSince(started) }, "stage finished");
    return result;
  } catch (error: unknown) {
    logger.error(
      {
        stage,
        durationMs: elapsedSince(started),
        errorType: error instanceof Error ? error.name : typeof error,
        err: toErrorMessage(error)
      },
      "stage failed"
    );
    throw error;
  }
};
