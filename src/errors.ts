import type { StageErrorArtifact, StageKind, StageName } from "./types";

export class StoryQaError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoryQaError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context
    };
  }
}

export class SessionError extends StoryQaError {
  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message, code, context);
    this.name = "SessionError";
  }
}

export class DuplicateSessionError extends SessionError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} already exists`, "DUPLICATE_SESSION", { sessionId });
    this.name = "DuplicateSessionError";
  }
}

export class UnknownSessionError extends SessionError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} does not exist`, "UNKNOWN_SESSION", { sessionId });
    this.name = "UnknownSessionError";
  }
}

export class InvalidStageNameError extends SessionError {
  constructor(readonly stageName: string, allowed: readonly StageName[]) {
    super(`Invalid stage name: ${stageName}. Must be one of: ${allowed.join(", ")}`, "INVALID_STAGE_NAME", {
      stageName,
      allowed: [...allowed]
    });
    this.name = "InvalidStageNameError";
  }
}

/** Raised when a stage answered, but with text that could not be turned into an artifact. */
export class StageOutputError extends StoryQaError {
  constructor(readonly stage: StageKind, readonly artifact: StageErrorArtifact) {
    super(`${stage} stage returned invalid output`, "STAGE_OUTPUT_INVALID", {
      stage,
      rawOutput: artifact.raw_output.slice(0, 500)
    });
    this.name = "StageOutputError";
  }
}

export class PipelineError extends StoryQaError {
  constructor(readonly sessionId: string, readonly stage: StageKind, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Pipeline execution failed at stage ${stage}: ${reason}`, "PIPELINE_FAILED", { sessionId, stage }, { cause });
    this.name = "PipelineError";
  }
}

export class ExportError extends StoryQaError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "EXPORT_FAILED", context);
    this.name = "ExportError";
  }
}

export const toErrorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
