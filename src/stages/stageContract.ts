import type { Artifact, StageErrorArtifact, StageKind } from "../types";

export interface GenerativeStage {
  invoke(payload: string): Promise<string>;
}

const openingFencePattern = /^```[\w+-]*[ \t]*\r?\n?/;
const closingFence = "```";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const normalizeStageText = (text: string): string => {
  const trimmed = text.trim();
  if (!trimmed.startsWith(closingFence)) {
    return trimmed;
  }

  let body = trimmed.replace(openingFencePattern, "");
  if (body.endsWith(closingFence)) {
    body = body.slice(0, -closingFence.length);
  }
  return body.trim();
};

export const createStageErrorArtifact = (kind: StageKind, rawOutput: string): StageErrorArtifact =>
  kind === "validator"
    ? { error: "invalid output", raw_output: rawOutput, valid: false }
    : { error: "invalid output", raw_output: rawOutput };

export const isStageErrorArtifact = (value: unknown): value is StageErrorArtifact =>
  isRecord(value) && value.error === "invalid output" && typeof value.raw_output === "string";

/** Never throws: unparseable or non-object replies become the sentinel artifact. */
export const parseStageOutput = (kind: StageKind, text: string): Artifact | StageErrorArtifact => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(normalizeStageText(text));
  } catch {
    return createStageErrorArtifact(kind, text);
  }

  return isRecord(parsed) ? parsed : createStageErrorArtifact(kind, text);
};

export const invokeStage = async (
  kind: StageKind,
  stage: GenerativeStage,
  payload: Record<string, unknown>
): Promise<Artifact | StageErrorArtifact> => {
  const raw = await stage.invoke(JSON.stringify(payload));
  return parseStageOutput(kind, raw);
};
