import { z } from "zod";
import type { StageKind } from "../types";

export interface JsonLlmLike {
  completeJsonObject(system: string, user: string): Promise<string>;
}

export interface StagePromptTrace {
  stage: StageKind;
  system: string;
  user: string;
}

export type PromptObserver = (trace: StagePromptTrace) => void;

export const invalidPayloadReply = "Error: Input must be JSON.";

export const decodeStagePayload = <Schema extends z.ZodTypeAny>(schema: Schema, payload: string): z.output<Schema> | undefined => {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return undefined;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
};

export const formatJson = (value: unknown): string => JSON.stringify(value, null, 2);
