import { z } from "zod";

const artifactSchema = z.record(z.unknown());

export const plannerPayloadSchema = z.object({
  title: z.string().default(""),
  description: z.string().default(""),
  acceptance_criteria: z.array(z.string()).default([]),
  qa_context: z.string().default("")
});

export const generatorPayloadSchema = z.object({
  planner_output: artifactSchema.default({}),
  qa_context: z.string().default(""),
  similar_examples: z.array(artifactSchema).default([])
});

export const validatorPayloadSchema = z.object({
  planner_output: artifactSchema.default({}),
  testcase_output: artifactSchema.default({}),
  qa_context: z.string().default("")
});
