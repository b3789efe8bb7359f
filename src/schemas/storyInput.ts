import { z } from "zod";

export const storyInputSchema = z.object({
  session_id: z.string().trim().min(1).max(200).optional(),
  title: z.string().trim().min(1).max(500),
  description: z.string().max(20_000).default(""),
  acceptance_criteria: z.array(z.string().trim().min(1)).default([]),
  qa_context: z.string().max(4000).default("")
});

export type StoryInputBody = z.infer<typeof storyInputSchema>;

export const evaluationRequestSchema = z.object({
  planner_output: z.record(z.unknown()),
  testcase_output: z.record(z.unknown())
});

export const exportRequestSchema = z.object({
  basename: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9._-]+$/, "basename may only contain letters, digits, dot, underscore and dash")
    .optional()
});
