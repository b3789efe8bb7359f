#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { assertConfig } from "./config";
import { toErrorMessage } from "./errors";
import { A2AEvaluator } from "./evaluation/a2aEvaluator";
import { ConsistencyEvaluator } from "./evaluation/consistencyEvaluator";
import { createLogger } from "./logger";
import { createRuntime } from "./runtime";
import { storyInputSchema, type StoryInputBody } from "./schemas/storyInput";
import { createSessionId, safeSegment } from "./serverApp";
import { renderPipelineMarkdown } from "./services/markdownReport";

const usage = [
  "Usage: storyqa (--input story.json | --demo) [--session-id id] [--evaluate] [--export]",
  "  --input       JSON file with title, description, acceptance_criteria and qa_context",
  "  --demo        run the built-in profile update story",
  "  --session-id  session id to use (default: random)",
  "  --evaluate    print consistency and A2A evaluation reports",
  "  --export      write Markdown and JSON exports under EXPORT_ROOT"
].join("\n");

const demoStory: StoryInputBody = {
  title: "User can update profile information",
  description:
    "As a registered user, I want to update my display name and email address so that my account details stay current.",
  acceptance_criteria: [
    "User can change the display name from the profile page",
    "Changing the email requires confirming the new address",
    "Invalid email formats are rejected with an error message"
  ],
  qa_context: "Web app, logged-in users only"
};

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const hasFlag = (name: string): boolean => process.argv.includes(`--${name}`);

const readStoryFile = async (filePath: string): Promise<StoryInputBody> => {
  const raw = await fs.readFile(path.resolve(filePath), "utf8");
  const parsed = storyInputSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid story file ${filePath}:\n${issues.join("\n")}`);
  }
  return parsed.data;
};

const main = async (): Promise<void> => {
  const inputPath = getArgValue("input")?.trim();
  const useDemo = hasFlag("demo");

  if (!inputPath && !useDemo) {
    console.error(usage);
    process.exit(1);
  }

  assertConfig();
  const logger = createLogger("storyqa-cli");
  const runtime = createRuntime({ logger });
  if (runtime.llm.assertModelAvailable) {
    await runtime.llm.assertModelAvailable();
  }

  const story = inputPath ? await readStoryFile(inputPath) : demoStory;
  const sessionId = getArgValue("session-id")?.trim() || story.session_id || createSessionId();

  runtime.orchestrator.onStateChange((id, state) => {
    logger.info({ sessionId: id, state }, "pipeline state changed");
  });

  const result = await runtime.orchestrator.runPipeline({
    sessionId,
    title: story.title,
    description: story.description,
    acceptanceCriteria: story.acceptance_criteria,
    qaContext: story.qa_context
  });

  console.log(JSON.stringify(result, null, 2));

  if (hasFlag("evaluate")) {
    const consistency = new ConsistencyEvaluator().evaluate(result.planner_output, result.testcase_output);
    const a2a = new A2AEvaluator().evaluate(result.planner_output, result.testcase_output);
    console.log(JSON.stringify({ consistency, a2a }, null, 2));
  }

  if (hasFlag("export")) {
    const basename = safeSegment(sessionId);
    const markdown = await runtime.exporter.saveMarkdown(`${basename}.md`, renderPipelineMarkdown(result));
    const json = await runtime.exporter.saveJson(`${basename}.json`, result);
    console.log(`Markdown export: ${markdown.path} (${markdown.bytes_written} bytes)`);
    console.log(`JSON export: ${json.path} (${json.bytes_written} bytes)`);
  }
};

main().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  process.exit(1);
});
