import { readRecords, readStrings, readText } from "../evaluation/artifactFields";
import type { PipelineResult } from "../types";

const bulletList = (items: string[]): string[] => (items.length > 0 ? items.map((item) => `- ${item}`) : ["_None._"]);

const describeItems = (source: unknown, key: string): string[] =>
  readRecords(source, key).map((item) => `${readText(item, "id") || "?"}: ${readText(item, "description")}`);

export const renderPipelineMarkdown = (result: PipelineResult): string => {
  const planner = result.planner_output;
  const testcases = result.testcase_output;
  const validation = result.global_validation_output;

  const lines: string[] = [`# QA package: ${result.title}`, "", `- Session: \`${result.session_id}\``];
  if (result.qa_context) {
    lines.push(`- QA context: ${result.qa_context}`);
  }

  lines.push("", "## Features", "", ...bulletList(readStrings(planner, "features")));

  lines.push("", "## Scenarios", "");
  const scenarios = readRecords(planner, "scenarios");
  if (scenarios.length === 0) {
    lines.push("_None._");
  }
  for (const scenario of scenarios) {
    const tags = readStrings(scenario, "tags");
    const tagText = tags.length > 0 ? ` (${tags.join(", ")})` : "";
    lines.push(`- **${readText(scenario, "scenario_id")}** ${readText(scenario, "title")}${tagText}`);
    const criterion = readText(scenario, "acceptance_criteria");
    if (criterion) {
      lines.push(`  - Acceptance criterion: ${criterion}`);
    }
  }

  lines.push("", "## Test cases");
  const testCases = readRecords(testcases, "test_cases");
  if (testCases.length === 0) {
    lines.push("", "_None._");
  }
  for (const testCase of testCases) {
    lines.push("", `### ${readText(testCase, "id")} ${readText(testCase, "title")}`.trimEnd());
    const preconditions = readStrings(testCase, "preconditions");
    if (preconditions.length > 0) {
      lines.push("", "Preconditions:", ...bulletList(preconditions));
    }
    lines.push("", "Steps:", ...readStrings(testCase, "steps").map((step, index) => `${index + 1}. ${step}`));
    lines.push("", `Expected result: ${readText(testCase, "expected_result") || "_missing_"}`);
  }

  lines.push("", "## Edge cases", "", ...bulletList(describeItems(testcases, "edge_cases")));
  lines.push("", "## Bug risks", "", ...bulletList(describeItems(testcases, "bug_risks")));

  const verdict = validation.valid === true ? "valid" : "invalid";
  lines.push("", "## Validation", "", `Verdict: **${verdict}**`);
  const errors = readStrings(validation, "errors");
  const warnings = readStrings(validation, "warnings");
  if (errors.length > 0) {
    lines.push("", "Errors:", ...bulletList(errors));
  }
  if (warnings.length > 0) {
    lines.push("", "Warnings:", ...bulletList(warnings));
  }

  return `${lines.join("\n")}\n`;
};
