import { validatorPayloadSchema } from "../schemas/stagePayloads";
import type { GenerativeStage } from "../stages/stageContract";
import { decodeStagePayload, formatJson, invalidPayloadReply, type JsonLlmLike, type PromptObserver } from "./stagePrompt";

const validationRules = [
  "1. Every scenario in planner_output.scenarios maps to at least one test case.",
  "2. Every test case has at least one Given, one When and one Then step, each clear and actionable.",
  "3. Expected results are specific and testable.",
  "4. No duplicate test cases (same title or logically identical steps).",
  "5. Edge cases and bug risks relate to the story.",
  "6. Titles, scenario ids and flows agree with planner_output.",
  "7. Preferences named in the QA context show up in the test cases or edge cases."
];

export class GlobalValidatorAgent implements GenerativeStage {
  constructor(
    private readonly llm: JsonLlmLike,
    private readonly onPrompt?: PromptObserver
  ) {}

  async invoke(payload: string): Promise<string> {
    const input = decodeStagePayload(validatorPayloadSchema, payload);
    if (!input) {
      return invalidPayloadReply;
    }

    const system = [
      "You are a senior QA reviewer checking a generated QA package end to end.",
      "Do not rewrite the artifacts; only judge them.",
      "Return JSON only with keys valid (boolean), errors (array of strings), warnings (array of strings).",
      `Rules:\n${validationRules.join("\n")}`
    ].join(" ");

    const user = [
      `Planner output:\n${formatJson(input.planner_output)}`,
      `Test case output:\n${formatJson(input.testcase_output)}`,
      `QA context:\n${input.qa_context || "(none)"}`
    ].join("\n\n");

    this.onPrompt?.({ stage: "validator", system, user });
    return this.llm.completeJsonObject(system, user);
  }
}
