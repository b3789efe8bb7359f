import { generatorPayloadSchema } from "../schemas/stagePayloads";
import type { GenerativeStage } from "../stages/stageContract";
import { decodeStagePayload, formatJson, invalidPayloadReply, type JsonLlmLike, type PromptObserver } from "./stagePrompt";

export class TestCaseGeneratorAgent implements GenerativeStage {
  constructor(
    private readonly llm: JsonLlmLike,
    private readonly onPrompt?: PromptObserver
  ) {}

  async invoke(payload: string): Promise<string> {
    const input = decodeStagePayload(generatorPayloadSchema, payload);
    if (!input) {
      return invalidPayloadReply;
    }

    const system = [
      "You are a senior QA engineer turning planned scenarios into test cases.",
      "Return JSON only.",
      "Keys required: test_cases, edge_cases, bug_risks, planner_output.",
      "test_cases items: id (TC-1, TC-2, ...), title, preconditions (array of strings), steps (array of strings), expected_result.",
      "Every test case needs at least one step starting with 'Given', one with 'When' and one with 'Then'.",
      "Write 1-3 test cases per scenario and mention the scenario_id in the title or steps of each.",
      "edge_cases items: id (EC-1, ...), description. bug_risks items: id (BR-1, ...), description.",
      "planner_output must be the planner JSON you were given, unchanged.",
      "Let the QA context steer emphasis; treat similar examples as style references only."
    ].join(" ");

    const user = [
      `Planner output:\n${formatJson(input.planner_output)}`,
      `QA context:\n${input.qa_context || "(none)"}`,
      `Similar examples:\n${input.similar_examples.length > 0 ? formatJson(input.similar_examples) : "(none)"}`
    ].join("\n\n");

    this.onPrompt?.({ stage: "generator", system, user });
    return this.llm.completeJsonObject(system, user);
  }
}
