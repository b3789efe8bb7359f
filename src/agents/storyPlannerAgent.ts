import { plannerPayloadSchema } from "../schemas/stagePayloads";
import type { GenerativeStage } from "../stages/stageContract";
import { decodeStagePayload, invalidPayloadReply, type JsonLlmLike, type PromptObserver } from "./stagePrompt";

export class StoryPlannerAgent implements GenerativeStage {
  constructor(
    private readonly llm: JsonLlmLike,
    private readonly onPrompt?: PromptObserver
  ) {}

  async invoke(payload: string): Promise<string> {
    const input = decodeStagePayload(plannerPayloadSchema, payload);
    if (!input) {
      return invalidPayloadReply;
    }

    const system = [
      "You are a senior QA analyst breaking a user story into testable pieces.",
      "Return JSON only.",
      "Keys required: features, scenarios, notes, acceptance_criteria_input.",
      "features: 3-8 short strings. notes: strings.",
      "scenarios items must include scenario_id (SC-1, SC-2, ...), title, acceptance_criteria, tags (array of strings).",
      "Link every acceptance criterion to at least one scenario.",
      "acceptance_criteria_input must echo the acceptance criteria you were given."
    ].join(" ");

    const user = [
      `Story title:\n${input.title}`,
      `Description:\n${input.description || "(none)"}`,
      `Acceptance criteria:\n${input.acceptance_criteria.map((item) => `- ${item}`).join("\n") || "(none)"}`,
      `QA context:\n${input.qa_context || "(none)"}`
    ].join("\n\n");

    this.onPrompt?.({ stage: "planner", system, user });
    return this.llm.completeJsonObject(system, user);
  }
}
