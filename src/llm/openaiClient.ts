import OpenAI from "openai";
import { config } from "../config";
import { toErrorMessage } from "../errors";
import type { Logger } from "../logger";

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  logger?: Logger;
}

const defaultOptions = (): OpenAiClientOptions => ({
  apiKey: config.openaiApiKey,
  baseUrl: config.openaiBaseUrl,
  model: config.model,
  timeoutMs: config.llmTimeoutMs
});

const readStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
};

const readMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
};

interface ResponsesBody {
  output_text?: unknown;
  output?: unknown;
}

const extractResponseText = (response: ResponsesBody): string => {
  if (typeof response.output_text === "string" && response.output_text.trim()) {
    return response.output_text.trim();
  }

  const chunks: string[] = [];
  if (Array.isArray(response.output)) {
    for (const item of response.output) {
      const content: unknown = typeof item === "object" && item !== null && "content" in item ? item.content : undefined;
      if (!Array.isArray(content)) continue;
      for (const part of content) {
        if (typeof part !== "object" || part === null) continue;
        if ("type" in part && part.type === "output_text" && "text" in part && typeof part.text === "string" && part.text.trim()) {
          chunks.push(part.text.trim());
        }
      }
    }
  }

  if (chunks.length === 0) {
    throw new Error("LLM returned empty output.");
  }
  return chunks.join("\n");
};

export class OpenAiClient {
  private readonly client: OpenAI;
  private readonly options: OpenAiClientOptions;
  private modelValidationPromise?: Promise<void>;

  constructor(options: Partial<OpenAiClientOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
    this.client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseUrl,
      timeout: this.options.timeoutMs
    });
  }

  private static isNotFoundError(error: unknown): boolean {
    return readStatus(error) === 404 || /not found/i.test(readMessage(error));
  }

  private static isModelUnknownError(error: unknown): boolean {
    return /unknown model|invalid model|model .* does not exist|no such model|unsupported model/i.test(readMessage(error));
  }

  private static isModelsListUnsupportedError(error: unknown): boolean {
    const status = readStatus(error);
    if (status === 404 || status === 405 || status === 501) return true;
    return /models?.*(not found|unsupported)|unsupported.*models?/i.test(readMessage(error));
  }

  private toUnknownModelError(error: unknown): Error {
    return new Error(
      [
        `Configured OPENAI_MODEL "${this.options.model}" is not available on ${this.options.baseUrl}.`,
        "Set OPENAI_MODEL to a provider-supported model and restart.",
        `Original error: ${readMessage(error)}`
      ].join(" ")
    );
  }

  private async validateWithModelsList(): Promise<void> {
    const response = await this.client.models.list();
    const modelIds = response.data.map((item) => item.id.trim()).filter(Boolean);

    if (modelIds.length === 0 || modelIds.includes(this.options.model)) {
      return;
    }

    const sample = modelIds.slice(0, 8).join(", ");
    throw new Error(`Configured OPENAI_MODEL "${this.options.model}" is not in provider model list. Available models (sample): ${sample}`);
  }

  private async probeModelByRequest(): Promise<void> {
    try {
      await this.client.chat.completions.create({
        model: this.options.model,
        messages: [{ role: "user", content: "ping" }],
        max_tokens: 1,
        temperature: 0
      });
      return;
    } catch (error: unknown) {
      if (OpenAiClient.isModelUnknownError(error)) {
        throw this.toUnknownModelError(error);
      }
      if (!OpenAiClient.isNotFoundError(error)) {
        throw error;
      }
    }

    try {
      await this.client.responses.create({
        model: this.options.model,
        input: "ping",
        max_output_tokens: 16
      });
    } catch (error: unknown) {
      if (OpenAiClient.isModelUnknownError(error)) {
        throw this.toUnknownModelError(error);
      }
      throw error;
    }
  }

  private async runModelValidation(): Promise<void> {
    try {
      await this.validateWithModelsList();
      return;
    } catch (error: unknown) {
      if (OpenAiClient.isModelUnknownError(error)) {
        throw this.toUnknownModelError(error);
      }
      if (!OpenAiClient.isModelsListUnsupportedError(error)) {
        throw error;
      }
      this.options.logger?.debug({ err: toErrorMessage(error) }, "models list unsupported, probing model directly");
    }

    await this.probeModelByRequest();
  }

  async assertModelAvailable(): Promise<void> {
    if (!this.modelValidationPromise) {
      this.modelValidationPromise = this.runModelValidation();
    }
    return this.modelValidationPromise;
  }

  private async completeWithChat(system: string, user: string, jsonObject: boolean): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user }
      ],
      ...(jsonObject ? { response_format: { type: "json_object" as const } } : {})
    });

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }

  private async completeWithResponses(system: string, user: string): Promise<string> {
    const response = await this.client.responses.create({
      model: this.options.model,
      instructions: system,
      input: user
    });
    return extractResponseText(response);
  }

  private async completeWithFallback(system: string, user: string, jsonObject: boolean): Promise<string> {
    await this.assertModelAvailable();

    try {
      return await this.completeWithChat(system, user, jsonObject);
    } catch (error: unknown) {
      if (!OpenAiClient.isNotFoundError(error)) {
        throw error;
      }
      this.options.logger?.debug("chat completions unavailable, falling back to responses api");
    }

    return this.completeWithResponses(system, user);
  }

  async complete(system: string, user: string): Promise<string> {
    return this.completeWithFallback(system, user, false);
  }

  async completeJsonObject(system: string, user: string): Promise<string> {
    return this.completeWithFallback(system, user, true);
  }
}
