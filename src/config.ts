import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const config = {
  port: toInt(process.env.PORT, 3000),
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
  model: process.env.OPENAI_MODEL ?? "gpt-4.1-mini",
  llmTimeoutMs: toInt(process.env.LLM_TIMEOUT_MS, 120_000),
  exportRoot: path.resolve(process.env.EXPORT_ROOT ?? "exports"),
  logLevel: process.env.LOG_LEVEL,
  logPretty: process.env.LOG_PRETTY === "true"
};

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env.");
  }
};
