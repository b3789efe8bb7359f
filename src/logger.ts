import pino, { type Logger, type LoggerOptions } from "pino";
import { config } from "./config";

export type { Logger };

export interface CreateLoggerOptions {
  level?: string;
  pretty?: boolean;
}

const redactPaths = ["apiKey", "*.apiKey", "openaiApiKey", "*.openaiApiKey", "headers.authorization"];

const defaultLevel = (): string => {
  if (config.logLevel) return config.logLevel;
  if (process.env.NODE_ENV === "production") return "info";
  if (process.env.NODE_ENV === "test") return "silent";
  return "info";
};

export const createLogger = (name: string, options: CreateLoggerOptions = {}): Logger => {
  const base: LoggerOptions = {
    name,
    level: options.level ?? defaultLevel(),
    redact: redactPaths,
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (options.pretty ?? config.logPretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    });
  }

  return pino(base);
};

export const silentLogger = (): Logger => pino({ level: "silent" });
