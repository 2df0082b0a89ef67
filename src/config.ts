import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const DEFAULT_BASE_URL = "https://dwd.api.bund.dev";
export const DEFAULT_TIMEOUT_MS = 30_000;

const envSchema = z.object({
  DWD_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  DWD_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface ServerConfig {
  baseUrl: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    baseUrl: result.data.DWD_API_BASE_URL,
    timeoutMs: result.data.DWD_REQUEST_TIMEOUT_MS,
    logLevel: result.data.LOG_LEVEL,
  };
}
