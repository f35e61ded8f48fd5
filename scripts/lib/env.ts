import { z } from "zod";
import { HEADERS, TIMEOUTS } from "./constants.js";
import { ArgsException } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  BILI_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUTS.request),
  BILI_USER_AGENT: z.string().min(1).default(HEADERS.userAgent),
  BILI_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface ClientConfig {
  timeoutMs: number;
  userAgent: string;
  referer: string;
  logLevel: LogLevel;
}

export function getClientConfig(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ArgsException(`Invalid ${issue.path.join(".")}: ${issue.message}`);
  }
  return {
    timeoutMs: parsed.data.BILI_TIMEOUT_MS,
    userAgent: parsed.data.BILI_USER_AGENT,
    referer: HEADERS.referer,
    logLevel: parsed.data.BILI_LOG_LEVEL,
  };
}
