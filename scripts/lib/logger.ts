/**
 * Structured logging. One JSON line per entry on stderr, stdout belongs to
 * the CLI's result.
 */

import { randomUUID } from "node:crypto";
import { LOG_LEVELS, type LogLevel } from "./env.js";

interface LogEntry {
  level: LogLevel;
  message: string;
  ts: string;
  errorId?: string;
  ctx?: Record<string, unknown>;
}

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function log(
  level: LogLevel,
  message: string,
  ctx?: Record<string, unknown>,
  error?: Error,
): string | undefined {
  if (!enabled(level)) return undefined;

  const entry: LogEntry = {
    level,
    message,
    ts: new Date().toISOString(),
    ctx,
  };

  if (error) {
    entry.errorId = randomUUID().slice(0, 8);
    entry.ctx = { ...ctx, error: error.message, stack: error.stack };
  }

  process.stderr.write(`${JSON.stringify(entry)}\n`);
  return entry.errorId;
}

export const logger = {
  debug: (msg: string, ctx?: Record<string, unknown>) => log("debug", msg, ctx),
  info: (msg: string, ctx?: Record<string, unknown>) => log("info", msg, ctx),
  warn: (msg: string, ctx?: Record<string, unknown>) => log("warn", msg, ctx),
  error: (msg: string, ctx?: Record<string, unknown>, err?: Error) =>
    log("error", msg, ctx, err),
};
