/**
 * Structured logger writing to stderr.
 *
 * - Plain `[time] [LEVEL] [module]` lines, or JSON objects when LOG_FORMAT=json
 * - Minimum level from LOG_LEVEL (default: info)
 * - session_id / ledger_id context fields, inherited by child loggers
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  sessionId?: string;
  ledgerId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields into every later entry. */
  setContext(ctx: LogContext): void;
  /** Start a timer. The returned stop function logs and returns elapsed ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const level = resolveMinLevel(minLevel);
  const minPriority = LEVEL_PRIORITY[level];
  const useJson = isJsonFormat();
  let context: LogContext = { ...parentContext };

  function log(
    entryLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;

    const timestamp = new Date().toISOString();
    const hasData = data !== undefined && Object.keys(data).length > 0;

    if (useJson) {
      const entry: Record<string, unknown> = {
        timestamp,
        level: entryLevel,
        module: name,
        message,
      };
      if (context.sessionId) entry.session_id = context.sessionId;
      if (context.ledgerId) entry.ledger_id = context.ledgerId;
      if (hasData) Object.assign(entry, data);
      console.error(JSON.stringify(entry));
      return;
    }

    const prefix = `[${timestamp}] [${entryLevel.toUpperCase()}] [${name}]`;
    console.error(hasData ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, level, { ...context }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
