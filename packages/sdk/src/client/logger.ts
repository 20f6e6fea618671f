/**
 * Structured Logging Utility
 *
 * Human-readable console lines by default; JSON lines when COMPUTECHAIN_LOG_JSON=1:
 *   { ts_ms, level, message, data }
 *
 * COMPUTECHAIN_LOG_LEVEL sets the threshold (debug | info | warn | error, default info).
 * Data is always passed through redactSecrets before it is printed.
 */

import { redactSecrets } from "../security/redact";

export type LogLevel = "info" | "warn" | "error" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const configured = process.env.COMPUTECHAIN_LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return LEVEL_RANK[configured];
  }
  return LEVEL_RANK.info;
}

/**
 * Log a message with optional data.
 */
export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  // Env is read per call so tests can flip it
  if (LEVEL_RANK[level] < threshold()) return;

  const jsonMode = process.env.COMPUTECHAIN_LOG_JSON === "1";
  const sanitizedData = data ? redactSecrets(data) : undefined;

  if (jsonMode) {
    const logLine = {
      ts_ms: Date.now(),
      level,
      message,
      ...(sanitizedData && { data: sanitizedData }),
    };
    console.log(JSON.stringify(logLine, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)));
  } else {
    const prefix = `[${level.toUpperCase()}]`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (sanitizedData) {
      sink(prefix, message, sanitizedData);
    } else {
      sink(prefix, message);
    }
  }
}
