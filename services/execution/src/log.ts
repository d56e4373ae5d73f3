import { jsonStringify } from "@loanloop/common";
import type { TraceId } from "@loanloop/common";

export type LogLevel = "debug" | "info" | "warn" | "error";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function logLine(
  service: string,
  level: LogLevel,
  trace_id: TraceId,
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (RANK[level] < RANK[threshold]) return;

  const base = `[${service}][${level}][trace=${trace_id}] ${message}`;
  const suffix = meta ? ` ${jsonStringify(meta)}` : "";

  if (level === "error") console.error(`${base}${suffix}`);
  else if (level === "warn") console.warn(`${base}${suffix}`);
  else console.log(`${base}${suffix}`);
}
