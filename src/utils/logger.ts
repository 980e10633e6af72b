// ═════════════════════════════════════════════════════════════════════════════
// LOGGER — Structured logging utility for debugging and tracing requests
// ═════════════════════════════════════════════════════════════════════════════

import { LOG_CONFIG } from "./config";

/**
 * Generates a random 6-character ID for request tracing.
 * Used in logs for end-to-end request tracking.
 */
export function genId(): string {
  return Math.random().toString(36).slice(2, 8);
}

/**
 * Logs a structured message with request ID and stage information.
 * All logs are prefixed with [LCR] so they can be grepped out of the host's log stream.
 *
 * @param reqId - Unique request identifier for tracing
 * @param stage - Current stage (e.g., "request_received", "rows_generated")
 * @param extra - Additional key-value pairs to include in the log
 */
export function log(reqId: string, stage: string, extra: Record<string, string | number> = {}): void {
  if (LOG_CONFIG.level !== "info") return;
  const parts = [`[LCR] reqId=${reqId}`, `stage=${stage}`];
  for (const [k, v] of Object.entries(extra)) {
    parts.push(`${k}=${v}`);
  }
  console.log(parts.join(" "));
}

/**
 * Logs an error with error details, stack trace, and request context.
 *
 * @param reqId - Unique request identifier for tracing
 * @param stage - Stage where the error occurred
 * @param err - The error object or message
 */
export function logError(reqId: string, stage: string, err: unknown): void {
  if (LOG_CONFIG.level === "silent") return;
  const message = err instanceof Error ? err.message : String(err);
  const stack   = err instanceof Error ? (err.stack ?? "") : "";
  console.error(`[LCR] reqId=${reqId} stage=${stage} ERROR message="${message}"\n${stack}`);
}
