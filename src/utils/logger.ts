// ═════════════════════════════════════════════════════════════════════════════
// LOGGER — Structured logging utility for debugging and tracing requests
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Generates a random 6-character ID for request tracing.
 * Used in logs for end-to-end request tracking across agent turns and tool calls.
 */
export function genId(): string {
  return Math.random().toString(36).slice(2, 8);
}

/**
 * Logs a structured message with request ID and stage information.
 * All logs are prefixed with [AGENT] for easy grepping in log viewers.
 *
 * @param reqId - Unique request identifier for tracing
 * @param stage - Current stage (e.g., "agent_round", "webhook_delivered")
 * @param extra - Additional key-value pairs to include in the log
 */
export function log(reqId: string, stage: string, extra: Record<string, string | number | boolean> = {}): void {
  const parts = [`[AGENT] reqId=${reqId}`, `stage=${stage}`];
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
  const message = err instanceof Error ? err.message : String(err);
  const stack   = err instanceof Error ? (err.stack ?? "") : "";
  console.error(`[AGENT] reqId=${reqId} stage=${stage} ERROR message="${message}"\n${stack}`);
}
