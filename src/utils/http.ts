// ═════════════════════════════════════════════════════════════════════════════
// HTTP — Helpers shared by the route handlers
// ═════════════════════════════════════════════════════════════════════════════

import { Request, Response } from "express";
import { genId } from "./logger";

/**
 * AbortSignal that fires when the client goes away before the response is
 * written. Passed down to the agent turn and from there to tool calls.
 */
export function turnSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Request ID for tracing: the caller's X-Request-Id header, or a fresh one.
 */
export function requestId(req: Request): string {
  return req.header("x-request-id") || genId();
}

/**
 * Returns the trimmed string, or undefined for anything that is not a non-empty string.
 */
export function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}
