// ═════════════════════════════════════════════════════════════════════════════
// WEBHOOK DISPATCHER SERVICE — Deliver a document notification over HTTP
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Responsibility:
 * - POST one DocumentNotification to the configured webhook
 * - Attach the bearer token when a secret is configured
 * - Bound the whole exchange by WEBHOOK_TIMEOUT_MS
 * - Classify the outcome into a DispatchResult
 *
 * One attempt per call. There is no retry, queue or delivery record here.
 * Reachability is decided at startup (see WEBHOOK_SETTING): this service is
 * only wired in when a webhook URL exists, so it does not check for one.
 */

import { WebhookConfig } from "../utils/config";
import { log, logError } from "../utils/logger";
import { DispatchResult, DocumentNotification } from "../utils/types";

export const WEBHOOK_TIMEOUT_MS = 10_000;

export interface DispatchOptions {
  reqId?:     string;
  // Cancels the request when the surrounding agent turn is abandoned
  signal?:    AbortSignal;
  timeoutMs?: number;
}

/**
 * Builds the request headers. No Authorization header at all without a secret.
 */
export function buildWebhookHeaders(config: WebhookConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (config.secret) {
    headers["Authorization"] = `Bearer ${config.secret}`;
  }
  return headers;
}

/**
 * Releases the connection without reading the receiver's body.
 */
async function discardBody(response: Response, reqId: string): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    logError(reqId, "webhook_body_discard", err);
  }
}

/**
 * Sends the notification and resolves to a DispatchResult. Never rejects.
 *
 * SERVICE RESPONSIBILITY: External HTTP call with a bounded time budget
 */
export async function sendDocumentNotification(
  config: WebhookConfig,
  notification: DocumentNotification,
  options: DispatchOptions = {}
): Promise<DispatchResult> {
  const reqId     = options.reqId ?? "-";
  const timeoutMs = options.timeoutMs ?? WEBHOOK_TIMEOUT_MS;
  const tStart    = Date.now();

  const body = JSON.stringify({
    title:     notification.title,
    url:       notification.url,
    recipient: notification.recipient,
    timestamp: notification.timestamp,
  });

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onCallerAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });
  }

  let response: Response;
  try {
    response = await fetch(config.url, {
      method:   "POST",
      headers:  buildWebhookHeaders(config),
      body,
      redirect: "manual",
      signal:   controller.signal,
    });
  } catch (err) {
    if (timedOut) {
      log(reqId, "webhook_timeout", { title: notification.title, timeoutMs });
      return { kind: "timed_out" };
    }
    logError(reqId, "webhook_unreachable", err);
    return { kind: "unreachable", reason: err instanceof Error ? err.message : String(err) };
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener("abort", onCallerAbort);
  }

  await discardBody(response, reqId);
  const durationMs = Date.now() - tStart;

  if (response.status >= 200 && response.status < 300) {
    log(reqId, "webhook_delivered", { title: notification.title, status: response.status, durationMs });
    return { kind: "delivered", title: notification.title };
  }

  log(reqId, "webhook_rejected", { title: notification.title, status: response.status, durationMs });
  return { kind: "rejected", status: response.status };
}
