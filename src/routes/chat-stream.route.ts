// ═════════════════════════════════════════════════════════════════════════════
// CHAT STREAM ROUTE — Handles POST /chat/stream endpoint (Server-Sent Events)
// ═════════════════════════════════════════════════════════════════════════════

/**
 * ROUTE RESPONSIBILITY: Receive HTTP request, call controller, stream events
 *
 * Route: POST /chat/stream
 * Purpose: One chat turn whose answer is pushed as it is generated
 *
 * Request body: same as POST /chat
 *
 * Response (200 OK, text/event-stream), one JSON event per `data:` line:
 *   data: {"type":"session","session_id":"..."}
 *   data: {"type":"tool_start","tool":"send_document"}
 *   data: {"type":"tool_complete","tool":"send_document"}
 *   data: {"type":"content","content":"Document 'Kubota SVL97-2 Repair Guide' "}
 *   data: {"type":"content","content":"has been sent successfully."}
 *   data: {"type":"done","execution_time":1.42}
 *
 * An agent failure after the stream has started ends it with
 *   data: {"type":"error","error":"..."}
 *
 * Response (400 Bad Request):
 *   { "error": "Missing or empty 'message' in request body" }
 */

import { Router, Request, Response } from "express";
import { AgentController } from "../controllers/agent.controller";
import { nonEmpty, requestId, turnSignal } from "../utils/http";
import { log, logError } from "../utils/logger";
import { ChatRequest, ChatStreamEvent, ErrorResponse } from "../utils/types";

export const SSE_HEADERS = {
  "Content-Type":      "text/event-stream",
  "Cache-Control":     "no-cache",
  Connection:          "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

export function formatEvent(event: ChatStreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function chatStreamRouter(controller: AgentController): Router {
  const router = Router();

  router.post("/chat/stream", async (req: Request, res: Response) => {
    const reqId  = requestId(req);
    const tTotal = Date.now();
    const body: ChatRequest = req.body ?? {};

    log(reqId, "request_received", { method: "POST", path: "/chat/stream" });

    const message = nonEmpty(body.message);
    if (!message) {
      log(reqId, "validation_failed", { reason: "missing_message" });
      const error: ErrorResponse = { error: "Missing or empty 'message' in request body" };
      return res.status(400).json(error);
    }

    const turn = controller.chatStream(message, reqId, {
      sessionId: nonEmpty(body.session_id),
      signal:    turnSignal(res),
    });

    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    const send = (event: ChatStreamEvent): void => {
      if (!res.destroyed) {
        res.write(formatEvent(event));
      }
    };

    send({ type: "session", session_id: turn.session_id });

    let events = 0;
    try {
      for await (const event of turn.events) {
        events++;
        send(event);
      }
      const totalMs = Date.now() - tTotal;
      send({ type: "done", execution_time: totalMs / 1000 });
      log(reqId, "response_sent", { status: 200, events, totalMs });
    } catch (err) {
      logError(reqId, "chat_stream_endpoint", err);
      log(reqId, "stream_failed", { events, totalMs: Date.now() - tTotal });
      send({ type: "error", error: err instanceof Error ? err.message : "Unknown error" });
    }

    return res.end();
  });

  return router;
}
