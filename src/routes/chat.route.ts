// ═════════════════════════════════════════════════════════════════════════════
// CHAT ROUTE — Handles POST /chat endpoint
// ═════════════════════════════════════════════════════════════════════════════

/**
 * ROUTE RESPONSIBILITY: Receive HTTP request, call controller, send HTTP response
 *
 * Route: POST /chat
 * Purpose: One conversational turn with the chat agent
 *
 * Request body:
 *   {
 *     "message": "Can you send me the SVL97-2 repair guide?",
 *     "session_id": "optional session to continue",
 *     "user_id": "optional user identifier"
 *   }
 *
 * Response (200 OK):
 *   { "response": "Document 'Kubota SVL97-2 Repair Guide' has been sent successfully.", "session_id": "..." }
 *
 * Response (400 Bad Request):
 *   { "error": "Missing or empty 'message' in request body" }
 *
 * Response (500 Internal Server Error):
 *   { "error": "Error message describing what went wrong" }
 */

import { Router, Request, Response } from "express";
import { AgentController } from "../controllers/agent.controller";
import { nonEmpty, requestId, turnSignal } from "../utils/http";
import { log, logError } from "../utils/logger";
import { ChatRequest, ChatResponse, ErrorResponse } from "../utils/types";

export function chatRouter(controller: AgentController): Router {
  const router = Router();

  router.post("/chat", async (req: Request, res: Response) => {
    const reqId  = requestId(req);
    const tTotal = Date.now();
    const body: ChatRequest = req.body ?? {};

    log(reqId, "request_received", { method: "POST", path: "/chat" });

    const message = nonEmpty(body.message);
    if (!message) {
      log(reqId, "validation_failed", { reason: "missing_message" });
      const error: ErrorResponse = { error: "Missing or empty 'message' in request body" };
      return res.status(400).json(error);
    }

    try {
      const result = await controller.chat(message, reqId, {
        sessionId: nonEmpty(body.session_id),
        signal:    turnSignal(res),
      });

      log(reqId, "response_sent", { status: 200, totalMs: result.executionTime });
      const payload: ChatResponse = { response: result.response, session_id: result.session_id };
      return res.json(payload);
    } catch (err) {
      logError(reqId, "chat_endpoint", err);
      log(reqId, "response_sent", { status: 500, totalMs: Date.now() - tTotal });
      const error: ErrorResponse = { error: err instanceof Error ? err.message : "Unknown error" };
      return res.status(500).json(error);
    }
  });

  return router;
}
