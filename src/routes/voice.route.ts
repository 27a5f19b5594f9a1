// ═════════════════════════════════════════════════════════════════════════════
// VOICE ROUTE — Handles POST /voice/turn endpoint
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Route: POST /voice/turn
 * Purpose: One spoken turn. The voice pipeline posts the speech-to-text
 * transcript and speaks the returned replyText.
 *
 * Request body:
 *   { "transcript": "send me the loader manual", "session_id": "optional" }
 *
 * Response (200 OK):
 *   { "replyText": "...", "session_id": "..." }
 */

import { Router, Request, Response } from "express";
import { AgentController } from "../controllers/agent.controller";
import { nonEmpty, requestId, turnSignal } from "../utils/http";
import { log, logError } from "../utils/logger";
import { ErrorResponse, VoiceTurnRequest, VoiceTurnResponse } from "../utils/types";

export function voiceRouter(controller: AgentController): Router {
  const router = Router();

  router.post("/voice/turn", async (req: Request, res: Response) => {
    const reqId  = requestId(req);
    const tTotal = Date.now();
    const body: VoiceTurnRequest = req.body ?? {};

    log(reqId, "request_received", { method: "POST", path: "/voice/turn" });

    const transcript = nonEmpty(body.transcript);
    if (!transcript) {
      log(reqId, "validation_failed", { reason: "missing_transcript" });
      const error: ErrorResponse = { error: "Missing or empty 'transcript' in request body" };
      return res.status(400).json(error);
    }

    try {
      const result: VoiceTurnResponse = await controller.voiceTurn(transcript, reqId, {
        sessionId: nonEmpty(body.session_id),
        signal:    turnSignal(res),
      });
      log(reqId, "response_sent", { status: 200, totalMs: Date.now() - tTotal });
      return res.json(result);
    } catch (err) {
      logError(reqId, "voice_endpoint", err);
      log(reqId, "response_sent", { status: 500, totalMs: Date.now() - tTotal });
      const error: ErrorResponse = { error: err instanceof Error ? err.message : "Unknown error" };
      return res.status(500).json(error);
    }
  });

  return router;
}
