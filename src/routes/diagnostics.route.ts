// ═════════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS ROUTE — Handles POST /diagnostics endpoint
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Route: POST /diagnostics
 * Purpose: Up to five likely diagnoses for an equipment issue on a listing
 *
 * Request body:
 *   { "message": "engine stalls under load", "listing_id": "L-1042", "session_id": "optional" }
 *
 * Response (200 OK):
 *   { "diagnostics": ["..."], "listing_id": "L-1042", "session_id": "...", "execution_time": 2.481 }
 */

import { Router, Request, Response } from "express";
import { AgentController } from "../controllers/agent.controller";
import { nonEmpty, requestId, turnSignal } from "../utils/http";
import { log, logError } from "../utils/logger";
import { DiagnosticsRequest, ErrorResponse } from "../utils/types";

export function diagnosticsRouter(controller: AgentController): Router {
  const router = Router();

  router.post("/diagnostics", async (req: Request, res: Response) => {
    const reqId  = requestId(req);
    const tTotal = Date.now();
    const body: DiagnosticsRequest = req.body ?? {};

    log(reqId, "request_received", { method: "POST", path: "/diagnostics" });

    const message   = nonEmpty(body.message);
    const listingId = nonEmpty(body.listing_id);
    if (!message || !listingId) {
      const field = !message ? "message" : "listing_id";
      log(reqId, "validation_failed", { reason: `missing_${field}` });
      const error: ErrorResponse = { error: `Missing or empty '${field}' in request body` };
      return res.status(400).json(error);
    }

    try {
      const result = await controller.diagnose(message, listingId, reqId, {
        sessionId: nonEmpty(body.session_id),
        signal:    turnSignal(res),
      });
      log(reqId, "response_sent", { status: 200, totalMs: Date.now() - tTotal, diagnostics: result.diagnostics.length });
      return res.json(result);
    } catch (err) {
      logError(reqId, "diagnostics_endpoint", err);
      log(reqId, "response_sent", { status: 500, totalMs: Date.now() - tTotal });
      const error: ErrorResponse = { error: err instanceof Error ? err.message : "Unknown error" };
      return res.status(500).json(error);
    }
  });

  return router;
}
