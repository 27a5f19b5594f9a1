// ═════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTE — Handles GET /healthz endpoint
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Route: GET /healthz
 * Purpose: Health check endpoint for load balancers and orchestration systems
 *
 * Response (200 OK):
 *   { "ok": true, "documentDelivery": true }
 *
 * Always 200 while the process is alive; no database or Gemini calls.
 * `documentDelivery` reports whether send_document was registered at startup.
 */

import { Router, Request, Response } from "express";

export function healthRouter(documentDelivery: boolean): Router {
  const router = Router();

  router.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true, documentDelivery });
  });

  return router;
}
