// ═════════════════════════════════════════════════════════════════════════════
// APP — Express application assembly
// ═════════════════════════════════════════════════════════════════════════════

/**
 * ARCHITECTURE:
 *
 *              HTTP Request
 *                   ↓
 *              ROUTES Layer
 *           (HTTP parsing & validation)
 *                   ↓
 *           CONTROLLERS Layer
 *        (Agent turn orchestration)
 *                   ↓
 *           SERVICES / TOOLS Layer
 *   (Gemini agent loop, SQL tool, document webhook)
 *                   ↓
 *        Gemini / Postgres / Webhook receiver
 */

import express, { Express } from "express";
import { AgentController } from "./controllers/agent.controller";
import { chatRouter } from "./routes/chat.route";
import { chatStreamRouter } from "./routes/chat-stream.route";
import { diagnosticsRouter } from "./routes/diagnostics.route";
import { healthRouter } from "./routes/health.route";
import { voiceRouter } from "./routes/voice.route";

export interface AppDeps {
  controller:       AgentController;
  documentDelivery: boolean;
}

export function createApp({ controller, documentDelivery }: AppDeps): Express {
  const app = express();

  // Parse incoming JSON request bodies
  app.use(express.json());

  app.use(healthRouter(documentDelivery));  // GET  /healthz
  app.use(chatRouter(controller));          // POST /chat
  app.use(chatStreamRouter(controller));    // POST /chat/stream (SSE)
  app.use(diagnosticsRouter(controller));   // POST /diagnostics
  app.use(voiceRouter(controller));         // POST /voice/turn

  return app;
}
