// ═════════════════════════════════════════════════════════════════════════════
// MAIN — Startup sequence and HTTP server
// ═════════════════════════════════════════════════════════════════════════════

/**
 * This file:
 * 1. Validates the environment and logs boot information
 * 2. Checks database connectivity
 * 3. Builds each surface's toolset once (document delivery gated here)
 * 4. Starts the HTTP server
 */

import { createApp } from "./app";
import { createAgentController } from "./controllers/agent.controller";
import { createGeminiClient, createGeminiModel, createGeminiStreamModel } from "./services/gemini.service";
import { AGENT_SURFACES, buildAllToolsets } from "./tools/registry";
import { APP_CONFIG, WEBHOOK_SETTING, assertRequiredEnv, logBootInfo } from "./utils/config";
import { checkDB, closeDB, executeReadOnly } from "./utils/database";

async function startup(): Promise<void> {
  assertRequiredEnv();
  logBootInfo();

  await checkDB();

  const toolsets = buildAllToolsets({
    webhook:     WEBHOOK_SETTING,
    sqlExecutor: executeReadOnly,
  });
  for (const surface of AGENT_SURFACES) {
    console.log(`[BOOT] tools[${surface}] = ${[...toolsets[surface].keys()].join(", ") || "(none)"}`);
  }

  const gemini = createGeminiClient();
  const controller = createAgentController({
    model:       createGeminiModel(gemini),
    streamModel: createGeminiStreamModel(gemini),
    toolsets,
  });

  const app = createApp({ controller, documentDelivery: WEBHOOK_SETTING.enabled });

  const PORT = APP_CONFIG.port;
  const server = app.listen(PORT, () => {
    console.log(`🚀 Agent server running on http://localhost:${PORT}`);
    console.log(`   POST /chat         { "message": "..." }`);
    console.log(`   POST /chat/stream  { "message": "..." }  (text/event-stream)`);
    console.log(`   POST /diagnostics  { "message": "...", "listing_id": "..." }`);
    console.log(`   POST /voice/turn   { "transcript": "..." }`);
    console.log(`   GET  /healthz`);
  });

  const shutdown = (signal: string): void => {
    console.log(`[shutdown] ${signal} received, closing server`);
    server.close(() => {
      closeDB()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[shutdown] DB close failed:", err instanceof Error ? err.message : String(err));
          process.exit(1);
        });
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

startup().catch((err) => {
  console.error("[startup] Fatal error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
