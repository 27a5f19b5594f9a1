// ═════════════════════════════════════════════════════════════════════════════
// CONFIG — Application configuration constants and environment variables
// ═════════════════════════════════════════════════════════════════════════════

import * as dotenv from "dotenv";

dotenv.config();

// ── Required environment variables (validated at startup) ────────────────────────
const REQUIRED_ENV = ["GEMINI_API_KEY", "DB_NAME", "DB_USER", "DB_PASSWORD"] as const;

/**
 * Throws if any variable the agents cannot run without is missing.
 * Called from the startup sequence, not at import, so tests can load modules
 * that read config without a full environment.
 */
export function assertRequiredEnv(env: NodeJS.ProcessEnv = process.env): void {
  for (const key of REQUIRED_ENV) {
    if (!env[key]) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  }
}

// ── Application Metadata ──────────────────────────────────────────────────────────
export const APP_CONFIG = {
  serviceName: "service-agent-api",
  renderCommit: process.env.RENDER_GIT_COMMIT || "unknown",
  port: Number(process.env.PORT) || 8000,
} as const;

// ── Database Configuration ────────────────────────────────────────────────────────
// DB_SSL: set "true" or "false" to force; if absent, SSL is auto-enabled when
// running on Render (RENDER env var is always present there).
const DB_SSL = process.env.DB_SSL !== undefined
  ? process.env.DB_SSL === "true"
  : !!process.env.RENDER;

export const DB_CONFIG = {
  host: process.env.DB_HOST || "localhost",
  port: Number(process.env.DB_PORT) || 5432,
  database: process.env.DB_NAME,
  user: process.env.DB_USER,
  password: process.env.DB_PASSWORD,
  ssl: DB_SSL ? { rejectUnauthorized: false } : undefined,
} as const;

// ── Gemini Configuration ──────────────────────────────────────────────────────────
export const GEMINI_CONFIG = {
  apiKey: process.env.GEMINI_API_KEY,
  generationModel: process.env.GEMINI_MODEL || "gemini-2.5-flash",
} as const;

// ── Agent Runtime Configuration ───────────────────────────────────────────────────
export const AGENT_CONFIG = {
  maxToolRounds: 6,
  // Turns of history replayed into each surface's context
  historyTurns: {
    chat: 5,
    diagnostics: 3,
    voice: 5,
  },
  maxDiagnostics: 5,
  // Sessions kept per surface before the least recently used is dropped
  maxSessions: 1000,
} as const;

// ── Document Delivery Webhook ─────────────────────────────────────────────────────

export interface WebhookConfig {
  readonly url: string;
  readonly secret?: string;
}

/**
 * Startup-time feature flag for document delivery. When disabled, the
 * send_document tool is left out of every agent's tool set for the lifetime
 * of the process.
 */
export type WebhookSetting =
  | { readonly enabled: true; readonly config: WebhookConfig }
  | { readonly enabled: false };

export function loadWebhookSetting(env: NodeJS.ProcessEnv = process.env): WebhookSetting {
  const url = env.DOCUMENT_WEBHOOK_URL?.trim();
  if (!url) {
    return Object.freeze({ enabled: false as const });
  }

  const secret = env.DOCUMENT_WEBHOOK_SECRET?.trim();
  const config: WebhookConfig = Object.freeze(secret ? { url, secret } : { url });
  return Object.freeze({ enabled: true as const, config });
}

// Read once at process start, never mutated afterwards
export const WEBHOOK_SETTING: WebhookSetting = loadWebhookSetting();

// ── Environment Detection ─────────────────────────────────────────────────────────
export const ENV = {
  isProd: process.env.NODE_ENV === "production",
  isDev: process.env.NODE_ENV !== "production",
  isRender: !!process.env.RENDER,
  sslEnabled: DB_SSL,
} as const;

// ── Logging Boot Information ──────────────────────────────────────────────────────
export function logBootInfo(): void {
  console.log(`[BOOT] service = ${APP_CONFIG.serviceName}`);
  console.log(`[BOOT] render commit = ${APP_CONFIG.renderCommit}`);
  console.log(`[BOOT] DB_SSL=${ENV.sslEnabled} host=${DB_CONFIG.host}`);
  console.log(`[BOOT] model = ${GEMINI_CONFIG.generationModel}`);
  if (WEBHOOK_SETTING.enabled) {
    const auth = WEBHOOK_SETTING.config.secret ? "bearer" : "none";
    console.log(`[BOOT] document delivery = enabled auth=${auth}`);
  } else {
    console.log(`[BOOT] document delivery = disabled (DOCUMENT_WEBHOOK_URL not set)`);
  }
}
