// ═════════════════════════════════════════════════════════════════════════════
// TOOL REGISTRY — Capability table for each agent surface
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Tool sets are built once at startup and handed to the agent runtime.
 * Whether document delivery exists is decided here, from the WebhookSetting,
 * not inside the dispatch path.
 */

import { WebhookSetting } from "../utils/config";
import { AgentTool, Toolset } from "../utils/types";
import { createSendDocumentTool } from "./send-document.tool";
import { createSqlQueryTool, SqlExecutor } from "./sql-query.tool";

export const AGENT_SURFACES = ["chat", "diagnostics", "voice"] as const;
export type AgentSurface = (typeof AGENT_SURFACES)[number];

type Capability = "sql" | "document";

// Which capabilities each surface may carry; deps decide whether they exist
const SURFACE_CAPABILITIES: Record<AgentSurface, readonly Capability[]> = {
  chat:        ["sql", "document"],
  diagnostics: ["sql", "document"],
  voice:       ["sql", "document"],
};

export interface ToolsetDeps {
  webhook:     WebhookSetting;
  sqlExecutor?: SqlExecutor;
}

export function buildToolset(surface: AgentSurface, deps: ToolsetDeps): Toolset {
  const capabilities = SURFACE_CAPABILITIES[surface];
  const tools: AgentTool[] = [];

  if (capabilities.includes("sql") && deps.sqlExecutor) {
    tools.push(createSqlQueryTool(deps.sqlExecutor));
  }
  if (capabilities.includes("document") && deps.webhook.enabled) {
    tools.push(createSendDocumentTool(deps.webhook.config));
  }

  return new Map(tools.map((t) => [t.schema.name, t]));
}

export function buildAllToolsets(deps: ToolsetDeps): Record<AgentSurface, Toolset> {
  return {
    chat:        buildToolset("chat", deps),
    diagnostics: buildToolset("diagnostics", deps),
    voice:       buildToolset("voice", deps),
  };
}
