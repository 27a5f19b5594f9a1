// ═════════════════════════════════════════════════════════════════════════════
// TYPES — Shared type definitions used across routes, controllers, and services
// ═════════════════════════════════════════════════════════════════════════════

// ── Document delivery ─────────────────────────────────────────────────────────────

/**
 * The event posted to the document webhook. Built per call, never persisted.
 * `recipient` is "" when the agent should rely on session context.
 */
export interface DocumentNotification {
  readonly title:     string;
  readonly url:       string;
  readonly recipient: string;
  readonly timestamp: string; // ISO-8601 UTC with explicit +00:00 offset
}

/**
 * Outcome of one webhook attempt. Every transport or HTTP outcome is a value,
 * so callers always get something to describe to the user.
 */
export type DispatchResult =
  | { kind: "delivered"; title: string }
  | { kind: "timed_out" }
  | { kind: "unreachable"; reason: string }
  | { kind: "rejected"; status: number };

// ── Agent tools ───────────────────────────────────────────────────────────────────

export type ToolParameterType = "string";

export interface ToolParameter {
  type:        ToolParameterType;
  description: string;
}

/**
 * Declared signature of a tool, as shown to the model.
 */
export interface ToolSchema {
  name:        string;
  description: string;
  parameters:  Record<string, ToolParameter>;
  required:    string[];
}

export interface ToolContext {
  reqId:   string;
  signal?: AbortSignal;
}

/**
 * A capability the agent runtime may call mid-turn. Handlers always resolve
 * to prose for the model; they never reject.
 */
export interface AgentTool {
  schema:  ToolSchema;
  handler: (args: Record<string, unknown>, ctx: ToolContext) => Promise<string>;
}

export type Toolset = ReadonlyMap<string, AgentTool>;

// ── Sessions ──────────────────────────────────────────────────────────────────────

export interface ConversationTurn {
  user:  string;
  model: string;
}

// ── HTTP bodies ───────────────────────────────────────────────────────────────────

/**
 * Request body for the /chat endpoint.
 */
export interface ChatRequest {
  message?:    string;
  session_id?: string;
  user_id?:    string;
}

export interface ChatResponse {
  response:   string;
  session_id: string;
}

/**
 * What the agent loop reports while a streamed turn runs.
 */
export type AgentStreamEvent =
  | { type: "content"; content: string }
  | { type: "tool_start"; tool: string }
  | { type: "tool_complete"; tool: string };

/**
 * One `data:` line of the POST /chat/stream response.
 */
export type ChatStreamEvent =
  | { type: "session"; session_id: string }
  | AgentStreamEvent
  | { type: "done"; execution_time: number }
  | { type: "error"; error: string };

/**
 * Request body for the /diagnostics endpoint.
 * `listing_id` identifies the equipment listing the issue is about.
 */
export interface DiagnosticsRequest {
  message?:    string;
  listing_id?: string;
  session_id?: string;
  user_id?:    string;
}

export interface DiagnosticsResponse {
  diagnostics:    string[];
  listing_id:     string;
  session_id:     string;
  execution_time: number; // seconds
}

/**
 * Request body for the /voice/turn endpoint. The transcript comes from the
 * voice pipeline's speech-to-text stage.
 */
export interface VoiceTurnRequest {
  transcript?: string;
  session_id?: string;
}

export interface VoiceTurnResponse {
  replyText:  string;
  session_id: string;
}

/**
 * Error response for all endpoints.
 */
export interface ErrorResponse {
  error: string;
}
