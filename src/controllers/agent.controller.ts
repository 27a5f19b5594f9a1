// ═════════════════════════════════════════════════════════════════════════════
// AGENT CONTROLLER — Orchestrates agent turns for each surface
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Responsibility:
 * - Resolve or create the session for a turn
 * - Pick the surface's system prompt and toolset
 * - Run the agent and record the turn in session history
 * - Shape the agent output for the surface (text, diagnostics list, speech)
 *
 * Controllers are independent of Express: they take inputs and return
 * outputs. Routes call controllers and handle HTTP.
 */

import { randomUUID } from "node:crypto";
import { ModelCall, ModelStreamCall, parseJSON, runAgent, streamAgent } from "../services/gemini.service";
import { buildDiagnosticsInput, buildSystemPrompt } from "../services/prompt.service";
import { SessionStore } from "../services/session.service";
import { AgentSurface } from "../tools/registry";
import { AGENT_CONFIG } from "../utils/config";
import { log, logError } from "../utils/logger";
import { AgentStreamEvent, DiagnosticsResponse, Toolset } from "../utils/types";

export interface AgentControllerDeps {
  model:        ModelCall;
  // Without it, a streamed chat answer arrives as one content event
  streamModel?: ModelStreamCall;
  toolsets:     Record<AgentSurface, Toolset>;
}

export interface TurnOptions {
  sessionId?: string;
  signal?:    AbortSignal;
}

/**
 * Pulls the diagnostics array out of the model's JSON reply.
 * Anything unparsable yields an empty list.
 */
export function extractDiagnostics(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = parseJSON(raw);
  } catch {
    console.warn("⚠️  diagnostics reply was not valid JSON:", raw.slice(0, 100));
    return [];
  }

  if (typeof parsed !== "object" || parsed === null || !("diagnostics" in parsed)) {
    return [];
  }
  const { diagnostics } = parsed;
  if (!Array.isArray(diagnostics)) {
    return [];
  }
  return diagnostics
    .filter((d): d is string => typeof d === "string")
    .slice(0, AGENT_CONFIG.maxDiagnostics);
}

/**
 * Turns a model reply into text suitable for speech synthesis.
 */
export function toSpokenText(text: string): string {
  return text.replace(/[*#`]/g, "").replace(/\s+/g, " ").trim();
}

export interface StreamedTurn {
  session_id: string;
  events:     AsyncIterable<AgentStreamEvent>;
}

export function createAgentController({ model, streamModel, toolsets }: AgentControllerDeps) {
  const sessions: Record<AgentSurface, SessionStore> = {
    chat:        new SessionStore(AGENT_CONFIG.historyTurns.chat, AGENT_CONFIG.maxSessions),
    diagnostics: new SessionStore(AGENT_CONFIG.historyTurns.diagnostics, AGENT_CONFIG.maxSessions),
    voice:       new SessionStore(AGENT_CONFIG.historyTurns.voice, AGENT_CONFIG.maxSessions),
  };

  async function runTurn(
    surface: AgentSurface,
    input: string,
    reqId: string,
    options: TurnOptions
  ): Promise<{ text: string; sessionId: string; executionTime: number }> {
    const sessionId = options.sessionId || randomUUID();
    const store = sessions[surface];
    const toolset = toolsets[surface];
    const tStart = Date.now();

    log(reqId, "agent_start", { surface, sessionId, history: store.get(sessionId).length });

    try {
      const text = await runAgent({
        model,
        systemPrompt: buildSystemPrompt(surface, toolset),
        history: store.get(sessionId),
        input,
        toolset,
        reqId,
        signal: options.signal,
      });
      store.append(sessionId, input, text);

      const executionTime = Date.now() - tStart;
      log(reqId, "agent_done", { surface, sessionId, totalMs: executionTime });
      return { text, sessionId, executionTime };
    } catch (err) {
      logError(reqId, `agent_${surface}`, err);
      throw err; // Re-throw to be handled by route
    }
  }

  async function* streamChatTurn(
    input: string,
    sessionId: string,
    reqId: string,
    signal?: AbortSignal
  ): AsyncGenerator<AgentStreamEvent> {
    const store = sessions.chat;
    const toolset = toolsets.chat;
    const tStart = Date.now();

    log(reqId, "agent_start", { surface: "chat", sessionId, history: store.get(sessionId).length, stream: true });

    const turn = {
      systemPrompt: buildSystemPrompt("chat", toolset),
      history:      store.get(sessionId),
      input,
      toolset,
      reqId,
      signal,
    };

    let text = "";
    try {
      if (streamModel) {
        for await (const event of streamAgent({ ...turn, model: streamModel })) {
          if (event.type === "content") {
            text += event.content;
          }
          yield event;
        }
      } else {
        text = await runAgent({ ...turn, model });
        yield { type: "content", content: text };
      }
    } catch (err) {
      logError(reqId, "agent_chat_stream", err);
      throw err;
    }

    store.append(sessionId, input, text.trim());
    log(reqId, "agent_done", { surface: "chat", sessionId, totalMs: Date.now() - tStart, stream: true });
  }

  return {
    async chat(message: string, reqId: string, options: TurnOptions = {}) {
      const { text, sessionId, executionTime } = await runTurn("chat", message, reqId, options);
      return { response: text, session_id: sessionId, executionTime };
    },

    async diagnose(
      message: string,
      listingId: string,
      reqId: string,
      options: TurnOptions = {}
    ): Promise<DiagnosticsResponse> {
      const input = buildDiagnosticsInput(message, listingId);
      const { text, sessionId, executionTime } = await runTurn("diagnostics", input, reqId, options);
      return {
        diagnostics:    extractDiagnostics(text),
        listing_id:     listingId,
        session_id:     sessionId,
        execution_time: Math.round(executionTime) / 1000,
      };
    },

    /**
     * Starts a chat turn whose answer is consumed as events. Nothing runs until
     * `events` is iterated; the turn is recorded once the last event is read.
     */
    chatStream(message: string, reqId: string, options: TurnOptions = {}): StreamedTurn {
      const sessionId = options.sessionId || randomUUID();
      return { session_id: sessionId, events: streamChatTurn(message, sessionId, reqId, options.signal) };
    },

    async voiceTurn(transcript: string, reqId: string, options: TurnOptions = {}) {
      const { text, sessionId } = await runTurn("voice", transcript, reqId, options);
      return { replyText: toSpokenText(text), session_id: sessionId };
    },
  };
}

export type AgentController = ReturnType<typeof createAgentController>;
