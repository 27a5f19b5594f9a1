// ═════════════════════════════════════════════════════════════════════════════
// GEMINI SERVICE — Agent runtime on Gemini function calling
// ═════════════════════════════════════════════════════════════════════════════

/**
 * Responsibility:
 * - Call the Gemini API with the surface's system prompt and history
 * - Declare the surface's tools and execute the calls the model makes
 * - Feed tool results back until the model answers in text
 * - Stream the answer chunk by chunk for the streaming chat surface
 * - Parse JSON responses
 *
 * The loop talks to the model through the ModelCall seam, so controllers and
 * tests can run it against any implementation.
 */

import {
  Content,
  FunctionCall,
  FunctionDeclaration,
  GenerateContentParameters,
  GenerateContentResponse,
  GoogleGenAI,
  Part,
  Schema,
  Type,
} from "@google/genai";
import { wrapGemini } from "langsmith/wrappers/gemini";
import { AGENT_CONFIG, GEMINI_CONFIG } from "../utils/config";
import { log, logError } from "../utils/logger";
import { AgentStreamEvent, ConversationTurn, Toolset } from "../utils/types";

export const FALLBACK_REPLY = "I'm sorry, I couldn't complete that request.";

export interface ModelRequest {
  systemPrompt: string;
  contents:     Content[];
  tools:        FunctionDeclaration[];
  signal?:      AbortSignal;
}

export interface ModelTurn {
  text:          string;
  functionCalls: FunctionCall[];
  // The model's own content, replayed verbatim on the next round
  content?:      Content;
}

export type ModelCall = (request: ModelRequest) => Promise<ModelTurn>;

/**
 * Streaming counterpart of ModelCall. Each yielded turn is one chunk: a text
 * delta and whatever function calls arrived with it.
 */
export type ModelStreamCall = (request: ModelRequest) => AsyncIterable<ModelTurn>;

/**
 * Gemini client wrapped for LangSmith tracing.
 */
export function createGeminiClient() {
  const geminiClient = new GoogleGenAI({ apiKey: GEMINI_CONFIG.apiKey });
  return wrapGemini(geminiClient);
}

export type GeminiClient = ReturnType<typeof createGeminiClient>;

function toGenerateParams({ systemPrompt, contents, tools, signal }: ModelRequest): GenerateContentParameters {
  return {
    model: GEMINI_CONFIG.generationModel,
    contents,
    config: {
      systemInstruction: systemPrompt,
      ...(tools.length > 0 ? { tools: [{ functionDeclarations: tools }] } : {}),
      ...(signal ? { abortSignal: signal } : {}),
    },
  };
}

function toModelTurn(response: GenerateContentResponse): ModelTurn {
  return {
    text:          response.text ?? "",
    functionCalls: response.functionCalls ?? [],
    content:       response.candidates?.[0]?.content,
  };
}

export function createGeminiModel(gemini: GeminiClient = createGeminiClient()): ModelCall {
  return async (request) => toModelTurn(await gemini.models.generateContent(toGenerateParams(request)));
}

export function createGeminiStreamModel(gemini: GeminiClient = createGeminiClient()): ModelStreamCall {
  return async function* (request) {
    const stream = await gemini.models.generateContentStream(toGenerateParams(request));
    for await (const chunk of stream) {
      yield toModelTurn(chunk);
    }
  };
}

/**
 * Translates the toolset's declared signatures into Gemini function declarations.
 */
export function toFunctionDeclarations(toolset: Toolset): FunctionDeclaration[] {
  return [...toolset.values()].map(({ schema }) => {
    const properties: Record<string, Schema> = {};
    for (const [name, param] of Object.entries(schema.parameters)) {
      properties[name] = { type: Type.STRING, description: param.description };
    }
    return {
      name:        schema.name,
      description: schema.description,
      parameters:  { type: Type.OBJECT, properties, required: schema.required },
    };
  });
}

function historyToContents(history: readonly ConversationTurn[]): Content[] {
  return history.flatMap((turn) => [
    { role: "user",  parts: [{ text: turn.user }] },
    { role: "model", parts: [{ text: turn.model }] },
  ]);
}

async function executeFunctionCall(
  call: FunctionCall,
  toolset: Toolset,
  reqId: string,
  signal?: AbortSignal
): Promise<Part> {
  const name = call.name ?? "";
  const tool = toolset.get(name);
  const tStart = Date.now();

  let result: string;
  if (!tool) {
    result = `Unknown tool: ${name}`;
  } else {
    try {
      result = await tool.handler(call.args ?? {}, { reqId, signal });
    } catch (err) {
      logError(reqId, `tool_${name}`, err);
      result = `Tool ${name} failed: ${err instanceof Error ? err.message : String(err)}`;
    }
  }

  log(reqId, "tool_call", { tool: name, durationMs: Date.now() - tStart });
  console.log(`🔧 ${name} returned: ${result.slice(0, 300)}`);

  return {
    functionResponse: {
      ...(call.id ? { id: call.id } : {}),
      name,
      response: { result },
    },
  };
}

function initialContents(history: readonly ConversationTurn[], input: string): Content[] {
  return [...historyToContents(history), { role: "user", parts: [{ text: input }] }];
}

async function executeRound(
  calls: FunctionCall[],
  toolset: Toolset,
  reqId: string,
  signal?: AbortSignal
): Promise<Content> {
  // Tool calls within one round run in order; the model sees all results together
  const responses: Part[] = [];
  for (const call of calls) {
    responses.push(await executeFunctionCall(call, toolset, reqId, signal));
  }
  return { role: "user", parts: responses };
}

function functionCallContent(calls: FunctionCall[]): Content {
  return { role: "model", parts: calls.map((functionCall) => ({ functionCall })) };
}

export interface RunAgentInput {
  model:        ModelCall;
  systemPrompt: string;
  history:      readonly ConversationTurn[];
  input:        string;
  toolset:      Toolset;
  reqId:        string;
  signal?:      AbortSignal;
}

/**
 * Runs one agent turn: model → tool calls → model … → text answer.
 *
 * SERVICE RESPONSIBILITY: External API calls and tool execution
 *
 * @returns The model's final text; FALLBACK_REPLY if it never produces one
 *          within AGENT_CONFIG.maxToolRounds rounds
 */
export async function runAgent({
  model,
  systemPrompt,
  history,
  input,
  toolset,
  reqId,
  signal,
}: RunAgentInput): Promise<string> {
  const tools = toFunctionDeclarations(toolset);
  const contents = initialContents(history, input);

  for (let round = 1; round <= AGENT_CONFIG.maxToolRounds; round++) {
    signal?.throwIfAborted();

    const tModel = Date.now();
    const turn = await model({ systemPrompt, contents, tools, signal });
    log(reqId, "agent_round", {
      round,
      durationMs: Date.now() - tModel,
      functionCalls: turn.functionCalls.length,
    });

    if (turn.functionCalls.length === 0) {
      return turn.text.trim() || FALLBACK_REPLY;
    }

    contents.push(turn.content ?? functionCallContent(turn.functionCalls));
    contents.push(await executeRound(turn.functionCalls, toolset, reqId, signal));
  }

  log(reqId, "agent_round_limit", { maxToolRounds: AGENT_CONFIG.maxToolRounds });
  return FALLBACK_REPLY;
}

export interface StreamAgentInput extends Omit<RunAgentInput, "model"> {
  model: ModelStreamCall;
}

/**
 * Streaming variant of runAgent. Yields text as the model produces it and a
 * start/complete pair around each tool call. FALLBACK_REPLY is yielded as
 * content only when the turn produced no text.
 */
export async function* streamAgent({
  model,
  systemPrompt,
  history,
  input,
  toolset,
  reqId,
  signal,
}: StreamAgentInput): AsyncGenerator<AgentStreamEvent> {
  const tools = toFunctionDeclarations(toolset);
  const contents = initialContents(history, input);
  let produced = false;

  for (let round = 1; round <= AGENT_CONFIG.maxToolRounds; round++) {
    signal?.throwIfAborted();

    const tModel = Date.now();
    const calls: FunctionCall[] = [];
    const parts: Part[] = [];
    for await (const chunk of model({ systemPrompt, contents, tools, signal })) {
      calls.push(...chunk.functionCalls);
      parts.push(...(chunk.content?.parts ?? []));
      if (chunk.text) {
        produced = produced || chunk.text.trim() !== "";
        yield { type: "content", content: chunk.text };
      }
    }
    log(reqId, "agent_round", { round, durationMs: Date.now() - tModel, functionCalls: calls.length, stream: true });

    if (calls.length === 0) {
      if (!produced) {
        yield { type: "content", content: FALLBACK_REPLY };
      }
      return;
    }

    contents.push(parts.length > 0 ? { role: "model", parts } : functionCallContent(calls));

    const responses: Part[] = [];
    for (const call of calls) {
      const tool = call.name ?? "";
      yield { type: "tool_start", tool };
      responses.push(await executeFunctionCall(call, toolset, reqId, signal));
      yield { type: "tool_complete", tool };
    }
    contents.push({ role: "user", parts: responses });
  }

  log(reqId, "agent_round_limit", { maxToolRounds: AGENT_CONFIG.maxToolRounds });
  if (!produced) {
    yield { type: "content", content: FALLBACK_REPLY };
  }
}

/**
 * Parses a JSON string response, handling Markdown code blocks.
 * Removes ```json and ``` markers that sometimes appear in model output.
 *
 * @throws Error if the JSON is invalid
 */
export function parseJSON(raw: string): unknown {
  const cleaned = raw.trim().replace(/```json|```/g, "").trim();
  return JSON.parse(cleaned);
}
