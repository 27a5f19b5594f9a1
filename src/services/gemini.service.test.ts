/**
 * Unit tests for the agent loop, driven by a scripted model
 */

import { Type } from "@google/genai";
import { AGENT_CONFIG } from "../utils/config";
import { AgentStreamEvent, AgentTool, Toolset } from "../utils/types";
import {
  FALLBACK_REPLY,
  ModelCall,
  ModelRequest,
  ModelStreamCall,
  ModelTurn,
  parseJSON,
  runAgent,
  streamAgent,
  toFunctionDeclarations,
} from "./gemini.service";

function scriptedModel(turns: ModelTurn[]): { model: ModelCall; requests: ModelRequest[] } {
  const requests: ModelRequest[] = [];
  const model: ModelCall = async (request) => {
    // Snapshot contents: the loop keeps appending to the same array
    requests.push({ ...request, contents: [...request.contents] });
    const next = turns.shift();
    if (!next) {
      throw new Error("model called more times than scripted");
    }
    return next;
  };
  return { model, requests };
}

// One array of chunks per model round
function scriptedStream(rounds: ModelTurn[][]): { model: ModelStreamCall; requests: ModelRequest[] } {
  const requests: ModelRequest[] = [];
  const model: ModelStreamCall = async function* (request) {
    requests.push({ ...request, contents: [...request.contents] });
    const chunks = rounds.shift();
    if (!chunks) {
      throw new Error("model called more times than scripted");
    }
    yield* chunks;
  };
  return { model, requests };
}

async function collect(events: AsyncIterable<AgentStreamEvent>): Promise<AgentStreamEvent[]> {
  const out: AgentStreamEvent[] = [];
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

function echoTool(name: string, reply: string): AgentTool {
  return {
    schema: {
      name,
      description: `${name} tool`,
      parameters: { title: { type: "string", description: "Title" } },
      required: ["title"],
    },
    handler: jest.fn().mockResolvedValue(reply),
  };
}

describe("runAgent", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns the model text when no tool is called", async () => {
    const { model, requests } = scriptedModel([{ text: "  Hello there.  ", functionCalls: [] }]);

    const reply = await runAgent({
      model,
      systemPrompt: "You are helpful.",
      history: [{ user: "hi", model: "hello" }],
      input: "how are you?",
      toolset: new Map(),
      reqId: "r1",
    });

    expect(reply).toBe("Hello there.");
    expect(requests[0].systemPrompt).toBe("You are helpful.");
    expect(requests[0].tools).toEqual([]);
    expect(requests[0].contents).toEqual([
      { role: "user", parts: [{ text: "hi" }] },
      { role: "model", parts: [{ text: "hello" }] },
      { role: "user", parts: [{ text: "how are you?" }] },
    ]);
  });

  it("executes a tool call and feeds the result back", async () => {
    const tool = echoTool("send_document", "Document 'Guide' has been sent successfully.");
    const toolset: Toolset = new Map([["send_document", tool]]);
    const { model, requests } = scriptedModel([
      {
        text: "",
        functionCalls: [{ id: "call-1", name: "send_document", args: { title: "Guide", url: "https://docs.example.com/g.pdf" } }],
      },
      { text: "Done, the guide is on its way.", functionCalls: [] },
    ]);

    const reply = await runAgent({
      model,
      systemPrompt: "sys",
      history: [],
      input: "send me the guide",
      toolset,
      reqId: "r2",
    });

    expect(reply).toBe("Done, the guide is on its way.");
    expect(tool.handler).toHaveBeenCalledWith(
      { title: "Guide", url: "https://docs.example.com/g.pdf" },
      { reqId: "r2", signal: undefined },
    );
    expect(requests).toHaveLength(2);
    expect(requests[1].contents.slice(1)).toEqual([
      {
        role: "model",
        parts: [{ functionCall: { id: "call-1", name: "send_document", args: { title: "Guide", url: "https://docs.example.com/g.pdf" } } }],
      },
      {
        role: "user",
        parts: [
          {
            functionResponse: {
              id: "call-1",
              name: "send_document",
              response: { result: "Document 'Guide' has been sent successfully." },
            },
          },
        ],
      },
    ]);
  });

  it("replays the model's own content when it is provided", async () => {
    const modelContent = { role: "model", parts: [{ functionCall: { name: "lookup", args: {} } }] };
    const { model, requests } = scriptedModel([
      { text: "", functionCalls: [{ name: "lookup", args: {} }], content: modelContent },
      { text: "ok", functionCalls: [] },
    ]);

    await runAgent({
      model,
      systemPrompt: "sys",
      history: [],
      input: "go",
      toolset: new Map([["lookup", echoTool("lookup", "found")]]),
      reqId: "r3",
    });

    expect(requests[1].contents[1]).toBe(modelContent);
  });

  it("answers unknown tools with an explanatory result", async () => {
    const { model, requests } = scriptedModel([
      { text: "", functionCalls: [{ name: "web_search", args: { q: "x" } }] },
      { text: "Sorry.", functionCalls: [] },
    ]);

    await runAgent({ model, systemPrompt: "sys", history: [], input: "search", toolset: new Map(), reqId: "r4" });

    expect(requests[1].contents[2]).toEqual({
      role: "user",
      parts: [{ functionResponse: { name: "web_search", response: { result: "Unknown tool: web_search" } } }],
    });
  });

  it("turns a throwing tool into a result instead of failing the turn", async () => {
    const broken: AgentTool = {
      ...echoTool("lookup", ""),
      handler: jest.fn().mockRejectedValue(new Error("boom")),
    };
    const { model, requests } = scriptedModel([
      { text: "", functionCalls: [{ name: "lookup", args: {} }] },
      { text: "It failed.", functionCalls: [] },
    ]);

    const reply = await runAgent({
      model,
      systemPrompt: "sys",
      history: [],
      input: "go",
      toolset: new Map([["lookup", broken]]),
      reqId: "r5",
    });

    expect(reply).toBe("It failed.");
    expect(requests[1].contents[2]).toEqual({
      role: "user",
      parts: [{ functionResponse: { name: "lookup", response: { result: "Tool lookup failed: boom" } } }],
    });
  });

  it("gives up after the configured number of tool rounds", async () => {
    const looping = Array.from({ length: AGENT_CONFIG.maxToolRounds }, () => ({
      text: "",
      functionCalls: [{ name: "lookup", args: {} }],
    }));
    const { model, requests } = scriptedModel(looping);

    const reply = await runAgent({
      model,
      systemPrompt: "sys",
      history: [],
      input: "go",
      toolset: new Map([["lookup", echoTool("lookup", "again")]]),
      reqId: "r6",
    });

    expect(reply).toBe(FALLBACK_REPLY);
    expect(requests).toHaveLength(AGENT_CONFIG.maxToolRounds);
  });

  it("falls back when the model returns empty text", async () => {
    const { model } = scriptedModel([{ text: "   ", functionCalls: [] }]);

    const reply = await runAgent({ model, systemPrompt: "sys", history: [], input: "go", toolset: new Map(), reqId: "r7" });

    expect(reply).toBe(FALLBACK_REPLY);
  });

  it("does not call the model once the turn is cancelled", async () => {
    const { model, requests } = scriptedModel([{ text: "late", functionCalls: [] }]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      runAgent({
        model,
        systemPrompt: "sys",
        history: [],
        input: "go",
        toolset: new Map(),
        reqId: "r8",
        signal: controller.signal,
      }),
    ).rejects.toThrow();
    expect(requests).toHaveLength(0);
  });
});

describe("streamAgent", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("yields content events as the model produces text", async () => {
    const { model } = scriptedStream([
      [
        { text: "Hello ", functionCalls: [] },
        { text: "there.", functionCalls: [] },
      ],
    ]);

    const events = await collect(
      streamAgent({ model, systemPrompt: "sys", history: [], input: "hi", toolset: new Map(), reqId: "s1" }),
    );

    expect(events).toEqual([
      { type: "content", content: "Hello " },
      { type: "content", content: "there." },
    ]);
  });

  it("reports tool calls and streams the follow-up answer", async () => {
    const tool = echoTool("send_document", "Document 'Guide' has been sent successfully.");
    const call = { id: "call-1", name: "send_document", args: { title: "Guide", url: "https://docs.example.com/g.pdf" } };
    const { model, requests } = scriptedStream([
      [{ text: "", functionCalls: [call], content: { role: "model", parts: [{ functionCall: call }] } }],
      [
        { text: "Sent ", functionCalls: [] },
        { text: "the guide.", functionCalls: [] },
      ],
    ]);

    const events = await collect(
      streamAgent({
        model,
        systemPrompt: "sys",
        history: [],
        input: "send me the guide",
        toolset: new Map([["send_document", tool]]),
        reqId: "s2",
      }),
    );

    expect(events).toEqual([
      { type: "tool_start", tool: "send_document" },
      { type: "tool_complete", tool: "send_document" },
      { type: "content", content: "Sent " },
      { type: "content", content: "the guide." },
    ]);
    expect(tool.handler).toHaveBeenCalledTimes(1);
    expect(requests[1].contents.slice(1)).toEqual([
      { role: "model", parts: [{ functionCall: call }] },
      {
        role: "user",
        parts: [
          {
            functionResponse: {
              id: "call-1",
              name: "send_document",
              response: { result: "Document 'Guide' has been sent successfully." },
            },
          },
        ],
      },
    ]);
  });

  it("yields the fallback when the model streams no text", async () => {
    const { model } = scriptedStream([[{ text: "", functionCalls: [] }]]);

    const events = await collect(
      streamAgent({ model, systemPrompt: "sys", history: [], input: "go", toolset: new Map(), reqId: "s3" }),
    );

    expect(events).toEqual([{ type: "content", content: FALLBACK_REPLY }]);
  });

  it("stops after the configured number of tool rounds", async () => {
    const looping = Array.from({ length: AGENT_CONFIG.maxToolRounds }, () => [
      { text: "", functionCalls: [{ name: "lookup", args: {} }] },
    ]);
    const { model, requests } = scriptedStream(looping);

    const events = await collect(
      streamAgent({
        model,
        systemPrompt: "sys",
        history: [],
        input: "go",
        toolset: new Map([["lookup", echoTool("lookup", "again")]]),
        reqId: "s4",
      }),
    );

    expect(events.filter((e) => e.type === "tool_start")).toHaveLength(AGENT_CONFIG.maxToolRounds);
    expect(events[events.length - 1]).toEqual({ type: "content", content: FALLBACK_REPLY });
    expect(requests).toHaveLength(AGENT_CONFIG.maxToolRounds);
  });
});

describe("toFunctionDeclarations", () => {
  it("maps tool schemas to Gemini function declarations", () => {
    const toolset: Toolset = new Map([["send_document", echoTool("send_document", "")]]);

    expect(toFunctionDeclarations(toolset)).toEqual([
      {
        name: "send_document",
        description: "send_document tool",
        parameters: {
          type: Type.OBJECT,
          properties: { title: { type: Type.STRING, description: "Title" } },
          required: ["title"],
        },
      },
    ]);
  });
});

describe("parseJSON", () => {
  it("strips Markdown code fences", () => {
    expect(parseJSON('```json\n{"diagnostics": ["a"]}\n```')).toEqual({ diagnostics: ["a"] });
  });

  it("throws on invalid JSON", () => {
    expect(() => parseJSON("not json")).toThrow();
  });
});
