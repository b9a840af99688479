/**
 * LLM Collaborator Tests
 *
 * Covers:
 * - OpenAI-compatible request shape and response parsing (stubbed fetch)
 * - Retryable error detection and Retry-After extraction
 * - chatWithRetry backoff and give-up behavior
 * - LLMDecisionMaker conversion of tool calls and final text
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { EMPTY_ANSWER_TEXT, LLMDecisionMaker, parseToolArguments } from "./decision.js";
import { OpenAICompatibleClient } from "#llm/providers/openai-compatible/client.js";
import { formatMessagesForAPI, parseCompletion } from "#llm/providers/openai-compatible/format.js";
import { chatWithRetry, extractRetryAfterMs, isRetryableError, RetryingLLMClient } from "#llm/resilience/retry.js";
import type { ILLMClient, LLMMessage, LLMResponse, ToolDefinition } from "./types.js";

// ============================================
// HELPERS
// ============================================

const OK_RESPONSE: LLMResponse = {
  content: "Hello!",
  model: "test-model",
  provider: "test",
  usage: { inputTokens: 10, outputTokens: 5 },
};

const MESSAGES: LLMMessage[] = [
  { role: "system", content: "rules" },
  { role: "user", content: "Hi" },
];

function makeMockClient(chatFn: () => Promise<LLMResponse>): ILLMClient {
  return { provider: "test", chat: vi.fn(chatFn) };
}

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(typeof body === "string" ? body : JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ============================================
// FORMAT
// ============================================

describe("formatMessagesForAPI", () => {
  it("keeps tool fields only on the roles that carry them", () => {
    const call = { id: "c1", type: "function" as const, function: { name: "x", arguments: "{}" } };
    expect(formatMessagesForAPI([
      { role: "user", content: "q", tool_call_id: "stray" },
      { role: "assistant", content: "", tool_calls: [call] },
      { role: "tool", content: "r", tool_call_id: "c1" },
    ])).toEqual([
      { role: "user", content: "q" },
      { role: "assistant", content: "", tool_calls: [call] },
      { role: "tool", content: "r", tool_call_id: "c1" },
    ]);
  });
});

describe("parseCompletion", () => {
  it("reads content, tool calls and usage", () => {
    const parsed = parseCompletion({
      choices: [{
        message: {
          content: null,
          tool_calls: [
            { id: "c1", type: "function", function: { name: "catalog__movie_info", arguments: '{"title":"Up"}' } },
            { id: "c2", type: "function", function: {} },
          ],
        },
      }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });

    expect(parsed).toEqual({
      content: "",
      toolCalls: [
        { id: "c1", type: "function", function: { name: "catalog__movie_info", arguments: '{"title":"Up"}' } },
      ],
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it("throws when there is no message", () => {
    expect(() => parseCompletion({ choices: [] })).toThrow("Malformed chat completion");
  });
});

// ============================================
// OPENAI-COMPATIBLE CLIENT
// ============================================

describe("OpenAICompatibleClient", () => {
  const tools: ToolDefinition[] = [
    { type: "function", function: { name: "catalog__movie_info", description: "Describe a movie" } },
  ];

  it("posts a chat completion request", async () => {
    const fetchMock = stubFetch({ choices: [{ message: { content: "Hi there" } }] });
    const client = new OpenAICompatibleClient("test", "test-secret", "https://llm.test/v1/", "test-model");

    const response = await client.chat(MESSAGES, { tools, temperature: 0 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe("https://llm.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      "Authorization": "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      messages: MESSAGES,
      temperature: 0,
      max_tokens: 1024,
      stream: false,
      tools,
    });
    expect(response).toEqual({
      content: "Hi there",
      model: "test-model",
      provider: "test",
      usage: { inputTokens: 0, outputTokens: 0 },
      toolCalls: undefined,
    });
  });

  it("returns native tool calls", async () => {
    stubFetch({
      choices: [{
        message: {
          content: "",
          tool_calls: [{ id: "c1", type: "function", function: { name: "omdb__search", arguments: '{"keyword":"heat"}' } }],
        },
      }],
    });
    const client = new OpenAICompatibleClient("test", "", "https://llm.test/v1", "test-model");

    const response = await client.chat(MESSAGES);
    expect(response.toolCalls).toEqual([
      { id: "c1", type: "function", function: { name: "omdb__search", arguments: '{"keyword":"heat"}' } },
    ]);
  });

  it("throws with the status on HTTP errors", async () => {
    stubFetch("slow down", 429);
    const client = new OpenAICompatibleClient("test", "test-secret", "https://llm.test/v1", "test-model");

    await expect(client.chat(MESSAGES)).rejects.toThrow("test API error: 429 slow down");
  });
});

// ============================================
// RETRY
// ============================================

describe("isRetryableError", () => {
  it("detects transient status codes", () => {
    expect(isRetryableError(new Error("test API error: 429 Rate limit exceeded"))).toBe(true);
    expect(isRetryableError(new Error("test API error: 503"))).toBe(true);
  });

  it("detects network failures", () => {
    expect(isRetryableError(new TypeError("fetch failed"))).toBe(true);
    expect(isRetryableError(new Error("The operation was aborted due to timeout"))).toBe(true);
  });

  it("rejects client errors and numbers that merely contain a code", () => {
    expect(isRetryableError(new Error("test API error: 400 Bad Request"))).toBe(false);
    expect(isRetryableError(new Error("used 5000 tokens"))).toBe(false);
  });
});

describe("extractRetryAfterMs", () => {
  it("reads small Retry-After hints", () => {
    expect(extractRetryAfterMs(new Error("429 retry-after: 3"))).toBe(3000);
    expect(extractRetryAfterMs(new Error("Retry after 60 seconds"))).toBe(0);
    expect(extractRetryAfterMs("nothing here")).toBe(0);
  });
});

describe("chatWithRetry", () => {
  it("retries transient failures with backoff", async () => {
    const chat = vi.fn<() => Promise<LLMResponse>>()
      .mockRejectedValueOnce(new Error("test API error: 503"))
      .mockRejectedValueOnce(new Error("test API error: 502"))
      .mockResolvedValueOnce(OK_RESPONSE);
    const sleep = vi.fn(async (_ms: number) => {});

    const response = await chatWithRetry({ provider: "test", chat }, MESSAGES, undefined, { sleep });

    expect(response).toBe(OK_RESPONSE);
    expect(chat).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(c => c[0])).toEqual([500, 1000]);
  });

  it("honors a Retry-After hint longer than the backoff", async () => {
    const chat = vi.fn<() => Promise<LLMResponse>>()
      .mockRejectedValueOnce(new Error("429 retry-after: 3"))
      .mockResolvedValueOnce(OK_RESPONSE);
    const sleep = vi.fn(async (_ms: number) => {});

    await chatWithRetry({ provider: "test", chat }, MESSAGES, undefined, { sleep });
    expect(sleep).toHaveBeenCalledWith(3000);
  });

  it("does not retry non-retryable errors", async () => {
    const client = makeMockClient(async () => { throw new Error("test API error: 401 Unauthorized"); });
    const sleep = vi.fn(async (_ms: number) => {});

    await expect(chatWithRetry(client, MESSAGES, undefined, { sleep })).rejects.toThrow("401 Unauthorized");
    expect(client.chat).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up after maxAttempts", async () => {
    const client = makeMockClient(async () => { throw new Error("fetch failed"); });
    const retrying = new RetryingLLMClient(client, { maxAttempts: 2, sleep: async () => {} });

    await expect(retrying.chat(MESSAGES)).rejects.toThrow("fetch failed");
    expect(client.chat).toHaveBeenCalledTimes(2);
    expect(retrying.provider).toBe("test");
  });
});

// ============================================
// DECISION MAKER
// ============================================

describe("LLMDecisionMaker", () => {
  const tools: ToolDefinition[] = [
    { type: "function", function: { name: "catalog__movie_info" } },
  ];

  it("converts native tool calls into invocations", async () => {
    const client = makeMockClient(async () => ({
      ...OK_RESPONSE,
      content: "Let me check.",
      toolCalls: [
        { id: "call_1", type: "function", function: { name: "catalog__movie_info", arguments: '{"title":"Heat"}' } },
        { id: "", type: "function", function: { name: "omdb__search", arguments: "{oops" } },
      ],
    }));

    const decision = await new LLMDecisionMaker(client, tools, { temperature: 0.2 }).decide(MESSAGES);

    expect(client.chat).toHaveBeenCalledWith(MESSAGES, { temperature: 0.2, tools });
    expect(decision).toEqual({
      kind: "tools",
      text: "Let me check.",
      invocations: [
        { id: "call_1", tool: "catalog.movie_info", args: { title: "Heat" } },
        { id: expect.stringMatching(/^call_/), tool: "omdb.search", args: {} },
      ],
    });
  });

  it("returns the trimmed text as the final answer", async () => {
    const client = makeMockClient(async () => ({ ...OK_RESPONSE, content: "  Interstellar is rated 8.6. " }));
    const decision = await new LLMDecisionMaker(client, []).decide(MESSAGES);

    expect(decision).toEqual({ kind: "final", text: "Interstellar is rated 8.6." });
    expect(client.chat).toHaveBeenCalledWith(MESSAGES, { tools: undefined });
  });

  it("substitutes a fixed text for an empty answer", async () => {
    const client = makeMockClient(async () => ({ ...OK_RESPONSE, content: "   " }));
    expect(await new LLMDecisionMaker(client, tools).decide(MESSAGES))
      .toEqual({ kind: "final", text: EMPTY_ANSWER_TEXT });
  });
});

describe("parseToolArguments", () => {
  it("accepts objects only", () => {
    expect(parseToolArguments('{"limit":3}', "t")).toEqual({ limit: 3 });
    expect(parseToolArguments("[1,2]", "t")).toEqual({});
    expect(parseToolArguments("", "t")).toEqual({});
  });
});
