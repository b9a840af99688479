/**
 * OpenAI-Compatible Format Helpers
 *
 * Converts between the agent's LLM message format and the OpenAI chat
 * completions wire format, in both directions.
 */

import type { LLMMessage, ToolCall } from "#llm/types.js";

export interface APIMessage {
  role: LLMMessage["role"];
  content: string;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
}

export interface ParsedCompletion {
  content: string;
  toolCalls: ToolCall[];
  usage: { inputTokens: number; outputTokens: number };
}

/**
 * Format LLMMessages into the API's message list. Tool-call fields are only
 * sent on the roles that carry them.
 */
export function formatMessagesForAPI(messages: LLMMessage[]): APIMessage[] {
  return messages.map(m => {
    const msg: APIMessage = { role: m.role, content: m.content };
    if (m.role === "assistant" && m.tool_calls?.length) {
      msg.tool_calls = m.tool_calls;
    }
    if (m.role === "tool" && m.tool_call_id) {
      msg.tool_call_id = m.tool_call_id;
    }
    return msg;
  });
}

// ============================================
// RESPONSE PARSING
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toolCallFrom(raw: unknown): ToolCall | null {
  if (!isRecord(raw) || !isRecord(raw.function)) return null;
  const name = raw.function.name;
  if (typeof name !== "string" || !name) return null;
  const args = raw.function.arguments;
  return {
    id: typeof raw.id === "string" ? raw.id : "",
    type: "function",
    function: {
      name,
      arguments: typeof args === "string" ? args : JSON.stringify(args ?? {}),
    },
  };
}

function count(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Pull the first choice out of a chat completions body. Throws when the
 * body has no message to read.
 */
export function parseCompletion(data: unknown): ParsedCompletion {
  const choices = isRecord(data) ? data.choices : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (!isRecord(first) || !isRecord(first.message)) {
    throw new Error("Malformed chat completion: no message in first choice");
  }

  const message = first.message;
  const rawCalls: unknown[] = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  const usage: Record<string, unknown> = isRecord(data) && isRecord(data.usage) ? data.usage : {};

  return {
    content: typeof message.content === "string" ? message.content : "",
    toolCalls: rawCalls.map(toolCallFrom).filter((tc): tc is ToolCall => tc !== null),
    usage: {
      inputTokens: count(usage.prompt_tokens),
      outputTokens: count(usage.completion_tokens),
    },
  };
}
