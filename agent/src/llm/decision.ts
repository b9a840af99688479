/**
 * LLM Decision Maker
 *
 * Turns a chat completion into a ModelDecision for the tool loop: native
 * tool calls become ToolInvocations, anything else is the final answer.
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "#logging.js";
import type { DecisionMaker, ModelDecision, ToolInvocation } from "#tool-loop/types.js";
import { unsanitizeToolName } from "#tools/manifest.js";
import type { ToolArgs } from "#tools/types.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions, ToolCall, ToolDefinition } from "./types.js";

const log = createComponentLogger("llm.decision");

export const EMPTY_ANSWER_TEXT = "Sorry, I could not form an answer to that.";

function isRecord(value: unknown): value is ToolArgs {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a tool call's JSON arguments. Anything but a JSON object becomes {}. */
export function parseToolArguments(raw: string, toolId: string): ToolArgs {
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    log.warn("Failed to parse tool arguments", { tool: toolId });
    return {};
  }
  if (!isRecord(parsed)) {
    log.warn("Tool arguments are not a JSON object", { tool: toolId });
    return {};
  }
  return parsed;
}

function toInvocation(call: ToolCall): ToolInvocation {
  const tool = unsanitizeToolName(call.function.name);
  return {
    id: call.id || `call_${nanoid(12)}`,
    tool,
    args: parseToolArguments(call.function.arguments, tool),
  };
}

export class LLMDecisionMaker implements DecisionMaker {
  private client: ILLMClient;
  private tools: ToolDefinition[];
  private options: LLMRequestOptions;

  constructor(client: ILLMClient, tools: ToolDefinition[], options: LLMRequestOptions = {}) {
    this.client = client;
    this.tools = tools;
    this.options = options;
  }

  async decide(messages: LLMMessage[]): Promise<ModelDecision> {
    const response = await this.client.chat(messages, {
      ...this.options,
      tools: this.tools.length ? this.tools : undefined,
    });

    log.debug("Model responded", {
      model: response.model,
      contentLength: response.content.length,
      toolCallCount: response.toolCalls?.length ?? 0,
      inputTokens: response.usage?.inputTokens,
      outputTokens: response.usage?.outputTokens,
    });

    if (response.toolCalls?.length) {
      return { kind: "tools", text: response.content, invocations: response.toolCalls.map(toInvocation) };
    }

    const text = response.content.trim();
    return { kind: "final", text: text || EMPTY_ANSWER_TEXT };
  }
}
