/**
 * OpenAI-Compatible LLM Client
 *
 * Works with any provider that implements the OpenAI chat completions API:
 * OpenAI, DeepSeek, xAI, LM Studio, vLLM, etc.
 */

import type {
  ILLMClient,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
} from "#llm/types.js";
import { formatMessagesForAPI, parseCompletion, type APIMessage } from "./format.js";

const REQUEST_TIMEOUT_MS = 120_000;

interface ChatCompletionBody {
  model: string;
  messages: APIMessage[];
  temperature: number;
  max_tokens: number;
  stream: false;
  tools?: LLMRequestOptions["tools"];
}

export class OpenAICompatibleClient implements ILLMClient {
  provider: string;
  private apiKey: string;
  private baseUrl: string;
  private defaultModel: string;

  constructor(
    provider: string,
    apiKey: string,
    baseUrl: string,
    defaultModel: string
  ) {
    this.provider = provider;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.defaultModel = defaultModel;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model || this.defaultModel;

    const headers: Record<string, string> = {
      "Content-Type": "application/json"
    };

    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: ChatCompletionBody = {
      model,
      messages: formatMessagesForAPI(messages),
      temperature: options?.temperature ?? 0.2,
      max_tokens: options?.maxTokens ?? 1024,
      stream: false,
    };

    if (options?.tools?.length) {
      body.tools = options.tools;
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`${this.provider} API error: ${response.status} ${await response.text()}`);
    }

    const parsed = parseCompletion(await response.json());

    return {
      content: parsed.content,
      model,
      provider: this.provider,
      usage: parsed.usage,
      toolCalls: parsed.toolCalls.length ? parsed.toolCalls : undefined,
    };
  }
}
