/**
 * LLM Type Definitions
 *
 * Pure types for the chat-completions collaborator that makes the
 * model decisions. No runtime values.
 */

// ============================================
// CORE TYPES
// ============================================

export interface LLMMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  /** Tool calls made by the assistant (only on assistant messages) */
  tool_calls?: ToolCall[];
  /** ID of the tool call this message is a result for (only on tool messages) */
  tool_call_id?: string;
}

// ============================================
// NATIVE FUNCTION CALLING TYPES
// ============================================

export interface JsonSchemaProperty {
  type: "string" | "integer" | "number" | "boolean";
  description?: string;
}

export interface ToolParameters {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters?: ToolParameters;
  };
}

export interface ToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Native function calling: tool definitions to pass to the API */
  tools?: ToolDefinition[];
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  /** Structured tool calls from native function calling (if any) */
  toolCalls?: ToolCall[];
}

// ============================================
// LLM CLIENT INTERFACE
// ============================================

export interface ILLMClient {
  provider: string;

  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}
