/**
 * Tool Loop: Shared Types
 *
 * Types for the per-turn orchestration loop: what a model decision looks
 * like, who executes tools, and what the loop reports back.
 */

import type { LLMMessage } from "#llm/types.js";
import type { ToolArgs } from "#tools/types.js";

// ============================================
// DECISIONS
// ============================================

/** One tool call requested by the model, with parsed arguments. */
export interface ToolInvocation {
  /** Call id echoed on the tool result message */
  id: string;
  /** Tool id in dot notation */
  tool: string;
  args: ToolArgs;
}

export type ModelDecision =
  | { kind: "final"; text: string }
  | { kind: "tools"; text: string; invocations: ToolInvocation[] };

/** Produces the next decision from the messages so far. */
export interface DecisionMaker {
  decide(messages: LLMMessage[]): Promise<ModelDecision>;
}

/** Runs a tool by id and returns its text result. */
export interface ToolDispatcher {
  dispatch(toolId: string, args: ToolArgs): Promise<string>;
}

// ============================================
// LOOP
// ============================================

export type LoopState =
  | "awaiting_decision"
  | "executing_tools"
  | "finalizing"
  | "done"
  | "error";

export type TurnOutcome = "answered" | "budget_exceeded" | "error";

export interface ToolCallRecord {
  tool: string;
  args: ToolArgs;
  result: string;
  success: boolean;
}

/**
 * Options for one turn. `messages` is the full context (system rules,
 * profile, history, this turn's user message) and is appended to in place.
 */
export interface TurnLoopOptions {
  decisionMaker: DecisionMaker;
  dispatcher: ToolDispatcher;
  messages: LLMMessage[];
  /** Model decisions allowed before the fallback answer */
  maxSteps: number;
  /** Turn id for logging */
  turnId?: string;

  /** Runs in the Finalizing state, before Done. Errors are logged. */
  finalize?: () => Promise<void>;

  // ── Callbacks ──
  /** Called when a tool is invoked. */
  onToolCall?: (tool: string, args: ToolArgs) => void;
  /** Called when a tool returns a result. */
  onToolResult?: (tool: string, result: string, success: boolean) => void;
  /** Called on every state transition. */
  onStateChange?: (state: LoopState) => void;
}

export interface TurnLoopResult {
  outcome: TurnOutcome;
  answer: string;
  /** Model decisions made this turn */
  steps: number;
  /** Every state entered, in order */
  states: LoopState[];
  toolCallsMade: ToolCallRecord[];
}
