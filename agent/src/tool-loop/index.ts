/**
 * Tool Loop: Barrel Export
 */

export { runTurnLoop, budgetExceededAnswer, DECISION_FAILURE_ANSWER } from "./loop.js";
export { sanitizeMessages, MISSING_RESULT_TEXT } from "./sanitize.js";
export type {
  DecisionMaker,
  LoopState,
  ModelDecision,
  ToolCallRecord,
  ToolDispatcher,
  ToolInvocation,
  TurnLoopOptions,
  TurnLoopResult,
  TurnOutcome,
} from "./types.js";
