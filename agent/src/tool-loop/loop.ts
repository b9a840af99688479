/**
 * Tool Loop: Per-Turn Execution Engine
 *
 * One user turn as a state machine:
 *   awaiting_decision → (executing_tools → awaiting_decision)* → finalizing → done
 * with error reachable when the decision maker fails.
 *
 * 1. Sanitize messages, ask the decision maker for the next step
 * 2. Final text → finalizing
 * 3. Tool calls → run them strictly in request order, append each result
 *    (or "Error: ...") as a tool message, go back to 1
 * 4. After maxSteps decisions without a final answer → fallback answer
 */

import { describeError } from "#errors.js";
import { createComponentLogger } from "#logging.js";
import { sanitizeToolName } from "#tools/manifest.js";
import { sanitizeMessages } from "./sanitize.js";
import type {
  LoopState,
  ModelDecision,
  ToolCallRecord,
  ToolInvocation,
  TurnLoopOptions,
  TurnLoopResult,
  TurnOutcome,
} from "./types.js";

const log = createComponentLogger("tool-loop");

export const DECISION_FAILURE_ANSWER =
  "Sorry, I couldn't get an answer from the language model just now. Please try again in a moment.";

export function budgetExceededAnswer(maxSteps: number): string {
  return `I couldn't finish this request within the step limit (${maxSteps} model decisions). ` +
    "Try asking a narrower question.";
}

async function executeInvocation(
  inv: ToolInvocation,
  options: TurnLoopOptions,
): Promise<ToolCallRecord> {
  options.onToolCall?.(inv.tool, inv.args);
  log.info(`Executing tool: ${inv.tool}`, { turnId: options.turnId, argKeys: Object.keys(inv.args) });

  let result: string;
  let success: boolean;
  try {
    result = await options.dispatcher.dispatch(inv.tool, inv.args);
    success = true;
  } catch (err) {
    result = `Error: ${describeError(err)}`;
    success = false;
    log.warn("Tool call failed", { tool: inv.tool, turnId: options.turnId, error: describeError(err) });
  }

  options.onToolResult?.(inv.tool, result, success);
  return { tool: inv.tool, args: inv.args, result, success };
}

export async function runTurnLoop(options: TurnLoopOptions): Promise<TurnLoopResult> {
  const { decisionMaker, messages, maxSteps, turnId } = options;
  const states: LoopState[] = [];
  const toolCallsMade: ToolCallRecord[] = [];

  const enter = (state: LoopState) => {
    states.push(state);
    options.onStateChange?.(state);
  };

  let steps = 0;
  let answer: string | null = null;

  while (steps < maxSteps) {
    enter("awaiting_decision");
    sanitizeMessages(messages);
    steps++;

    let decision: ModelDecision;
    try {
      decision = await decisionMaker.decide(messages);
    } catch (err) {
      log.error("Decision maker failed", err, { turnId, step: steps });
      enter("error");
      return { outcome: "error", answer: DECISION_FAILURE_ANSWER, steps, states, toolCallsMade };
    }

    if (decision.kind === "final") {
      answer = decision.text;
      break;
    }

    enter("executing_tools");
    log.info(`Step ${steps}/${maxSteps}: ${decision.invocations.length} tool call(s)`, {
      turnId,
      tools: decision.invocations.map(i => i.tool),
    });

    messages.push({
      role: "assistant",
      content: decision.text,
      tool_calls: decision.invocations.map(inv => ({
        id: inv.id,
        type: "function" as const,
        function: { name: sanitizeToolName(inv.tool), arguments: JSON.stringify(inv.args) },
      })),
    });

    for (const inv of decision.invocations) {
      const record = await executeInvocation(inv, options);
      toolCallsMade.push(record);
      messages.push({ role: "tool", content: record.result, tool_call_id: inv.id });
    }
  }

  let outcome: TurnOutcome = "answered";
  if (answer === null) {
    log.warn("Step budget reached without a final answer", { turnId, steps: maxSteps });
    outcome = "budget_exceeded";
    answer = budgetExceededAnswer(maxSteps);
  }
  messages.push({ role: "assistant", content: answer });

  enter("finalizing");
  if (options.finalize) {
    try {
      await options.finalize();
    } catch (err) {
      log.error("Finalize step failed", err, { turnId });
    }
  }

  enter("done");
  return { outcome, answer, steps, states, toolCallsMade };
}
