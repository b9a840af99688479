/**
 * Message Sanitization
 *
 * Ensures every assistant message with tool_calls is followed by a tool
 * result for each call id before the next model request. OpenAI-compatible
 * APIs return 400 when results are missing.
 *
 * Repairs in place by injecting placeholder tool results.
 */

import { createComponentLogger } from "#logging.js";
import type { LLMMessage } from "#llm/types.js";

const log = createComponentLogger("tool-loop.sanitize");

export const MISSING_RESULT_TEXT = "(no result, tool execution was skipped)";

export function sanitizeMessages(messages: LLMMessage[]): void {
  for (let i = 0; i < messages.length; i++) {
    const msg = messages[i];
    if (msg.role !== "assistant" || !msg.tool_calls?.length) continue;

    const expectedIds = new Set(msg.tool_calls.map(tc => tc.id));
    const foundIds = new Set<string>();

    // Scan forward until another assistant message or the end.
    let j = i + 1;
    for (; j < messages.length; j++) {
      const next = messages[j];
      if (next.role === "assistant") break;
      if (next.role === "tool" && next.tool_call_id && expectedIds.has(next.tool_call_id)) {
        foundIds.add(next.tool_call_id);
      }
    }

    if (foundIds.size < expectedIds.size) {
      const missing = [...expectedIds].filter(id => !foundIds.has(id));
      log.warn(`sanitizeMessages: patching ${missing.length} missing tool results`, {
        assistantIdx: i,
        expectedCount: expectedIds.size,
        foundCount: foundIds.size,
      });
      const patches: LLMMessage[] = missing.map(id => ({
        role: "tool" as const,
        content: MISSING_RESULT_TEXT,
        tool_call_id: id,
      }));
      messages.splice(j, 0, ...patches);
      i = j + patches.length - 1;
    }
  }
}
