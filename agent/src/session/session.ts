/**
 * Conversation Session
 *
 * Owns everything that lives across turns: the message history, the user
 * profile and the store it persists to. A turn is either answered straight
 * from memory ("как меня зовут?") or handed to the tool loop; in both cases
 * the user's text is mined for preferences once the answer exists.
 */

import type { ILogger } from "@reelbot/shared/logging";
import { nanoid } from "nanoid";
import { createComponentLogger } from "#logging.js";
import type { LLMMessage } from "#llm/types.js";
import {
  answerFromProfile,
  describeProfile,
  extractPreferences,
  mergePreferences,
  type ProfileStore,
  type UserProfile,
} from "#memory/index.js";
import {
  runTurnLoop,
  type DecisionMaker,
  type LoopState,
  type ToolCallRecord,
  type ToolDispatcher,
  type TurnOutcome,
} from "#tool-loop/index.js";
import type { ToolArgs } from "#tools/types.js";
import { renderPrompt } from "./prompt.js";

const baseLog = createComponentLogger("session");

export const EMPTY_INPUT_ANSWER = "Ask me about a movie: a title, an actor or a genre.";

export interface SessionOptions {
  decisionMaker: DecisionMaker;
  dispatcher: ToolDispatcher;
  /** System prompt with a |* User Profile *| placeholder */
  promptTemplate: string;
  profile: UserProfile;
  store: Pick<ProfileStore, "save">;
  maxSteps: number;
  /** Prior user/assistant messages carried into each turn */
  historyLimit: number;
  id?: string;

  onToolCall?: (tool: string, args: ToolArgs) => void;
  onToolResult?: (tool: string, result: string, success: boolean) => void;
}

export interface SessionTurn {
  answer: string;
  outcome: TurnOutcome;
  /** "memory" when answered from the profile without a model call */
  source: "memory" | "model";
  steps: number;
  states: LoopState[];
  toolCallsMade: ToolCallRecord[];
}

export class Session {
  readonly id: string;
  private options: SessionOptions;
  private profile: UserProfile;
  private history: LLMMessage[] = [];
  private log: ILogger;

  constructor(options: SessionOptions) {
    this.options = options;
    this.id = options.id ?? nanoid(10);
    this.profile = options.profile;
    this.log = baseLog.child({ sessionId: this.id });
  }

  /** Read-only snapshot of the profile. */
  getProfile(): UserProfile {
    return structuredClone(this.profile);
  }

  getHistory(): LLMMessage[] {
    return [...this.history];
  }

  async handle(text: string): Promise<SessionTurn> {
    const input = text.trim();
    if (!input) {
      return { answer: EMPTY_INPUT_ANSWER, outcome: "answered", source: "memory", steps: 0, states: ["done"], toolCallsMade: [] };
    }

    const turnId = nanoid(8);
    const log = this.log.child({ turnId });
    log.info("Turn started", { length: input.length });

    const direct = answerFromProfile(input, this.profile);
    if (direct !== null) {
      log.debug("Answered from memory");
      await this.remember(input, log);
      this.record(input, direct);
      return {
        answer: direct,
        outcome: "answered",
        source: "memory",
        steps: 0,
        states: ["finalizing", "done"],
        toolCallsMade: [],
      };
    }

    const messages = this.buildContext(input);
    const result = await runTurnLoop({
      decisionMaker: this.options.decisionMaker,
      dispatcher: this.options.dispatcher,
      messages,
      maxSteps: this.options.maxSteps,
      turnId,
      finalize: () => this.remember(input, log),
      onToolCall: this.options.onToolCall,
      onToolResult: this.options.onToolResult,
    });

    this.record(input, result.answer);
    log.info("Turn finished", {
      outcome: result.outcome,
      steps: result.steps,
      toolCalls: result.toolCallsMade.length,
    });

    return {
      answer: result.answer,
      outcome: result.outcome,
      source: "model",
      steps: result.steps,
      states: result.states,
      toolCallsMade: result.toolCallsMade,
    };
  }

  // ============================================
  // CONTEXT
  // ============================================

  private buildContext(input: string): LLMMessage[] {
    const system = renderPrompt(this.options.promptTemplate, {
      "User Profile": describeProfile(this.profile),
    });
    return [
      { role: "system", content: system },
      ...this.history,
      { role: "user", content: input },
    ];
  }

  private record(input: string, answer: string): void {
    this.history.push({ role: "user", content: input }, { role: "assistant", content: answer });
    const limit = this.options.historyLimit;
    if (this.history.length > limit) {
      this.history.splice(0, this.history.length - limit);
    }
  }

  // ============================================
  // FINALIZING
  // ============================================

  /** Merge facts from the user's text and persist when anything changed. */
  private async remember(input: string, log: ILogger): Promise<void> {
    const changed = mergePreferences(this.profile, extractPreferences(input));
    if (!changed) return;

    log.info("Profile updated");
    try {
      await this.options.store.save(this.profile);
    } catch (err) {
      log.error("Profile not saved, keeping it in memory", err);
    }
  }
}
