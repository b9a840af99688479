/**
 * Session Tests
 *
 * Turn handling end to end with a scripted decision maker and a fake
 * profile store: context assembly, memory answers, preference persistence
 * and history capping.
 */

import { describe, it, expect, vi } from "vitest";
import { PersistenceError } from "#errors.js";
import type { LLMMessage } from "#llm/types.js";
import { emptyProfile, type UserProfile } from "#memory/types.js";
import type { DecisionMaker, ToolDispatcher } from "#tool-loop/types.js";
import { renderPrompt } from "./prompt.js";
import { EMPTY_INPUT_ANSWER, Session, type SessionOptions } from "./session.js";

// ============================================
// HELPERS
// ============================================

const TEMPLATE = "Rules.\n|* User Profile *|";

function finalDecider(text: string) {
  const seen: LLMMessage[][] = [];
  const decide = vi.fn(async (messages: LLMMessage[]) => {
    seen.push(messages.map(m => ({ ...m })));
    return { kind: "final" as const, text };
  });
  const decisionMaker: DecisionMaker = { decide };
  return { decisionMaker, decide, seen };
}

const noTools: ToolDispatcher = {
  dispatch: async (toolId: string) => `${toolId} ok`,
};

function makeSession(overrides: Partial<SessionOptions> & Pick<SessionOptions, "decisionMaker">) {
  const store = { save: vi.fn(async (_profile: UserProfile) => {}) };
  const session = new Session({
    dispatcher: noTools,
    promptTemplate: TEMPLATE,
    profile: emptyProfile(),
    store,
    maxSteps: 4,
    historyLimit: 10,
    ...overrides,
  });
  return { session, store };
}

// ============================================
// TURNS
// ============================================

describe("Session.handle", () => {
  it("answers through the model and remembers stated preferences", async () => {
    const { decisionMaker } = finalDecider("Nice to meet you, Sam!");
    const { session, store } = makeSession({ decisionMaker });

    const turn = await session.handle("My name is Sam and I love comedy movies");

    expect(turn).toEqual({
      answer: "Nice to meet you, Sam!",
      outcome: "answered",
      source: "model",
      steps: 1,
      states: ["awaiting_decision", "finalizing", "done"],
      toolCallsMade: [],
    });
    expect(store.save).toHaveBeenCalledTimes(1);
    expect(session.getProfile()).toEqual({
      name: "Sam",
      preferences: { genre: ["comedy"], actor: [], director: [], movie: [] },
    });
  });

  it("puts the profile snapshot and prior turns into the context", async () => {
    const { decisionMaker, seen } = finalDecider("Try Up (2009).");
    const { session } = makeSession({ decisionMaker });

    await session.handle("My name is Sam and I love comedy movies");
    await session.handle("Recommend something");

    const context = seen[1];
    expect(context.map(m => m.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(context[0].content).toBe("Rules.\nUser's name: Sam.\nFavorite genres: comedy.");
    expect(context[1].content).toBe("My name is Sam and I love comedy movies");
    expect(context[3].content).toBe("Recommend something");
  });

  it("answers questions about the profile without the model", async () => {
    const { decisionMaker, decide } = finalDecider("unused");
    const profile = emptyProfile();
    profile.name = "Sam";
    const { session, store } = makeSession({ decisionMaker, profile });

    const turn = await session.handle("What is my name?");

    expect(turn.answer).toBe("Your name is Sam.");
    expect(turn.source).toBe("memory");
    expect(turn.steps).toBe(0);
    expect(decide).not.toHaveBeenCalled();
    expect(store.save).not.toHaveBeenCalled();
    expect(session.getHistory()).toEqual([
      { role: "user", content: "What is my name?" },
      { role: "assistant", content: "Your name is Sam." },
    ]);
  });

  it("keeps only the most recent history messages", async () => {
    const { decisionMaker } = finalDecider("ok");
    const { session } = makeSession({ decisionMaker, historyLimit: 2 });

    await session.handle("first");
    await session.handle("second");

    expect(session.getHistory()).toEqual([
      { role: "user", content: "second" },
      { role: "assistant", content: "ok" },
    ]);
  });

  it("completes the turn when the profile cannot be saved", async () => {
    const { decisionMaker } = finalDecider("Noted.");
    const { session, store } = makeSession({ decisionMaker });
    store.save.mockRejectedValueOnce(new PersistenceError("/tmp/profile.json", "disk full"));

    const turn = await session.handle("Я люблю боевики");

    expect(turn.outcome).toBe("answered");
    expect(turn.states).toEqual(["awaiting_decision", "finalizing", "done"]);
    expect(session.getProfile().preferences.genre).toEqual(["боевики"]);
  });

  it("skips preference extraction when the model fails", async () => {
    const decisionMaker: DecisionMaker = { decide: async () => { throw new Error("provider down"); } };
    const { session, store } = makeSession({ decisionMaker });

    const turn = await session.handle("I love horror movies");

    expect(turn.outcome).toBe("error");
    expect(store.save).not.toHaveBeenCalled();
    expect(session.getProfile().preferences.genre).toEqual([]);
  });

  it("does not call the model for blank input", async () => {
    const { decisionMaker, decide } = finalDecider("unused");
    const { session } = makeSession({ decisionMaker });

    const turn = await session.handle("   ");

    expect(turn.answer).toBe(EMPTY_INPUT_ANSWER);
    expect(decide).not.toHaveBeenCalled();
    expect(session.getHistory()).toEqual([]);
  });

  it("hands out a copy of the profile", async () => {
    const { decisionMaker } = finalDecider("ok");
    const { session } = makeSession({ decisionMaker });

    session.getProfile().preferences.genre.push("drama");
    expect(session.getProfile().preferences.genre).toEqual([]);
  });
});

// ============================================
// PROMPT
// ============================================

describe("renderPrompt", () => {
  it("fills placeholders case-insensitively and marks unknown ones", () => {
    expect(renderPrompt("A |* user profile *| B |*Other*|", { "User Profile": "x" }))
      .toBe("A x B [MISSING: Other]");
  });
});
