/**
 * CLI Command Tests
 */

import { describe, it, expect } from "vitest";
import { fixtureCatalog } from "#catalog/fixtures.js";
import { HELP_TEXT, handleCommand, type CliContext } from "./cli.js";
import { emptyProfile } from "#memory/types.js";
import { MovieResolver } from "#resolver/resolver.js";
import { Session } from "#session/session.js";

function makeContext(): CliContext {
  const profile = emptyProfile();
  profile.preferences.genre.push("sci-fi");
  const session = new Session({
    decisionMaker: { decide: async () => ({ kind: "final", text: "unused" }) },
    dispatcher: { dispatch: async () => "unused" },
    promptTemplate: "|* User Profile *|",
    profile,
    store: { save: async () => {} },
    maxSteps: 2,
    historyLimit: 4,
  });
  return { session, resolver: new MovieResolver(fixtureCatalog()) };
}

describe("handleCommand", () => {
  const ctx = makeContext();

  it("passes plain text through", () => {
    expect(handleCommand("Tell me about Alien", ctx)).toBeNull();
  });

  it("recognizes exit words", () => {
    expect(handleCommand("exit", ctx)).toEqual({ kind: "exit" });
    expect(handleCommand(" /quit ", ctx)).toEqual({ kind: "exit" });
  });

  it("prints help and the profile", () => {
    expect(handleCommand("/help", ctx)).toEqual({ kind: "reply", text: HELP_TEXT });
    expect(handleCommand("/profile", ctx)).toEqual({ kind: "reply", text: "Favorite genres: sci-fi." });
  });

  it("shows recent log entries", () => {
    // LOG_LEVEL is silent under test, so nothing reaches the buffer
    expect(handleCommand("/logs", ctx)).toEqual({ kind: "reply", text: "No recent log entries." });
  });

  it("explains a resolution", () => {
    const result = handleCommand("/resolve Alien", ctx);
    if (result?.kind !== "reply") throw new Error("expected a reply");

    expect(result.text.split("\n").slice(0, 4)).toEqual([
      "Resolved: Alien (1979) [exact, score 1.00]",
      "Closest fuzzy candidates:",
      "  1. Alien (1979) score 0.850 (edit 1.000, token 1.000, metadata 0.000)",
      "  2. Aliens (1986) score 0.500 (edit 0.833, token 0.000, metadata 0.000)",
    ]);
  });

  it("reports a query without a match", () => {
    const result = handleCommand("/resolve zzqx vprt", ctx);
    if (result?.kind !== "reply") throw new Error("expected a reply");
    expect(result.text.split("\n")[0]).toBe('No match for "zzqx vprt".');
  });

  it("asks for a query and rejects unknown commands", () => {
    expect(handleCommand("/resolve", ctx)).toEqual({ kind: "reply", text: "Usage: /resolve <query>" });
    expect(handleCommand("/nope", ctx)).toEqual({
      kind: "reply",
      text: "Unknown command: /nope. Type /help for the list.",
    });
  });
});
