/**
 * CLI Interface: Interactive readline prompt for local terminal usage.
 *
 * Plain lines go to the session; slash commands inspect the profile and
 * the resolver without a model call.
 */

import * as readline from "readline/promises";
import type { CatalogRecord } from "#catalog/types.js";
import { createComponentLogger, getAgentLogger } from "#logging.js";
import { describeProfile } from "#memory/preferences.js";
import type { MovieResolver } from "#resolver/resolver.js";
import type { Session } from "#session/session.js";

const log = createComponentLogger("cli");

const RESOLVE_CANDIDATES = 3;
const RECENT_LOGS = 15;

export const HELP_TEXT = [
  "Ask anything about movies, or use a command:",
  "  /profile          what I remember about you",
  "  /resolve <query>  show how a title query is matched against the catalog",
  "  /logs             recent log entries",
  "  /help             this help",
  "  /exit             quit",
].join("\n");

export interface CliContext {
  session: Session;
  resolver: MovieResolver;
}

export type CommandResult =
  | { kind: "reply"; text: string }
  | { kind: "exit" };

// ============================================
// COMMANDS
// ============================================

function label(record: CatalogRecord): string {
  return record.year !== null ? `${record.title} (${record.year})` : record.title;
}

/** Resolution result plus the top fuzzy candidates with their component scores. */
export function formatResolution(resolver: MovieResolver, query: string): string {
  const result = resolver.resolve(query);
  const lines = [
    result.matched
      ? `Resolved: ${label(result.record)} [${result.tier}, score ${result.score.toFixed(2)}]`
      : `No match for "${query}".`,
  ];

  const candidates = resolver.rank(query, RESOLVE_CANDIDATES);
  if (candidates.length > 0) {
    lines.push("Closest fuzzy candidates:");
    candidates.forEach((c, i) => {
      const parts = resolver.explain(query, c.entry.index);
      const detail = parts
        ? ` (edit ${parts.edit.toFixed(3)}, token ${parts.token.toFixed(3)}, metadata ${parts.metadata.toFixed(3)})`
        : "";
      lines.push(`  ${i + 1}. ${label(c.entry.record)} score ${c.score.toFixed(3)}${detail}`);
    });
  }
  return lines.join("\n");
}

function formatRecentLogs(): string {
  const entries = getAgentLogger().getRecentLogs(RECENT_LOGS);
  if (entries.length === 0) return "No recent log entries.";
  return entries
    .map(e => `${e.timestamp.slice(11, 19)} ${e.level.toUpperCase().padEnd(5)} [${e.component}] ${e.message}`)
    .join("\n");
}

/** Handle a slash command. Returns null when the line is not one. */
export function handleCommand(line: string, ctx: CliContext): CommandResult | null {
  const trimmed = line.trim();
  if (trimmed === "exit" || trimmed === "quit") return { kind: "exit" };
  if (!trimmed.startsWith("/")) return null;

  const [command, ...rest] = trimmed.slice(1).split(/\s+/);
  const arg = rest.join(" ");

  switch (command.toLowerCase()) {
    case "exit":
    case "quit":
      return { kind: "exit" };
    case "help":
      return { kind: "reply", text: HELP_TEXT };
    case "profile":
      return { kind: "reply", text: describeProfile(ctx.session.getProfile()) };
    case "logs":
      return { kind: "reply", text: formatRecentLogs() };
    case "resolve":
      return arg
        ? { kind: "reply", text: formatResolution(ctx.resolver, arg) }
        : { kind: "reply", text: "Usage: /resolve <query>" };
    default:
      return { kind: "reply", text: `Unknown command: /${command}. Type /help for the list.` };
  }
}

// ============================================
// PROMPT LOOP
// ============================================

export async function runCli(ctx: CliContext): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  let closed = false;
  rl.on("close", () => { closed = true; });

  console.log("[ReelBot] Type /help for commands.");

  try {
    while (!closed) {
      let input: string;
      try {
        input = await rl.question("\n> ");
      } catch (err) {
        // Ctrl-D / Ctrl-C close the interface under a pending question
        if (closed) break;
        throw err;
      }
      const command = handleCommand(input, ctx);

      if (command?.kind === "exit") {
        console.log("[ReelBot] Goodbye!");
        break;
      }
      if (command) {
        console.log(command.text);
        continue;
      }
      if (!input.trim()) continue;

      try {
        const turn = await ctx.session.handle(input);
        console.log(`\n${turn.answer}`);
      } catch (err) {
        log.error("Turn failed", err);
        console.error("[ReelBot] Something went wrong with that request. See the log for details.");
      }
    }
  } finally {
    rl.close();
  }
}
