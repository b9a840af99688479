/**
 * Tool Types
 *
 * Core types for the tool registry: the manifest entry the model sees and
 * the handler that runs when it calls the tool.
 */

import type { ToolParameters } from "#llm/types.js";

/** Parsed JSON arguments of one tool call. */
export type ToolArgs = Record<string, unknown>;

export interface ToolManifestEntry {
  /** Dot notation, e.g. "catalog.movie_info" */
  id: string;
  description: string;
  inputSchema: ToolParameters;
}

/** Returns plain descriptive text; the loop passes it to the model verbatim. */
export type ToolHandler = (args: ToolArgs) => Promise<string>;

export interface RegisteredTool extends ToolManifestEntry {
  handler: ToolHandler;
}
