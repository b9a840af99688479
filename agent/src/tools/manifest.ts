/**
 * Tool Manifest Utilities
 *
 * Converts registered tools into native ToolDefinition[] for LLM function
 * calling, and maps function names back to tool ids.
 */

import type { ToolDefinition } from "#llm/types.js";
import type { ToolManifestEntry } from "./types.js";

/**
 * Sanitize a tool ID for use as a native function name.
 * OpenAI restricts names to [a-zA-Z0-9_-], so dots become double underscores.
 */
export function sanitizeToolName(id: string): string {
  return id.replace(/\./g, "__");
}

/**
 * Reverse sanitizeToolName: convert double underscores back to dots.
 */
export function unsanitizeToolName(name: string): string {
  return name.replace(/__/g, ".");
}

/**
 * Convert a tool manifest into native ToolDefinition[] for the LLM's tools parameter.
 */
export function manifestToNativeTools(manifest: ToolManifestEntry[]): ToolDefinition[] {
  return manifest.map(t => ({
    type: "function" as const,
    function: {
      name: sanitizeToolName(t.id),
      description: t.description,
      parameters: {
        type: "object" as const,
        properties: t.inputSchema.properties,
        required: t.inputSchema.required ?? [],
      },
    },
  }));
}
