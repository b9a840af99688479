/**
 * Tool Registry
 *
 * Closed set of tools the model may call. Dispatch looks the tool up by id
 * (or by its native function name), checks the arguments against the
 * declared schema and runs the handler. Handlers never see bad arguments.
 */

import { InvalidArgumentsError, UnknownToolError } from "#errors.js";
import type { ToolDefinition } from "#llm/types.js";
import { manifestToNativeTools, unsanitizeToolName } from "./manifest.js";
import type { RegisteredTool, ToolArgs, ToolManifestEntry } from "./types.js";

// ============================================
// ARGUMENT VALIDATION
// ============================================

function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case "string": return typeof value === "string";
    case "integer": return typeof value === "number" && Number.isInteger(value);
    case "number": return typeof value === "number" && Number.isFinite(value);
    case "boolean": return typeof value === "boolean";
    default: return true;
  }
}

/**
 * Check arguments against a tool's schema. Returns one line per problem;
 * empty when the arguments are acceptable. Undeclared keys are ignored.
 */
export function validateArguments(tool: ToolManifestEntry, args: ToolArgs): string[] {
  const problems: string[] = [];
  const { properties, required = [] } = tool.inputSchema;

  for (const key of required) {
    if (args[key] === undefined || args[key] === null) {
      problems.push(`missing required argument "${key}"`);
    }
  }

  for (const [key, schema] of Object.entries(properties)) {
    const value = args[key];
    if (value === undefined || value === null) continue;
    if (!matchesType(value, schema.type)) {
      problems.push(`"${key}" must be of type ${schema.type}`);
    }
  }

  return problems;
}

// ============================================
// REGISTRY
// ============================================

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register(...tools: RegisteredTool[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.id)) {
        throw new Error(`Tool already registered: ${tool.id}`);
      }
      this.tools.set(tool.id, tool);
    }
    return this;
  }

  has(idOrName: string): boolean {
    return this.resolve(idOrName) !== undefined;
  }

  /** Manifest entries in registration order. */
  list(): ToolManifestEntry[] {
    return [...this.tools.values()].map(({ handler: _handler, ...entry }) => entry);
  }

  toNativeTools(): ToolDefinition[] {
    return manifestToNativeTools(this.list());
  }

  /**
   * Run a tool. Throws UnknownToolError or InvalidArgumentsError before the
   * handler runs; handler errors propagate unchanged.
   */
  async dispatch(idOrName: string, args: ToolArgs): Promise<string> {
    const tool = this.resolve(idOrName);
    if (!tool) throw new UnknownToolError(idOrName);

    const problems = validateArguments(tool, args);
    if (problems.length > 0) throw new InvalidArgumentsError(tool.id, problems);

    return tool.handler(args);
  }

  private resolve(idOrName: string): RegisteredTool | undefined {
    return this.tools.get(idOrName) ?? this.tools.get(unsanitizeToolName(idOrName));
  }
}
