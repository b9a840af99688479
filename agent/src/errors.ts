/**
 * Error Taxonomy
 *
 * Failures a turn can meet. Tool-level errors (unknown tool, bad arguments,
 * external lookup) are turned into in-band text by the tool loop; persistence
 * errors are logged and the session keeps its in-memory profile. A NoMatch
 * resolution is a result, not an error, and has no class here.
 */

export class UnknownToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class InvalidArgumentsError extends Error {
  readonly toolName: string;
  readonly problems: string[];

  constructor(toolName: string, problems: string[]) {
    super(`Invalid arguments for ${toolName}: ${problems.join("; ")}`);
    this.name = "InvalidArgumentsError";
    this.toolName = toolName;
    this.problems = problems;
  }
}

export class ExternalLookupError extends Error {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service} lookup failed: ${message}`, options);
    this.name = "ExternalLookupError";
    this.service = service;
  }
}

export class PersistenceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`Profile persistence failed for ${filePath}: ${message}`, options);
    this.name = "PersistenceError";
    this.filePath = filePath;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
