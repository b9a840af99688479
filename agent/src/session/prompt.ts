/**
 * Prompt Template Helper
 *
 * Reads the .md system prompt and injects values into |* Field *| placeholders.
 *
 * Usage:
 *   const template = await loadPromptTemplate();
 *   const prompt = renderPrompt(template, { "User Profile": describeProfile(profile) });
 */

import { readFile } from "fs/promises";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { createComponentLogger } from "#logging.js";

const log = createComponentLogger("prompt-template");

const __dirname = dirname(fileURLToPath(import.meta.url));

export const SYSTEM_PROMPT_PATH = resolve(__dirname, "system.md");

/** Read a prompt template; defaults to the assistant's system prompt. */
export async function loadPromptTemplate(fullPath: string = SYSTEM_PROMPT_PATH): Promise<string> {
  try {
    return await readFile(fullPath, "utf-8");
  } catch (e) {
    log.error("Failed to read prompt template", e, { path: fullPath });
    throw new Error(`Prompt template not found: ${fullPath}`);
  }
}

/**
 * Replace every |* FieldName *| placeholder. Field names match
 * case-insensitively; unknown fields render as [MISSING: name].
 */
export function renderPrompt(template: string, fields: Record<string, string>): string {
  return template.replace(
    /\|\*\s*([^*]+?)\s*\*\|/g,
    (_match, fieldName: string) => {
      const key = fieldName.trim();
      const entry = Object.entries(fields).find(
        ([k]) => k.toLowerCase() === key.toLowerCase()
      );
      if (entry) {
        return entry[1];
      }
      log.warn("Unresolved prompt placeholder", { field: key });
      return `[MISSING: ${key}]`;
    }
  );
}
