/**
 * ReelBot Agent - Main Entry Point
 *
 * Loads .env from the project root before any module creates its logger,
 * then starts the interactive session.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { initAgentLogging } from "#logging.js";

// Load .env from project root (ESM compatible)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../.env") });

const logger = initAgentLogging();

const { main } = await import("./main.js");

try {
  await main();
} catch (err) {
  console.error("[ReelBot] Fatal:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
} finally {
  await logger.close();
}
