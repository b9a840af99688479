/**
 * Logging Setup for the Agent
 *
 * Initializes the shared logging system once with console and file
 * transports, and hands out component loggers.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  isLogLevel,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport,
} from "@reelbot/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL or "info") */
  minLevel?: LogLevel;
  /** Console output level (default: "warn" so logs stay out of the chat) */
  consoleLevel?: LogLevel;
  /** Enable file output (default: LOG_TO_FILE, true unless "false") */
  file?: boolean;
  /** Directory for log files (default: LOG_DIR or ~/.reelbot/logs) */
  logDir?: string;
}

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : undefined;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel ?? envLevel() ?? "info";
  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel: options.consoleLevel ?? "warn" }),
  ];

  const fileEnabled = options.file ?? process.env.LOG_TO_FILE !== "false";
  if (fileEnabled) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir || process.env.LOG_DIR || path.join(os.homedir(), ".reelbot", "logs"),
      filename: "agent",
    }));
  }

  logger = initLogger({
    minLevel,
    component: "agent",
    transports,
    ringBufferSize: 500,
  });
  return logger;
}

/**
 * Get the agent logger. Auto-initializes from the environment if needed.
 */
export function getAgentLogger(): Logger {
  return logger ?? initAgentLogging();
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getAgentLogger().child({ component: `agent.${component}` });
}
