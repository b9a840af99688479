/**
 * Structured Logging
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, ConsoleTransport, FileTransport } from "@reelbot/shared/logging";
 *
 * const logger = initLogger({
 *   minLevel: "info",
 *   component: "agent",
 *   transports: [
 *     new ConsoleTransport({ minLevel: "warn" }),
 *     new FileTransport({ logDir: "./logs" }),
 *   ],
 * });
 *
 * const loopLog = logger.child({ component: "agent.tool-loop", sessionId });
 * loopLog.info("Step started", { step: 1 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
