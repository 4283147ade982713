/**
 * Centralized Logging System
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@tickwatch/shared/logging";
 *
 * // Initialize once at startup
 * initLogger({
 *   minLevel: "debug",
 *   component: "agent",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "~/.tickwatch/logs" })
 *   ]
 * });
 *
 * // Use anywhere
 * log().info("Starting up", { version: "1.0.0" });
 * log().error("Something failed", new Error("oops"), { context: "startup" });
 *
 * // Child logger sharing transports, tagged with a run id
 * const runLog = log().child({ component: "agent.scheduler", correlationId: "run_abc" });
 * runLog.debug("Started");
 * ```
 */

// Types
export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
} from "./types.js";

// Logger
export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  log
} from "./logger.js";

// Transports
export {
  ConsoleTransport,
  FileTransport,
  formatConsoleLine,
  type ConsoleTransportOptions,
  type ConsoleFormatOptions,
  type FileTransportOptions,
} from "./transports/index.js";
