/**
 * Logging Setup for the Agent
 *
 * Initializes the centralized logging system with console and file transports.
 */

import * as path from "path";
import * as os from "os";
import {
  initLogger,
  ConsoleTransport,
  FileTransport,
  type Logger,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@tickwatch/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export const DEFAULT_LOG_DIR = path.join(os.homedir(), ".tickwatch", "logs");

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Enable file output (default: true) */
  file?: boolean;
  /** Directory for the file transport */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the agent.
 */
export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel || (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: false
    }));
  }

  if (options.file !== false) {
    transports.push(new FileTransport({
      minLevel: "debug", // Always log debug+ to file
      logDir: options.logDir || DEFAULT_LOG_DIR,
      filename: "agent",
      maxSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5
    }));
  }

  logger = initLogger({
    minLevel,
    component: "agent",
    transports,
    ringBufferSize: 1000
  });

  return logger;
}

/**
 * Get the agent logger. Auto-initializes console-only logging if accessed
 * before initAgentLogging().
 */
export function getAgentLogger(): Logger {
  if (!logger) {
    return initAgentLogging({ file: false });
  }
  return logger;
}

/**
 * Create a namespaced logger for a specific component.
 *
 * ```typescript
 * const schedLog = createComponentLogger("scheduler");
 * schedLog.info("Registered"); // logs as [agent.scheduler]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return getAgentLogger().child({ component: `agent.${component}` });
}
