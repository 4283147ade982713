/**
 * Tickwatch Agent: public API
 */

export * from "./schedule/index.js";
export * from "./scheduler/index.js";
export * from "./stock-names/index.js";
export { createCommandTask } from "./tasks/command-task.js";
export { loadConfig, ConfigError } from "./config.js";
export type { AgentConfig, Env } from "./config.js";
export { initAgentLogging, getAgentLogger, createComponentLogger, DEFAULT_LOG_DIR } from "./logging.js";
export type { LoggingOptions } from "./logging.js";
