/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transport support.
 * Child loggers share their parent's transports and ring buffer.
 */

import {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type ILogger
} from "./types.js";

const DEFAULT_RING_BUFFER_SIZE = 1000;

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getAll(): T[] {
    if (this.count === 0) return [];
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly ringBuffer: RingBuffer<LogEntry>;
  private correlationId: string | undefined;

  constructor(config: LoggerConfig, ringBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.ringBuffer = ringBuffer ?? new RingBuffer(config.ringBufferSize ?? DEFAULT_RING_BUFFER_SIZE);
    this.correlationId = config.defaultContext?.correlationId;
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };

    if (this.correlationId) {
      entry.correlationId = this.correlationId;
    }

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      if (error instanceof Error) {
        entry.error = {
          name: error.name,
          message: error.message,
          stack: error.stack
        };
      } else {
        entry.error = {
          name: "Unknown",
          message: String(error)
        };
      }
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          const pending = transport.log(entry);
          if (pending instanceof Promise) {
            pending.catch((e: unknown) => {
              console.error(`[Logger] Transport ${transport.name} failed:`, e);
            });
          }
        } catch (e) {
          // Transport error - log to console as fallback
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const shouldRedact = this.redactPatterns.some(pattern => pattern.test(key));

      if (shouldRedact) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: { component?: string; correlationId?: string }): Logger {
    return new Logger(
      {
        ...this.config,
        component: context.component || this.config.component,
        defaultContext: {
          correlationId: context.correlationId ?? this.correlationId,
        },
      },
      this.ringBuffer,
    );
  }

  setCorrelationId(id: string | undefined): void {
    this.correlationId = id;
  }

  // ----------------------------------------
  // Buffer Access
  // ----------------------------------------

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// ============================================
// GLOBAL LOGGER
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
