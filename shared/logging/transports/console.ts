/**
 * Console Transport
 *
 * Writes one line per entry to stdout (stderr for warn and above),
 * color coded when attached to a TTY.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// COLOR CODES
// ============================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

// ============================================
// FORMATTING
// ============================================

export interface ConsoleFormatOptions {
  colors: boolean;
  timestamps: boolean;
  showComponent: boolean;
  prettyPrint: boolean;
}

/**
 * Render an entry as `HH:MM:SS LVL [component] (cid) message {data}`.
 */
export function formatConsoleLine(entry: LogEntry, options: ConsoleFormatOptions): string {
  const paint = (text: string, color: string): string =>
    options.colors ? `${color}${text}${COLORS.reset}` : text;

  const parts: string[] = [];

  if (options.timestamps) {
    const clock = entry.timestamp.split("T")[1]?.split(".")[0] ?? entry.timestamp;
    parts.push(paint(clock, COLORS.dim));
  }

  parts.push(paint(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]));

  if (options.showComponent) {
    parts.push(paint(`[${entry.component}]`, COLORS.magenta));
  }

  if (entry.correlationId) {
    parts.push(paint(`(${entry.correlationId})`, COLORS.dim));
  }

  parts.push(entry.message);

  let output = parts.join(" ");

  if (entry.data && Object.keys(entry.data).length > 0) {
    const json = options.prettyPrint
      ? JSON.stringify(entry.data, null, 2)
      : JSON.stringify(entry.data);
    output += (options.prettyPrint ? "\n" : " ") + paint(json, COLORS.dim);
  }

  if (entry.error) {
    output += "\n" + paint(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
    if (entry.error.stack && options.prettyPrint) {
      output += "\n" + paint(entry.error.stack, COLORS.dim);
    }
  }

  return output;
}

// ============================================
// CONSOLE TRANSPORT
// ============================================

export interface ConsoleTransportOptions {
  /** Minimum level to log */
  minLevel?: LogLevel;
  /** Use colors (default: true when stdout is a TTY) */
  colors?: boolean;
  /** Show timestamps (default: true) */
  timestamps?: boolean;
  /** Show component name (default: true) */
  showComponent?: boolean;
  /** Pretty print data objects (default: false) */
  prettyPrint?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly format: ConsoleFormatOptions;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel || "debug";
    this.format = {
      colors: options.colors ?? process.stdout.isTTY === true,
      timestamps: options.timestamps ?? true,
      showComponent: options.showComponent ?? true,
      prettyPrint: options.prettyPrint ?? false,
    };
  }

  log(entry: LogEntry): void {
    const line = formatConsoleLine(entry, this.format) + "\n";
    switch (entry.level) {
      case "warn":
      case "error":
      case "fatal":
        process.stderr.write(line);
        break;
      default:
        process.stdout.write(line);
    }
  }
}
