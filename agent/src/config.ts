/**
 * Agent Configuration
 *
 * Built from environment variables (after dotenv has merged `.env`).
 * loadConfig() is pure: it only reads the map it is given.
 */

import * as path from "path";
import * as os from "os";
import { isLogLevel, type LogLevel } from "@tickwatch/shared/logging";
import { parseScheduleSpec } from "./schedule/parser.js";
import { ScheduleSpecError } from "./schedule/errors.js";
import type { ScheduleMapping, ScheduleSpecInput } from "./schedule/types.js";
import { MARKETS, type Market } from "./stock-names/types.js";

export type Env = Record<string, string | undefined>;

export interface AgentConfig {
  schedule: {
    enabled: boolean;
    spec: ScheduleSpecInput;
    runImmediately: boolean;
    pollIntervalMs: number;
    /** Shell command run as the task; null runs nothing */
    command: string | null;
  };
  stockNames: {
    refreshEnabled: boolean;
    refreshSpec: ScheduleSpecInput;
    cacheDir: string;
    ttlHours: number;
    fetchTimeoutMs: number;
    listUrls: Partial<Record<Market, string>>;
  };
  logging: {
    level: LogLevel;
    dir: string;
    file: boolean;
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly variable: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================
// LOADING
// ============================================

export function loadConfig(env: Env = process.env): AgentConfig {
  const production = env.NODE_ENV === "production";

  const listUrls: Partial<Record<Market, string>> = {};
  for (const market of MARKETS) {
    const url = readString(env, `STOCK_LIST_URL_${market.toUpperCase()}`);
    if (url) listUrls[market] = url;
  }

  return {
    schedule: {
      enabled: readBoolean(env, "SCHEDULE_ENABLED", false),
      spec: readSchedule(env, "SCHEDULE_TIME", "18:00"),
      runImmediately: readBoolean(env, "SCHEDULE_RUN_IMMEDIATELY", true),
      pollIntervalMs: readPositiveInt(env, "SCHEDULE_POLL_INTERVAL_SECONDS", 30) * 1000,
      command: readString(env, "SCHEDULE_COMMAND"),
    },
    stockNames: {
      refreshEnabled: readBoolean(env, "STOCK_NAME_REFRESH_ENABLED", true),
      refreshSpec: readSchedule(env, "STOCK_NAME_REFRESH_TIME", "09:00"),
      cacheDir: readString(env, "STOCK_NAME_CACHE_DIR") ?? path.join(".", "data", "cache"),
      ttlHours: readPositiveInt(env, "STOCK_NAME_CACHE_TTL_HOURS", 24),
      fetchTimeoutMs: readPositiveInt(env, "STOCK_LIST_TIMEOUT_MS", 60_000),
      listUrls,
    },
    logging: {
      level: readLogLevel(env, production ? "info" : "debug"),
      dir: readString(env, "LOG_DIR") ?? path.join(os.homedir(), ".tickwatch", "logs"),
      file: readBoolean(env, "LOG_FILE", true),
    },
  };
}

// ============================================
// READERS
// ============================================

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

/** Unset and blank are the same. */
function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const value = raw.toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new ConfigError(`${name} must be true/false/1/0/yes/no, got "${raw}"`, name);
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`, name);
  }
  return Number(raw);
}

function readLogLevel(env: Env, fallback: LogLevel): LogLevel {
  const raw = readString(env, "LOG_LEVEL");
  if (raw === null) return fallback;
  const value = raw.toLowerCase();
  if (!isLogLevel(value)) {
    throw new ConfigError(`LOG_LEVEL "${raw}" is not a log level`, "LOG_LEVEL");
  }
  return value;
}

/**
 * A time list, a rule string, or a JSON object in the mapping shape.
 * Validated here so a bad schedule fails at startup.
 */
function readSchedule(env: Env, name: string, fallback: string): ScheduleSpecInput {
  const raw = readString(env, name) ?? fallback;
  const spec = raw.startsWith("{") ? readMapping(raw, name) : raw;
  try {
    parseScheduleSpec(spec);
  } catch (error) {
    if (error instanceof ScheduleSpecError) {
      throw new ConfigError(`${name}: ${error.message}`, name);
    }
    throw error;
  }
  return spec;
}

function readMapping(raw: string, name: string): ScheduleMapping {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`${name} is not valid JSON`, name);
  }
  if (!isScheduleMapping(parsed)) {
    throw new ConfigError(`${name} must map day keys to lists of "HH:MM" strings`, name);
  }
  return parsed;
}

function isScheduleMapping(value: unknown): value is ScheduleMapping {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    times => Array.isArray(times) && times.every(t => typeof t === "string"),
  );
}
