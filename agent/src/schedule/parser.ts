/**
 * Schedule Specification Parser
 *
 * Turns a human-written schedule into a ScheduleTable. Three shapes:
 *
 *   "09:30,13:30"                   time list, every day
 *   ["09:30", "13:30"]              same, already split
 *   "1-5@09:30,13:30;6-7@10:00"     rules: dayspec@timelist, ';'-separated
 *   { "every": ["18:00"], "1": ["09:30"] }
 *
 * A rule without '@' is accepted only when all of its tokens are times; those
 * times go to the EVERY bucket.
 */

import { ScheduleSpecError } from "./errors.js";
import { parseMappingKey, resolveDaySpec } from "./day-key.js";
import { formatTimeOfDay, parseTimeOfDay, sameTimeOfDay, tryParseTimeOfDay } from "./time-of-day.js";
import type { DayKey, ScheduleTable, TimeOfDay } from "./types.js";

// ============================================
// TABLE BUILDER
// ============================================

class TableBuilder {
  private readonly table = new Map<DayKey, TimeOfDay[]>();

  add(day: DayKey, times: readonly TimeOfDay[]): void {
    if (times.length === 0) return;
    let bucket = this.table.get(day);
    if (!bucket) {
      bucket = [];
      this.table.set(day, bucket);
    }
    for (const time of times) {
      if (!bucket.some(existing => sameTimeOfDay(existing, time))) {
        bucket.push(time);
      }
    }
  }

  build(): ScheduleTable {
    const frozen = new Map<DayKey, readonly TimeOfDay[]>();
    for (const [day, times] of this.table) {
      frozen.set(day, Object.freeze([...times]));
    }
    return frozen;
  }
}

// ============================================
// ENTRY POINT
// ============================================

/**
 * Parse any accepted schedule shape. Throws ScheduleSpecError naming the
 * offending token; never returns a partial table.
 */
export function parseScheduleSpec(spec: unknown): ScheduleTable {
  if (typeof spec === "string") {
    return parseSpecString(spec);
  }
  if (Array.isArray(spec)) {
    return parseTimeArray(spec);
  }
  if (isRecord(spec)) {
    return parseMapping(spec);
  }
  const kind = spec === null ? "null" : typeof spec;
  throw new ScheduleSpecError(
    `Unsupported schedule type "${kind}": expected a string, a list of strings or a mapping`,
    String(spec),
  );
}

// ============================================
// SHAPES
// ============================================

function parseSpecString(spec: string): ScheduleTable {
  const trimmed = spec.trim();
  if (trimmed === "") {
    throw new ScheduleSpecError("Empty schedule specification", spec);
  }

  const builder = new TableBuilder();
  const rules = trimmed.split(";").map(r => r.trim()).filter(r => r !== "");
  if (rules.length === 0) {
    throw new ScheduleSpecError("Schedule specification has no rules", spec);
  }

  for (const rule of rules) {
    const at = rule.indexOf("@");
    if (at === -1) {
      builder.add("EVERY", parseBareTimes(rule));
      continue;
    }
    const days = resolveDaySpec(rule.slice(0, at));
    const times = parseTimeList(rule.slice(at + 1), rule);
    for (const day of days) {
      builder.add(day, times);
    }
  }

  return builder.build();
}

function parseTimeArray(items: readonly unknown[]): ScheduleTable {
  const times = items.map(item => {
    if (typeof item !== "string") {
      throw new ScheduleSpecError(`Schedule list entries must be strings, got ${typeof item}`, String(item));
    }
    return parseTimeOfDay(item.trim());
  });
  const builder = new TableBuilder();
  builder.add("EVERY", times);
  return builder.build();
}

function parseMapping(mapping: Record<string, unknown>): ScheduleTable {
  const builder = new TableBuilder();
  for (const [key, value] of Object.entries(mapping)) {
    const day = parseMappingKey(key);
    if (!Array.isArray(value)) {
      throw new ScheduleSpecError(`Schedule for "${key}" must be a list of times`, key);
    }
    const times = value.map(item => {
      if (typeof item !== "string") {
        throw new ScheduleSpecError(`Times for "${key}" must be strings`, String(item));
      }
      return parseTimeOfDay(item.trim());
    });
    builder.add(day, times);
  }
  return builder.build();
}

// ============================================
// HELPERS
// ============================================

function parseTimeList(list: string, rule: string): TimeOfDay[] {
  const tokens = list.split(",").map(t => t.trim());
  if (tokens.every(t => t === "")) {
    throw new ScheduleSpecError(`Rule "${rule}" has no times after '@'`, rule);
  }
  return tokens.map(token => parseTimeOfDay(token));
}

/** Rule without '@': valid only if every token is a time. */
function parseBareTimes(rule: string): TimeOfDay[] {
  const tokens = rule.split(",").map(t => t.trim());
  const times: TimeOfDay[] = [];
  for (const token of tokens) {
    const time = tryParseTimeOfDay(token);
    if (!time) {
      throw new ScheduleSpecError(
        `Invalid schedule entry "${token}" in "${rule}": expected HH:MM or dayspec@times`,
        token,
      );
    }
    times.push(time);
  }
  return times;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Render a table the way it was written, e.g. "EVERY@18:00;MON@09:30". */
export function describeScheduleTable(table: ScheduleTable): string {
  const parts: string[] = [];
  for (const [day, times] of table) {
    parts.push(`${day}@${times.map(formatTimeOfDay).join(",")}`);
  }
  return parts.join(";");
}

