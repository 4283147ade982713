/**
 * Schedule Module
 *
 * Parsing of human-written schedules into normalized trigger tables.
 */

export { parseScheduleSpec, describeScheduleTable } from "./parser.js";
export { ScheduleSpecError } from "./errors.js";
export {
  parseTimeOfDay,
  tryParseTimeOfDay,
  formatTimeOfDay,
  compareTimeOfDay,
  isValidTimeOfDay,
} from "./time-of-day.js";
export { WEEK_ORDER, DAY_KEYS, isDayKey, resolveDayRange } from "./day-key.js";
export type { DayKey, Weekday, TimeOfDay, ScheduleTable, ScheduleMapping, ScheduleSpecInput } from "./types.js";
