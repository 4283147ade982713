/**
 * Trigger Wheel
 *
 * In-memory timing subsystem: keeps each trigger's next fire instant and
 * fires the due ones when polled. Day keys resolve to their registration
 * function through a plain map.
 */

import { nanoid } from "nanoid";
import { DAY_KEYS } from "../schedule/day-key.js";
import { formatTimeOfDay, isValidTimeOfDay, sameTimeOfDay } from "../schedule/time-of-day.js";
import type { DayKey, TimeOfDay } from "../schedule/types.js";
import { SchedulerError } from "./errors.js";
import { calculateNextRun } from "./next-run.js";
import type { TimerBackend, Trigger, TriggerJob } from "./types.js";

type Registrar = (time: TimeOfDay, job: TriggerJob) => Trigger;

interface WheelEntry {
  trigger: Trigger;
  job: TriggerJob;
  nextRunAt: Date;
}

export class TriggerWheel implements TimerBackend {
  private entries: WheelEntry[] = [];
  private readonly registrars: ReadonlyMap<DayKey, Registrar>;

  constructor() {
    this.registrars = new Map(
      DAY_KEYS.map((day): [DayKey, Registrar] => [day, (time, job) => this.add(day, time, job)]),
    );
  }

  schedule(day: DayKey, time: TimeOfDay, job: TriggerJob): Trigger {
    const register = this.registrars.get(day);
    if (!register) {
      throw new SchedulerError(`Unknown day key "${String(day)}"`);
    }
    return register(time, job);
  }

  async runPending(now: Date = new Date()): Promise<number> {
    const due = this.entries
      .filter(entry => entry.nextRunAt <= now)
      .map(entry => {
        const dueAt = entry.nextRunAt;
        entry.nextRunAt = calculateNextRun(entry.trigger.day, entry.trigger.time, now);
        return { entry, dueAt };
      });
    await Promise.all(due.map(({ entry, dueAt }) => entry.job(entry.trigger, dueAt)));
    return due.length;
  }

  nextRunAt(): Date | null {
    let earliest: Date | null = null;
    for (const entry of this.entries) {
      if (!earliest || entry.nextRunAt < earliest) {
        earliest = entry.nextRunAt;
      }
    }
    return earliest;
  }

  clear(): void {
    this.entries = [];
  }

  get triggers(): readonly Trigger[] {
    return this.entries.map(entry => entry.trigger);
  }

  private add(day: DayKey, time: TimeOfDay, job: TriggerJob): Trigger {
    if (!isValidTimeOfDay(time)) {
      throw new SchedulerError(`Invalid time ${time.hour}:${time.minute} for ${day}`);
    }
    if (this.entries.some(e => e.trigger.day === day && sameTimeOfDay(e.trigger.time, time))) {
      throw new SchedulerError(`Trigger ${day}@${formatTimeOfDay(time)} is already registered`);
    }

    const trigger: Trigger = Object.freeze({ id: `trg_${nanoid(10)}`, day, time });
    this.entries.push({
      trigger,
      job,
      nextRunAt: calculateNextRun(day, time, new Date()),
    });
    return trigger;
  }
}
