/**
 * Daily scheduler for the track cycle.
 *
 * Runs a job once a day at a local HH:mm time. Runs never overlap: the
 * next timer is armed only after the current job settles.
 */

import { addDays, isAfter, set } from "date-fns";
import { errorMessage } from "../utils/errors.js";
import { componentLogger } from "../utils/logger.js";

const log = componentLogger("scheduler");

export interface DailySchedule {
  hour: number;
  minute: number;
}

const SCHEDULE_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Parse "HH:mm" (24-hour); throws RangeError otherwise */
export function parseSchedule(value: string): DailySchedule {
  const match = SCHEDULE_PATTERN.exec(value);
  if (!match) throw new RangeError(`Invalid schedule "${value}", expected HH:mm`);
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Next occurrence of the schedule strictly after now. A run exactly at
 * now is pushed to tomorrow.
 */
export function nextRunAt(schedule: DailySchedule, now: Date): Date {
  const today = set(now, {
    hours: schedule.hour,
    minutes: schedule.minute,
    seconds: 0,
    milliseconds: 0,
  });
  return isAfter(today, now) ? today : addDays(today, 1);
}

export interface DailySchedulerOptions {
  clock?: () => Date;
}

export class DailyScheduler {
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private readonly clock: () => Date;

  constructor(
    private readonly schedule: DailySchedule,
    private readonly job: () => Promise<unknown>,
    options: DailySchedulerOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return !this.stopped;
  }

  /** Arm the timer and return the first run time */
  start(): Date {
    this.stopped = false;
    return this.arm();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private arm(): Date {
    const now = this.clock();
    const at = nextRunAt(this.schedule, now);
    const delay = at.getTime() - now.getTime();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.fire();
    }, delay);
    log.info(`Next run at ${at.toISOString()}`);
    return at;
  }

  private async fire(): Promise<void> {
    try {
      await this.job();
    } catch (err) {
      log.error("Scheduled run failed", { error: errorMessage(err) });
    }
    if (!this.stopped) this.arm();
  }
}
