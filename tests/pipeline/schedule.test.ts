import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DailyScheduler, nextRunAt, parseSchedule } from "../../src/pipeline/schedule.js";

describe("parseSchedule", () => {
  it("should parse 24-hour HH:mm", () => {
    expect(parseSchedule("05:00")).toEqual({ hour: 5, minute: 0 });
    expect(parseSchedule("23:59")).toEqual({ hour: 23, minute: 59 });
  });

  it("should reject anything else", () => {
    for (const bad of ["5:00", "24:00", "12:60", "noon", ""]) {
      expect(() => parseSchedule(bad)).toThrow(RangeError);
    }
  });
});

describe("nextRunAt", () => {
  const fiveAm = { hour: 5, minute: 0 };

  it("should run later today when the time is still ahead", () => {
    expect(nextRunAt(fiveAm, new Date(2024, 2, 5, 4, 30))).toEqual(new Date(2024, 2, 5, 5, 0));
  });

  it("should roll over to tomorrow at or after the time", () => {
    expect(nextRunAt(fiveAm, new Date(2024, 2, 5, 5, 0))).toEqual(new Date(2024, 2, 6, 5, 0));
    expect(nextRunAt(fiveAm, new Date(2024, 2, 5, 18, 0))).toEqual(new Date(2024, 2, 6, 5, 0));
  });
});

describe("DailyScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should fire at the scheduled time and re-arm", async () => {
    const job = vi.fn(async () => undefined);
    const scheduler = new DailyScheduler({ hour: 5, minute: 0 }, job, {
      clock: () => new Date(2024, 2, 5, 4, 30),
    });

    expect(scheduler.start()).toEqual(new Date(2024, 2, 5, 5, 0));
    expect(scheduler.isRunning).toBe(true);

    await vi.advanceTimersByTimeAsync(29 * 60_000);
    expect(job).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(job).toHaveBeenCalledTimes(1);

    // The fixed clock re-arms for 05:00 again, 30 minutes out
    await vi.advanceTimersByTimeAsync(30 * 60_000);
    expect(job).toHaveBeenCalledTimes(2);

    scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(24 * 60 * 60_000);
    expect(job).toHaveBeenCalledTimes(2);
  });

  it("should keep running after a failed job", async () => {
    const job = vi.fn(async () => {
      throw new Error("boom");
    });
    const scheduler = new DailyScheduler({ hour: 5, minute: 0 }, job, {
      clock: () => new Date(2024, 2, 5, 4, 59),
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(job).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(job).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });
});
