import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { msUntilDaily, startScheduler, type Scheduler } from "../../src/orchestration/scheduler";
import { recordingLogger } from "../helpers/fixtures";

const MINUTE = 60_000;

describe("msUntilDaily", () => {
  const at = new Date(2024, 5, 1, 23, 0, 0);

  it("counts to the next occurrence of the local time", () => {
    expect(msUntilDaily("00:00", at)).toBe(60 * MINUTE);
    expect(msUntilDaily("23:30", at)).toBe(30 * MINUTE);
  });

  it("rolls over to tomorrow when the time has been reached", () => {
    expect(msUntilDaily("23:00", at)).toBe(24 * 60 * MINUTE);
    expect(msUntilDaily("08:15", at)).toBe((9 * 60 + 15) * MINUTE);
  });
});

describe("startScheduler", () => {
  let scheduler: Scheduler | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 5, 1, 23, 0, 0));
  });
  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
    vi.useRealTimers();
  });

  it("runs immediately and then on every interval", async () => {
    const runCycle = vi.fn(async () => undefined);
    scheduler = startScheduler({
      intervalMs: 10 * MINUTE,
      dailyAt: "00:00",
      runCycle,
      sweepArchive: async () => undefined,
      log: recordingLogger(),
    });
    expect(runCycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(10 * MINUTE);
    expect(runCycle).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(20 * MINUTE);
    expect(runCycle).toHaveBeenCalledTimes(4);
  });

  it("skips a tick while the previous run is still going", async () => {
    let finish: () => void = () => undefined;
    const runCycle = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const log = recordingLogger();
    scheduler = startScheduler({ intervalMs: 10 * MINUTE, dailyAt: "00:00", runCycle, sweepArchive: async () => undefined, log });

    await vi.advanceTimersByTimeAsync(10 * MINUTE);
    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(scheduler.busy).toBe(true);
    expect(log.entries.some((e) => e.level === "warn" && e.message === "sync skipped, previous job still running")).toBe(true);

    finish();
    await vi.advanceTimersByTimeAsync(0);
    expect(scheduler.busy).toBe(false);
    await vi.advanceTimersByTimeAsync(10 * MINUTE);
    expect(runCycle).toHaveBeenCalledTimes(2);
    finish();
  });

  it("sweeps the archive daily at the configured time", async () => {
    const sweepArchive = vi.fn(async () => undefined);
    scheduler = startScheduler({
      intervalMs: 6 * 60 * MINUTE,
      dailyAt: "00:00",
      runCycle: async () => undefined,
      sweepArchive,
      log: recordingLogger(),
    });

    await vi.advanceTimersByTimeAsync(59 * MINUTE);
    expect(sweepArchive).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(sweepArchive).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(24 * 60 * MINUTE);
    expect(sweepArchive).toHaveBeenCalledTimes(2);
  });

  it("runs a daily sweep that falls due mid-cycle once the cycle ends", async () => {
    vi.setSystemTime(new Date(2024, 5, 1, 23, 55, 0));
    let finish: () => void = () => undefined;
    const runCycle = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const sweepArchive = vi.fn(async () => undefined);
    const log = recordingLogger();
    scheduler = startScheduler({ intervalMs: 6 * 60 * MINUTE, dailyAt: "00:00", runCycle, sweepArchive, log });

    await vi.advanceTimersByTimeAsync(5 * MINUTE);
    expect(sweepArchive).not.toHaveBeenCalled();
    expect(log.entries.some((e) => e.level === "info" && e.message === "archive sweep waiting for the running job")).toBe(true);

    finish();
    await vi.advanceTimersByTimeAsync(0);
    expect(sweepArchive).toHaveBeenCalledTimes(1);
    expect(scheduler.busy).toBe(false);
  });

  it("keeps running after a failed cycle", async () => {
    const runCycle = vi.fn(async () => {
      throw new Error("ftp down");
    });
    const log = recordingLogger();
    scheduler = startScheduler({ intervalMs: MINUTE, dailyAt: "00:00", runCycle, sweepArchive: async () => undefined, log });

    await vi.advanceTimersByTimeAsync(MINUTE);

    expect(runCycle).toHaveBeenCalledTimes(2);
    expect(log.entries.filter((e) => e.level === "error").map((e) => e.context?.error)).toEqual(["ftp down", "ftp down"]);
  });

  it("stops all timers", async () => {
    const runCycle = vi.fn(async () => undefined);
    const sweepArchive = vi.fn(async () => undefined);
    const s = startScheduler({ intervalMs: 10 * MINUTE, dailyAt: "00:00", runCycle, sweepArchive, log: recordingLogger() });

    await s.stop();
    await vi.advanceTimersByTimeAsync(48 * 60 * MINUTE);

    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(sweepArchive).not.toHaveBeenCalled();
    await expect(s.trigger()).resolves.toBe(false);
  });
});
