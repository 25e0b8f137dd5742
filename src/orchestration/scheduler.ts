// Periodic sync loop plus the daily archive sweep
import { errorMessage } from "../shared/errors";
import type { Logger } from "../shared/logging/logger";

export interface SchedulerOptions {
  intervalMs: number;
  /** Local time of the daily archive sweep, HH:MM. */
  dailyAt: string;
  runCycle: () => Promise<unknown>;
  sweepArchive: () => Promise<unknown>;
  log: Logger;
  now?: () => Date;
}

export interface Scheduler {
  readonly busy: boolean;
  /** Run one sync cycle now unless one is in progress. Resolves false when skipped. */
  trigger(): Promise<boolean>;
  /** Clear timers and wait for the job in flight. */
  stop(): Promise<void>;
}

/** Milliseconds from `now` until the next local HH:MM (tomorrow if already passed). */
export function msUntilDaily(hhmm: string, now: Date): number {
  const [h, m] = hhmm.split(":").map((v) => Number(v));
  const target = new Date(now.getTime());
  target.setHours(h, m, 0, 0);
  if (target.getTime() <= now.getTime()) target.setDate(target.getDate() + 1);
  return target.getTime() - now.getTime();
}

export function startScheduler(opts: SchedulerOptions): Scheduler {
  const { log } = opts;
  const now = opts.now ?? (() => new Date());
  let current: Promise<void> | null = null;
  let stopped = false;
  let dailyTimer: ReturnType<typeof setTimeout> | null = null;

  function exclusive(name: string, job: () => Promise<unknown>): Promise<boolean> {
    if (stopped) return Promise.resolve(false);
    if (current) {
      log.warn(`${name} skipped, previous job still running`);
      return Promise.resolve(false);
    }
    const run = (async () => {
      try {
        await job();
      } catch (e) {
        log.error(`${name} failed`, { error: errorMessage(e) });
      } finally {
        current = null;
      }
    })();
    current = run;
    return run.then(() => true);
  }

  const trigger = () => exclusive("sync", opts.runCycle);

  /** The daily sweep waits out a running job instead of being dropped for the day. */
  async function sweepWhenIdle(): Promise<boolean> {
    if (current) log.info("archive sweep waiting for the running job");
    while (current) await current;
    return exclusive("archive sweep", opts.sweepArchive);
  }

  function scheduleDaily(): void {
    const delay = msUntilDaily(opts.dailyAt, now());
    dailyTimer = setTimeout(() => {
      void sweepWhenIdle().then(() => {
        if (!stopped) scheduleDaily();
      });
    }, delay);
    log.debug("next archive sweep scheduled", { inMinutes: Math.round(delay / 60000) });
  }

  const interval = setInterval(() => {
    void trigger();
  }, opts.intervalMs);
  scheduleDaily();
  log.info(`sync every ${opts.intervalMs / 60000} minutes, archive sweep daily at ${opts.dailyAt}`);
  void trigger();

  return {
    get busy() {
      return current !== null;
    },
    trigger,
    async stop() {
      stopped = true;
      clearInterval(interval);
      if (dailyTimer) clearTimeout(dailyTimer);
      if (current) await current;
      log.info("scheduler stopped");
    },
  };
}
