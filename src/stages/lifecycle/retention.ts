// Age-based sweeps of the working and archive tiers
import type { Dirent } from "fs";
import { readdir, stat, unlink } from "fs/promises";
import path from "path";
import type { SyncContext } from "../../shared/context";
import { errorMessage } from "../../shared/errors";
import type { Logger } from "../../shared/logging/logger";
import { DAY_MS } from "../../shared/timing";
import type { SweepResult } from "../../shared/types";

export interface SweepOptions {
  maxAgeDays: number;
  now: Date;
  /** Absolute paths never deleted. */
  keep?: ReadonlySet<string>;
}

/** Delete regular files in `dir` whose mtime is strictly older than the cutoff. */
export async function sweepDirectory(dir: string, opts: SweepOptions, log: Logger): Promise<SweepResult> {
  const result: SweepResult = { scanned: 0, deleted: 0, failed: 0 };
  const cutoff = opts.now.getTime() - opts.maxAgeDays * DAY_MS;

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    log.warn("could not list directory", { dir, error: errorMessage(e) });
    return result;
  }

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const file = path.join(dir, entry.name);
    if (opts.keep?.has(file)) continue;
    result.scanned++;
    try {
      const st = await stat(file);
      if (st.mtimeMs < cutoff) {
        await unlink(file);
        result.deleted++;
        log.info("deleted old file", { file });
      }
    } catch (e) {
      result.failed++;
      log.error("could not delete old file", { file, error: errorMessage(e) });
    }
  }
  return result;
}

function addResults(a: SweepResult, b: SweepResult): SweepResult {
  return { scanned: a.scanned + b.scanned, deleted: a.deleted + b.deleted, failed: a.failed + b.failed };
}

export async function cleanupWorking(ctx: SyncContext): Promise<SweepResult> {
  const log = ctx.log.scope("cleanup");
  const opts: SweepOptions = { maxAgeDays: ctx.config.retention.workingDays, now: ctx.now() };
  let total: SweepResult = { scanned: 0, deleted: 0, failed: 0 };
  for (const dir of [ctx.paths.downloads, ctx.paths.processed]) {
    total = addResults(total, await sweepDirectory(dir, opts, log));
  }
  log.info("working tier cleaned", { ...total });
  return total;
}

export async function cleanupArchive(ctx: SyncContext): Promise<SweepResult> {
  const log = ctx.log.scope("cleanup");
  const result = await sweepDirectory(
    ctx.paths.archive,
    {
      maxAgeDays: ctx.config.retention.archiveDays,
      now: ctx.now(),
      keep: new Set([ctx.paths.ledger, ctx.paths.failureLog]),
    },
    log
  );
  log.info("archive cleaned", { ...result });
  return result;
}
