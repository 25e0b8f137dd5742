/**
 * Sync runner: one cycle over the configured images.
 *
 * Items run independently on a p-queue. Each goes
 *   fetch → (new content) ledger put → transform → publish → archive
 * and any failure stops only that item. The ledger is mutated here and
 * nowhere else, then flushed once when the queue drains.
 */
import path from "path";
import { rm } from "fs/promises";
import PQueue from "p-queue";
import type { AxiosInstance } from "axios";
import type { SyncContext } from "../shared/context";
import { errorMessage } from "../shared/errors";
import { createHttp } from "../shared/http/client";
import { normalizeItems, processedName } from "../shared/logic/items";
import { mergeSettings } from "../shared/logic/mergeSettings";
import { FingerprintStore } from "../shared/persistence/fingerprintStore";
import { since } from "../shared/timing";
import type { ItemResult, ItemSpec, RunSummary } from "../shared/types";
import { fetchItem } from "../stages/fetch/fetchItem";
import { archiveArtifact } from "../stages/lifecycle/archive";
import { cleanupArchive, cleanupWorking } from "../stages/lifecycle/retention";
import { openFtpSession, type SessionOpener } from "../stages/publish/ftpSession";
import { publishArtifact } from "../stages/publish/publishArtifact";
import { createSharpTransformer, type ImageTransformer } from "../stages/transform/transformImage";

export interface RunnerDeps {
  http?: AxiosInstance;
  transformer?: ImageTransformer;
  openSession?: SessionOpener;
  /** Overrides ftp.concurrent_uploads. */
  concurrency?: number;
  ledger?: FingerprintStore;
}

export interface SyncRunner {
  readonly ledger: FingerprintStore;
  runOnce(items: readonly ItemSpec[]): Promise<RunSummary>;
  runCycle(rawEntries: readonly unknown[]): Promise<RunSummary>;
}

export function summarize(results: readonly ItemResult[], durationMs: number, invalid = 0): RunSummary {
  let succeeded = 0;
  let unchanged = 0;
  let failed = 0;
  for (const r of results) {
    if (r.status === "published") succeeded++;
    else if (r.status === "unchanged") unchanged++;
    else failed++;
  }
  return { total: results.length + invalid, succeeded, unchanged, failed, invalid, durationMs };
}

export async function createSyncRunner(ctx: SyncContext, deps: RunnerDeps = {}): Promise<SyncRunner> {
  const log = ctx.log.scope("run");
  const ledger = deps.ledger ?? (await FingerprintStore.load(ctx.paths.ledger, ctx.log.scope("ledger"), ctx.now()));
  const http = deps.http ?? createHttp({ userAgent: ctx.config.download.userAgent, timeoutMs: ctx.config.download.timeoutMs });
  const transformer = deps.transformer ?? createSharpTransformer(ctx);
  const openSession = deps.openSession ?? openFtpSession;
  const concurrency = Math.max(1, deps.concurrency ?? ctx.config.ftp.concurrentUploads);

  async function processItem(item: ItemSpec): Promise<ItemResult> {
    const t0 = Date.now();
    const finish = (status: ItemResult["status"], extra: Pick<ItemResult, "stage" | "error" | "archivePath"> = {}): ItemResult => ({
      identity: item.identity,
      status,
      ...extra,
      durationMs: Date.now() - t0,
    });

    const fetched = await fetchItem(ctx, item, ledger, http);
    if (fetched.kind === "failed") return finish("failed", { stage: "fetch", error: fetched.error });
    if (fetched.kind === "unchanged") return finish("unchanged");

    ledger.put(item.identity, { contentHash: fetched.contentHash, lastSuccessAt: ctx.now() });

    const remoteName = processedName(item);
    const outputPath = path.join(ctx.paths.processed, remoteName);
    const settings = mergeSettings(ctx.config.processing, item.settings);
    const transformed = await transformer.transform(fetched.path, outputPath, settings);
    if (!transformed.ok) return finish("failed", { stage: "transform", error: transformed.error });

    const published = await publishArtifact(ctx, transformed.path, remoteName, openSession);
    if (!published.ok) return finish("failed", { stage: "publish", error: published.error });

    let archivePath: string | undefined;
    if (ctx.config.retention.deleteAfterPublish) {
      try {
        await rm(fetched.path, { force: true });
      } catch (e) {
        log.warn("could not delete raw download", { path: fetched.path, error: errorMessage(e) });
      }
      try {
        archivePath = (await archiveArtifact(ctx, transformed.path)).archivePath;
      } catch (e) {
        log.warn("could not archive processed image", { path: transformed.path, error: errorMessage(e) });
      }
    }
    return finish("published", { archivePath });
  }

  async function runOnce(items: readonly ItemSpec[]): Promise<RunSummary> {
    const t0 = Date.now();
    log.info("starting run", { items: items.length, concurrency });

    if (ctx.config.retention.cleanupOnStart) await cleanupWorking(ctx);
    await cleanupArchive(ctx);

    const queue = new PQueue({ concurrency });
    const results = await Promise.all(
      items.map((item) =>
        queue.add(async (): Promise<ItemResult> => {
          try {
            return await processItem(item);
          } catch (e) {
            log.error("unexpected error", { url: item.identity, error: errorMessage(e) });
            return { identity: item.identity, status: "failed", error: errorMessage(e), durationMs: 0 };
          }
        })
      )
    );

    await ledger.flush();
    const summary = summarize(results, Date.now() - t0);
    log.info(`processed ${summary.succeeded}/${summary.total} images in ${since(t0)}s`, {
      unchanged: summary.unchanged,
      failed: summary.failed,
    });
    return summary;
  }

  async function runCycle(rawEntries: readonly unknown[]): Promise<RunSummary> {
    const t0 = Date.now();
    const { items, rejected } = normalizeItems(rawEntries);
    for (const { index, error } of rejected) {
      log.error(`skipping image entry #${index}`, { error: error.message });
    }
    const summary = await runOnce(items);
    return {
      ...summary,
      total: summary.total + rejected.length,
      invalid: rejected.length,
      durationMs: Date.now() - t0,
    };
  }

  return { ledger, runOnce, runCycle };
}
