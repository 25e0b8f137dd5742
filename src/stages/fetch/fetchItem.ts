/**
 * Fetch stage: download one item, fingerprint it, and decide whether it changed.
 *
 * The body is streamed through a SHA-256 transform into `<raw>.tmp`, so the
 * raw artifact path only ever holds a complete download. An item whose hash
 * matches a ledger entry younger than `force_redownload_hours` is reported
 * `unchanged` and nothing downstream runs for it.
 */
import { createHash } from "crypto";
import { createWriteStream } from "fs";
import { rename, rm } from "fs/promises";
import path from "path";
import { Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import type { AxiosInstance } from "axios";
import type { SyncContext } from "../../shared/context";
import { HttpStatusError, errorMessage } from "../../shared/errors";
import { rawName } from "../../shared/logic/items";
import { withRetry } from "../../shared/logic/retry";
import { appendFailure } from "../../shared/persistence/failureLog";
import { HOUR_MS } from "../../shared/timing";
import type { FetchOutcome, FingerprintReader, ItemSpec } from "../../shared/types";

type FetchSuccess = { kind: "artifact"; path: string; contentHash: string } | { kind: "unchanged"; contentHash: string };

export function rawArtifactPath(ctx: SyncContext, item: ItemSpec): string {
  return path.join(ctx.paths.downloads, rawName(item));
}

/** True when the ledger already holds this exact content and it was fetched recently. */
export function isWithinForceWindow(ctx: SyncContext, ledger: FingerprintReader, identity: string, contentHash: string): boolean {
  const prev = ledger.get(identity);
  if (!prev || prev.contentHash !== contentHash) return false;
  const windowMs = ctx.config.download.forceRedownloadHours * HOUR_MS;
  return ctx.now().getTime() - prev.lastSuccessAt.getTime() < windowMs;
}

function hashingTransform(hash: ReturnType<typeof createHash>): Transform {
  return new Transform({
    transform(chunk: Buffer, _enc, cb) {
      hash.update(chunk);
      cb(null, chunk);
    },
  });
}

/** Stream `url` into `tmpPath`; resolves with the hex SHA-256 of the bytes written. */
async function downloadTo(http: AxiosInstance, url: string, tmpPath: string): Promise<string> {
  const res = await http.get<Readable>(url, { responseType: "stream", validateStatus: () => true });
  if (res.status < 200 || res.status >= 300) {
    res.data.destroy();
    throw new HttpStatusError(res.status, url);
  }
  const hash = createHash("sha256");
  await pipeline(res.data, hashingTransform(hash), createWriteStream(tmpPath));
  return hash.digest("hex");
}

export async function fetchItem(ctx: SyncContext, item: ItemSpec, ledger: FingerprintReader, http: AxiosInstance): Promise<FetchOutcome> {
  const log = ctx.log.scope("fetch");
  const { maxRetries } = ctx.config.download;
  const rawPath = rawArtifactPath(ctx, item);
  const tmpPath = `${rawPath}.tmp`;

  const result = await withRetry<FetchSuccess>(
    async (attempt) => {
      log.debug("downloading", { url: item.identity, attempt: attempt + 1 });
      let contentHash: string;
      try {
        contentHash = await downloadTo(http, item.identity, tmpPath);
      } catch (e) {
        await rm(tmpPath, { force: true });
        throw e;
      }

      if (isWithinForceWindow(ctx, ledger, item.identity, contentHash)) {
        await rm(tmpPath, { force: true });
        return { kind: "unchanged", contentHash };
      }

      try {
        await rm(rawPath, { force: true });
        await rename(tmpPath, rawPath);
      } catch (e) {
        await rm(tmpPath, { force: true });
        throw e;
      }
      return { kind: "artifact", path: rawPath, contentHash };
    },
    {
      maxRetries,
      sleep: (ms) => ctx.sleep(ms),
      onRetry: ({ attempt, error, delayMs }) =>
        log.warn(`download attempt ${attempt + 1} failed, retrying`, { url: item.identity, error: errorMessage(error), delayMs }),
    }
  );

  if (result.ok) {
    if (result.value.kind === "unchanged") {
      log.info("image unchanged, skipping", { url: item.identity });
    } else {
      log.info("downloaded", { url: item.identity, path: result.value.path });
    }
    return { ...result.value, attempts: result.attempts };
  }

  log.error(`failed to download after ${result.attempts} attempts`, { url: item.identity, error: result.message });
  await appendFailure(ctx.paths.failureLog, { at: ctx.now(), identity: item.identity, error: result.message }, log);
  return { kind: "failed", error: result.message, attempts: result.attempts };
}
