import path from "path";
import type { SyncContext } from "../../shared/context";
import { errorMessage } from "../../shared/errors";
import type { Logger } from "../../shared/logging/logger";
import { PROCESSED_EXTENSION } from "../../shared/logic/items";
import { withRetry } from "../../shared/logic/retry";
import type { PublishOutcome } from "../../shared/types";
import type { RemoteSession, SessionOpener } from "./ftpSession";

/** `radar.png` → `radar.webp`; names already ending in .webp are kept. */
export function remoteFileName(name: string): string {
  if (name.toLowerCase().endsWith(PROCESSED_EXTENSION)) return name;
  const ext = path.posix.extname(name);
  return `${ext ? name.slice(0, -ext.length) : name}${PROCESSED_EXTENSION}`;
}

/**
 * cd into `dir`, creating missing segments one at a time.
 * mkdir errors are tolerated (another publisher may have won the race);
 * the cd that follows must succeed.
 */
export async function ensureRemoteDirectory(session: RemoteSession, dir: string, log: Logger): Promise<void> {
  const target = dir.startsWith("/") ? dir : `/${dir}`;
  try {
    await session.cd(target);
    return;
  } catch (e) {
    log.debug("remote directory missing, creating", { dir: target, error: errorMessage(e) });
  }

  let prefix = "";
  for (const segment of target.split("/").filter(Boolean)) {
    prefix = `${prefix}/${segment}`;
    try {
      await session.cd(prefix);
      continue;
    } catch (e) {
      log.debug("cd failed", { dir: prefix, error: errorMessage(e) });
    }
    try {
      await session.mkdir(prefix);
      log.info("created remote directory", { dir: prefix });
    } catch (e) {
      log.debug("mkdir failed, checking whether it exists now", { dir: prefix, error: errorMessage(e) });
    }
    await session.cd(prefix);
  }
  if (!prefix) await session.cd("/");
}

/**
 * Upload one processed artifact. Each attempt runs on its own session,
 * closed whatever the attempt's outcome.
 */
export async function publishArtifact(
  ctx: SyncContext,
  localPath: string,
  remoteName: string,
  openSession: SessionOpener
): Promise<PublishOutcome> {
  const log = ctx.log.scope("publish");
  const ftp = ctx.config.ftp;
  const name = remoteFileName(remoteName);

  const result = await withRetry(
    async () => {
      const session = await openSession(ftp);
      try {
        await ensureRemoteDirectory(session, ftp.remoteDirectory, log);
        await session.upload(localPath, name);
      } finally {
        session.close();
      }
    },
    {
      maxRetries: ftp.maxRetries,
      sleep: (ms) => ctx.sleep(ms),
      onRetry: ({ attempt, error, delayMs }) =>
        log.warn(`upload attempt ${attempt + 1} failed, retrying`, { file: name, error: errorMessage(error), delayMs }),
    }
  );

  if (result.ok) {
    log.info("uploaded", { file: name, dir: ftp.remoteDirectory });
    return { ok: true, attempts: result.attempts };
  }
  log.error(`upload failed after ${result.attempts} attempts`, { file: name, error: result.message });
  return { ok: false, error: result.message, attempts: result.attempts };
}
