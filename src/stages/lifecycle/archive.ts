import { copyFile, open, rename, rm, unlink } from "fs/promises";
import path from "path";
import type { SyncContext } from "../../shared/context";
import { errorCode } from "../../shared/errors";
import type { ArchivedArtifact } from "../../shared/types";

const MAX_SUFFIX = 10_000;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time, `YYYYMMDD_HHMMSS`. */
export function archiveTimestamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

export function archiveName(fileName: string, at: Date, suffix = 0): string {
  const ext = path.extname(fileName);
  const base = ext ? fileName.slice(0, -ext.length) : fileName;
  return `${base}_${archiveTimestamp(at)}${suffix ? `_${suffix}` : ""}${ext}`;
}

/** Create an empty placeholder at the first free name; returns its path. */
async function reserveArchivePath(dir: string, fileName: string, at: Date): Promise<string> {
  for (let n = 0; n < MAX_SUFFIX; n++) {
    const candidate = path.join(dir, archiveName(fileName, at, n));
    try {
      const handle = await open(candidate, "wx");
      await handle.close();
      return candidate;
    } catch (e) {
      if (errorCode(e) !== "EEXIST") throw e;
    }
  }
  throw new Error(`no free archive name for ${fileName}`);
}

async function moveOnto(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (e) {
    if (errorCode(e) !== "EXDEV") throw e;
    await copyFile(source, target);
    await unlink(source);
  }
}

/** Move `sourcePath` into the archive under a timestamped, never-reused name. */
export async function archiveArtifact(ctx: SyncContext, sourcePath: string): Promise<ArchivedArtifact> {
  const archivePath = await reserveArchivePath(ctx.paths.archive, path.basename(sourcePath), ctx.now());
  try {
    await moveOnto(sourcePath, archivePath);
  } catch (e) {
    await rm(archivePath, { force: true });
    throw e;
  }
  ctx.log.scope("archive").info("archived", { from: sourcePath, to: archivePath });
  return { sourcePath, archivePath };
}
