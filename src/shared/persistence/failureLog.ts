// Append-only record of downloads that exhausted their retries
import { appendFile } from "fs/promises";
import { errorMessage } from "../errors";
import type { Logger } from "../logging/logger";

export function formatFailureLine(at: Date, identity: string, error: string): string {
  // keep one line per failure even when the error text spans several
  const summary = error.replace(/\s*\n\s*/g, " ").trim();
  return `${at.toISOString()} - Failed to download ${identity} - ${summary}\n`;
}

/** Returns false (after logging) when the log itself cannot be written. */
export async function appendFailure(file: string, entry: { at: Date; identity: string; error: string }, log: Logger): Promise<boolean> {
  try {
    await appendFile(file, formatFailureLine(entry.at, entry.identity, entry.error), "utf8");
    return true;
  } catch (e) {
    log.warn("could not write failure log", { file, error: errorMessage(e) });
    return false;
  }
}
