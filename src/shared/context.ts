// Explicit run context: built once at startup, passed to every component
import { mkdirSync } from "fs";
import path from "path";
import type { SyncConfig } from "./env/loadConfig";
import { createLogger, type Logger } from "./logging/logger";
import { sleep } from "./timing";

export interface SyncPaths {
  downloads: string;
  processed: string;
  archive: string;
  ledger: string;
  failureLog: string;
}

export interface SyncContext {
  readonly config: SyncConfig;
  readonly paths: SyncPaths;
  readonly log: Logger;
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export interface ContextOptions {
  baseDir?: string;
  log?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function resolvePaths(config: SyncConfig, baseDir: string): SyncPaths {
  const archive = path.resolve(baseDir, config.paths.archive);
  return {
    downloads: path.resolve(baseDir, config.paths.downloads),
    processed: path.resolve(baseDir, config.paths.processed),
    archive,
    ledger: config.paths.ledger ? path.resolve(baseDir, config.paths.ledger) : path.join(archive, "processed_hashes.json"),
    failureLog: config.paths.failureLog
      ? path.resolve(baseDir, config.paths.failureLog)
      : path.join(archive, "download_failures.log"),
  };
}

/** Creates the working and archive directories if missing. */
export function ensureDirectories(paths: SyncPaths): void {
  for (const dir of [paths.downloads, paths.processed, paths.archive, path.dirname(paths.ledger), path.dirname(paths.failureLog)]) {
    mkdirSync(dir, { recursive: true });
  }
}

export function createSyncContext(config: SyncConfig, opts: ContextOptions = {}): SyncContext {
  const baseDir = opts.baseDir ?? process.cwd();
  const paths = resolvePaths(config, baseDir);
  ensureDirectories(paths);
  const log =
    opts.log ??
    createLogger({
      level: config.logging.level,
      file: config.logging.file ? path.resolve(baseDir, config.logging.file) : undefined,
    });
  return {
    config,
    paths,
    log,
    now: opts.now ?? (() => new Date()),
    sleep: opts.sleep ?? sleep,
  };
}
