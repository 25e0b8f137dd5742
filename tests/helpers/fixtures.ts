import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { createSyncContext, type SyncContext } from "../../src/shared/context";
import { parseConfig, type SyncConfig } from "../../src/shared/env/loadConfig";
import type { LogContext, LogLevel, Logger } from "../../src/shared/logging/logger";
import { isPlainRecord } from "../../src/shared/logic/mergeSettings";

export async function makeTempDir(prefix = "image-sync-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface LogEntry {
  level: LogLevel;
  scopes: string[];
  message: string;
  context?: LogContext;
}

/** Logger that keeps every line in memory. */
export function recordingLogger(entries: LogEntry[] = [], scopes: string[] = []): Logger & { entries: LogEntry[] } {
  const push = (level: LogLevel) => (message: string, context?: LogContext) => {
    entries.push({ level, scopes, message, context });
  };
  return {
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    scope: (name) => recordingLogger(entries, [...scopes, name]),
  };
}

/** Valid config with test FTP credentials; `raw` sections are layered over it. */
export function makeConfig(raw: Record<string, unknown> = {}): SyncConfig {
  const ftp = isPlainRecord(raw.ftp) ? raw.ftp : {};
  return parseConfig(
    {
      ...raw,
      ftp: { host: "ftp.test", username: "tester", password: "test-secret", ...ftp },
      logging: { level: "error", file: null },
    },
    {}
  );
}

export interface TestContextOptions {
  config?: SyncConfig;
  now?: () => Date;
  log?: Logger;
  delays?: number[];
}

/** Context rooted at `baseDir`; sleeps resolve immediately and are recorded in `delays`. */
export function makeContext(baseDir: string, opts: TestContextOptions = {}): SyncContext {
  const delays = opts.delays ?? [];
  return createSyncContext(opts.config ?? makeConfig(), {
    baseDir,
    log: opts.log ?? recordingLogger(),
    now: opts.now,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
}

export interface FakeResponse {
  status: number;
  body?: Buffer | string;
  /** Emit this many bytes of the body, then fail the stream. */
  breakAfter?: number;
}

/** Readable that yields part of `body` and then errors like a dropped connection. */
export function brokenStream(body: Buffer, breakAfter: number): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(body.subarray(0, breakAfter));
        return;
      }
      this.destroy(new Error("socket hang up"));
    },
  });
}

/**
 * axios adapter answering from `respond(url, callNumber)` with a streamed body.
 * `calls` lists every requested URL in order, `configs` the request configs.
 */
export function streamAdapter(respond: (url: string, call: number) => FakeResponse | Promise<FakeResponse>): {
  adapter: AxiosAdapter;
  calls: string[];
  configs: InternalAxiosRequestConfig[];
} {
  const calls: string[] = [];
  const configs: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const url = config.url ?? "";
    calls.push(url);
    configs.push(config);
    const res = await respond(url, calls.length);
    const body = Buffer.from(res.body ?? "");
    const data = res.breakAfter !== undefined ? brokenStream(body, res.breakAfter) : Readable.from([body]);
    return { data, status: res.status, statusText: String(res.status), headers: {}, config };
  };
  return { adapter, calls, configs };
}
