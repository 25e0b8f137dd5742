/**
 * Fingerprint ledger: URL → { hash, timestamp } of the last successful fetch.
 *
 * Persisted as one JSON document (archive/processed_hashes.json by default):
 *   { "https://host/radar.png": { "hash": "<sha256 hex>", "timestamp": "<ISO-8601>" } }
 *
 * Older ledgers mapped URL → bare hash string; those entries load with the
 * load time as timestamp. Anything else is dropped with a warning.
 *
 * Writes go to the in-memory map only (`put`, called by the runner). `flush`
 * persists the whole map with write-temp-then-rename, and concurrent flushes
 * are chained so two writers never interleave on disk.
 */
import { readFile, rename, rm, writeFile } from "fs/promises";
import { errorCode, errorMessage } from "../errors";
import type { Logger } from "../logging/logger";
import { isPlainRecord } from "../logic/mergeSettings";
import type { FingerprintReader, FingerprintRecord } from "../types";

export interface LedgerEntry {
  hash: string;
  timestamp: string;
}

export type LedgerDocument = Record<string, LedgerEntry>;

function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== "string") return null;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

/** Normalize one persisted entry; null means unrecognized. */
export function normalizeLedgerEntry(value: unknown, loadedAt: Date): FingerprintRecord | null {
  if (typeof value === "string" && value) {
    return { contentHash: value, lastSuccessAt: loadedAt };
  }
  if (isPlainRecord(value) && typeof value.hash === "string" && value.hash) {
    // unparseable timestamps count as stale so the next fetch reprocesses
    const at = parseTimestamp(value.timestamp) ?? new Date(0);
    return { contentHash: value.hash, lastSuccessAt: at };
  }
  return null;
}

export class FingerprintStore implements FingerprintReader {
  private readonly records = new Map<string, FingerprintRecord>();
  private flushChain: Promise<boolean> = Promise.resolve(true);
  private flushSeq = 0;

  constructor(
    readonly file: string,
    private readonly log: Logger
  ) {}

  static async load(file: string, log: Logger, loadedAt: Date = new Date()): Promise<FingerprintStore> {
    const store = new FingerprintStore(file, log);
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (e) {
      if (errorCode(e) !== "ENOENT") {
        log.warn("could not read fingerprint ledger", { file, error: errorMessage(e) });
      }
      return store;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      log.warn("could not parse fingerprint ledger, starting empty", { file, error: errorMessage(e) });
      return store;
    }
    if (!isPlainRecord(data)) {
      log.warn("fingerprint ledger is not an object, starting empty", { file });
      return store;
    }

    for (const [identity, value] of Object.entries(data)) {
      const record = normalizeLedgerEntry(value, loadedAt);
      if (record) {
        store.records.set(identity, record);
      } else {
        log.warn("unexpected fingerprint ledger entry dropped", { identity, value: JSON.stringify(value) });
      }
    }
    log.debug("fingerprint ledger loaded", { file, entries: store.records.size });
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  get(identity: string): FingerprintRecord | undefined {
    const r = this.records.get(identity);
    return r ? { contentHash: r.contentHash, lastSuccessAt: new Date(r.lastSuccessAt.getTime()) } : undefined;
  }

  /** Each successful fetch replaces the stored record, whatever its timestamp. */
  put(identity: string, record: FingerprintRecord): void {
    this.records.set(identity, { contentHash: record.contentHash, lastSuccessAt: new Date(record.lastSuccessAt.getTime()) });
  }

  entries(): Array<[string, FingerprintRecord]> {
    return Array.from(this.records.entries(), ([k, v]) => [k, { ...v }]);
  }

  toDocument(): LedgerDocument {
    const doc: LedgerDocument = {};
    for (const [identity, r] of this.records) {
      doc[identity] = { hash: r.contentHash, timestamp: r.lastSuccessAt.toISOString() };
    }
    return doc;
  }

  /**
   * Persist the whole ledger. Never throws: a failed write is logged and the
   * in-memory state stays authoritative until the next successful flush.
   */
  flush(): Promise<boolean> {
    const next = this.flushChain.then(() => this.writeDocument());
    this.flushChain = next;
    return next;
  }

  private async writeDocument(): Promise<boolean> {
    const body = JSON.stringify(this.toDocument(), null, 2);
    const tmp = `${this.file}.${process.pid}.${++this.flushSeq}.tmp`;
    try {
      await writeFile(tmp, body, "utf8");
      await rename(tmp, this.file);
      this.log.debug("fingerprint ledger saved", { file: this.file, entries: this.records.size });
      return true;
    } catch (e) {
      this.log.error("could not save fingerprint ledger", { file: this.file, error: errorMessage(e) });
      await rm(tmp, { force: true }).catch((rmErr: unknown) => {
        this.log.debug("could not remove ledger temp file", { tmp, error: errorMessage(rmErr) });
      });
      return false;
    }
  }
}
