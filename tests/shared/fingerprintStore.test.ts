import { readdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FingerprintStore } from "../../src/shared/persistence/fingerprintStore";
import { appendFailure, formatFailureLine } from "../../src/shared/persistence/failureLog";
import { makeTempDir, recordingLogger, removeDir } from "../helpers/fixtures";

describe("FingerprintStore", () => {
  let dir: string;
  let file: string;
  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, "processed_hashes.json");
  });
  afterEach(async () => {
    await removeDir(dir);
  });

  it("starts empty when the ledger does not exist", async () => {
    const log = recordingLogger();
    const store = await FingerprintStore.load(file, log);
    expect(store.size).toBe(0);
    expect(log.entries.filter((e) => e.level === "warn")).toEqual([]);
  });

  it("loads current and legacy entries and drops unknown shapes", async () => {
    const loadedAt = new Date("2024-06-01T00:00:00.000Z");
    await writeFile(
      file,
      JSON.stringify({
        "https://a.test/x.png": "abc123",
        "https://a.test/y.png": { hash: "def456", timestamp: "2024-05-01T10:00:00.000Z" },
        "https://a.test/z.png": 42,
        "https://a.test/w.png": { hash: "0aa", timestamp: "yesterday-ish" },
      })
    );
    const log = recordingLogger();
    const store = await FingerprintStore.load(file, log, loadedAt);

    expect(store.size).toBe(3);
    expect(store.get("https://a.test/x.png")).toEqual({ contentHash: "abc123", lastSuccessAt: loadedAt });
    expect(store.get("https://a.test/y.png")).toEqual({
      contentHash: "def456",
      lastSuccessAt: new Date("2024-05-01T10:00:00.000Z"),
    });
    expect(store.get("https://a.test/w.png")?.lastSuccessAt.getTime()).toBe(0);
    expect(store.get("https://a.test/z.png")).toBeUndefined();
    expect(log.entries.filter((e) => e.level === "warn").map((e) => e.message)).toEqual([
      "unexpected fingerprint ledger entry dropped",
    ]);
  });

  it("starts empty on a corrupt ledger", async () => {
    await writeFile(file, "{ truncated");
    const log = recordingLogger();
    const store = await FingerprintStore.load(file, log);
    expect(store.size).toBe(0);
    expect(log.entries[0]).toMatchObject({ level: "warn", message: "could not parse fingerprint ledger, starting empty" });
  });

  it("replaces a record even when the stored one is stamped later", async () => {
    const store = await FingerprintStore.load(file, recordingLogger());
    const ahead = new Date("2024-06-02T00:00:00.000Z");
    const earlier = new Date("2024-06-01T00:00:00.000Z");
    store.put("u", { contentHash: "h1", lastSuccessAt: ahead });
    store.put("u", { contentHash: "h2", lastSuccessAt: earlier });
    expect(store.get("u")).toEqual({ contentHash: "h2", lastSuccessAt: earlier });
  });

  it("hands out copies", async () => {
    const store = await FingerprintStore.load(file, recordingLogger());
    store.put("u", { contentHash: "h", lastSuccessAt: new Date(1000) });
    store.get("u")?.lastSuccessAt.setTime(5);
    expect(store.get("u")?.lastSuccessAt.getTime()).toBe(1000);
  });

  it("flushes the whole ledger atomically and reloads it", async () => {
    const store = await FingerprintStore.load(file, recordingLogger());
    store.put("https://a.test/x.png", { contentHash: "aa", lastSuccessAt: new Date("2024-06-01T12:00:00.000Z") });
    store.put("https://a.test/y.png", { contentHash: "bb", lastSuccessAt: new Date("2024-06-01T13:00:00.000Z") });

    const [first, second] = await Promise.all([store.flush(), store.flush()]);
    expect(first && second).toBe(true);
    expect(await readdir(dir)).toEqual(["processed_hashes.json"]);
    expect(JSON.parse(await readFile(file, "utf8"))).toEqual({
      "https://a.test/x.png": { hash: "aa", timestamp: "2024-06-01T12:00:00.000Z" },
      "https://a.test/y.png": { hash: "bb", timestamp: "2024-06-01T13:00:00.000Z" },
    });

    const reloaded = await FingerprintStore.load(file, recordingLogger());
    expect(reloaded.entries()).toEqual(store.entries());
  });

  it("reports a failed flush without throwing", async () => {
    const log = recordingLogger();
    const store = await FingerprintStore.load(path.join(dir, "missing", "ledger.json"), log);
    store.put("u", { contentHash: "h", lastSuccessAt: new Date(0) });
    await expect(store.flush()).resolves.toBe(false);
    expect(log.entries.some((e) => e.level === "error" && e.message === "could not save fingerprint ledger")).toBe(true);
    expect(store.size).toBe(1);
  });
});

describe("failure log", () => {
  it("formats one line per failure", () => {
    expect(formatFailureLine(new Date("2024-06-01T08:00:00.000Z"), "https://a.test/x.png", "HTTP 503\nfor x")).toBe(
      "2024-06-01T08:00:00.000Z - Failed to download https://a.test/x.png - HTTP 503 for x\n"
    );
  });

  it("appends to the log file", async () => {
    const dir = await makeTempDir();
    try {
      const file = path.join(dir, "download_failures.log");
      const log = recordingLogger();
      await appendFailure(file, { at: new Date("2024-06-01T08:00:00.000Z"), identity: "u1", error: "e1" }, log);
      await appendFailure(file, { at: new Date("2024-06-01T09:00:00.000Z"), identity: "u2", error: "e2" }, log);
      expect(await readFile(file, "utf8")).toBe(
        "2024-06-01T08:00:00.000Z - Failed to download u1 - e1\n2024-06-01T09:00:00.000Z - Failed to download u2 - e2\n"
      );
    } finally {
      await removeDir(dir);
    }
  });
});
