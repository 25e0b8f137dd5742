// Shared domain types for the sync pipeline

export type SettingValue =
  | string
  | number
  | boolean
  | null
  | SettingValue[]
  | SettingsRecord;

export interface SettingsRecord {
  [key: string]: SettingValue;
}

/** One configured remote image, normalized. */
export interface ItemSpec {
  readonly identity: string;    // absolute http(s) URL
  readonly displayName: string; // file name used for local and remote artifacts
  readonly settings: Readonly<SettingsRecord>;
}

export interface FingerprintRecord {
  contentHash: string;   // hex sha256 of the downloaded bytes
  lastSuccessAt: Date;   // when this hash was last fetched successfully
}

/** Read side of the ledger handed to the Fetcher. */
export interface FingerprintReader {
  get(identity: string): FingerprintRecord | undefined;
}

export interface RetentionPolicy {
  workingDays: number;
  archiveDays: number;
  cleanupOnStart: boolean;
  deleteAfterPublish: boolean;
}

export type FetchOutcome =
  | { kind: "artifact"; path: string; contentHash: string; attempts: number }
  | { kind: "unchanged"; contentHash: string; attempts: number }
  | { kind: "failed"; error: string; attempts: number };

export type TransformOutcome =
  | { ok: true; path: string; width: number; height: number }
  | { ok: false; error: string };

export type PublishOutcome =
  | { ok: true; attempts: number }
  | { ok: false; error: string; attempts: number };

export interface ArchivedArtifact {
  sourcePath: string;
  archivePath: string;
}

export interface SweepResult {
  scanned: number;
  deleted: number;
  failed: number;
}

export type ItemStatus = "published" | "unchanged" | "failed";

export interface ItemResult {
  identity: string;
  status: ItemStatus;
  stage?: "fetch" | "transform" | "publish";
  error?: string;
  archivePath?: string;
  durationMs: number;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  unchanged: number;
  failed: number;
  invalid: number;
  durationMs: number;
}
