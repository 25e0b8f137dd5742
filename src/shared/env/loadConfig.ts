/**
 * Sync configuration loader.
 *
 * Reads config.json, applies environment overrides (loaded from .env by the
 * CLI through dotenv), validates with zod and returns the camelCase
 * SyncConfig every component consumes. Any problem here is fatal: callers get
 * a ConfigError before a single item is processed.
 *
 * The `images` list is deliberately passed through unvalidated; entries are
 * normalized per item at run time so one bad entry only skips that item.
 */
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors";
import { parseLogLevel, type LogLevel } from "../logging/logger";
import { isPlainRecord } from "../logic/mergeSettings";
import type { RetentionPolicy, SettingValue, SettingsRecord } from "../types";

export const DEFAULT_CONFIG_FILE = "config.json";

export interface DownloadSettings {
  userAgent: string;
  maxRetries: number;
  timeoutMs: number;
  forceRedownloadHours: number;
}

export interface FtpSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  remoteDirectory: string;
  maxRetries: number;
  timeoutMs: number;
  concurrentUploads: number;
  secure: boolean;
}

export interface ScheduleSettings {
  intervalMinutes: number;
  archiveCleanupAt: string; // HH:MM local time
}

export interface PathSettings {
  downloads: string;
  processed: string;
  archive: string;
  ledger?: string;
  failureLog?: string;
}

export interface SyncConfig {
  images: unknown[];
  download: DownloadSettings;
  processing: SettingsRecord;
  ftp: FtpSettings;
  retention: RetentionPolicy;
  schedule: ScheduleSettings;
  logging: { level: LogLevel; file?: string };
  paths: PathSettings;
}

const SettingValueSchema: z.ZodType<SettingValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(SettingValueSchema), z.record(SettingValueSchema)])
);

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const positive = (fallback: number) => z.coerce.number().positive().default(fallback);

const ConfigSchema = z.object({
  images: z.preprocess(
    (v) => (v === undefined || v === null ? [] : Array.isArray(v) ? v : [v]),
    z.array(z.unknown())
  ),
  download: z
    .object({
      user_agent: z.string().min(1).default("ImageProcessor/1.0"),
      max_retries: count(2),
      timeout: positive(30),
      force_redownload_hours: z.coerce.number().min(0).default(6),
    })
    .default({}),
  processing: z.record(SettingValueSchema).default({}),
  ftp: z.object({
    host: z.string({ required_error: "ftp.host is required" }).min(1, "ftp.host is required"),
    port: z.coerce.number().int().min(1).max(65535).default(21),
    username: z.string({ required_error: "ftp.username is required" }).min(1, "ftp.username is required"),
    password: z.string({ required_error: "ftp.password is required" }),
    remote_directory: z.string().default("/"),
    max_retries: count(2),
    timeout: positive(30),
    concurrent_uploads: z.coerce.number().int().min(1).default(5),
    secure: z.boolean().default(false),
  }, { required_error: "ftp section is required" }),
  retention: z
    .object({
      days_to_keep: z.coerce.number().min(0).default(14),
      archive_days: z.coerce.number().min(0).default(14),
      cleanup_on_start: z.boolean().default(true),
      delete_after_upload: z.boolean().default(true),
    })
    .default({}),
  schedule: z
    .object({
      interval_minutes: positive(10),
      archive_cleanup_at: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM").default("00:00"),
    })
    .default({}),
  logging: z
    .object({
      level: z.string().default("INFO"),
      file: z.string().nullable().default("image_processor.log"),
    })
    .default({}),
  paths: z
    .object({
      downloads: z.string().min(1).default("downloads"),
      processed: z.string().min(1).default("processed"),
      archive: z.string().min(1).default("archive"),
      ledger: z.string().min(1).optional(),
      failure_log: z.string().min(1).optional(),
    })
    .default({}),
});

type RawConfig = z.infer<typeof ConfigSchema>;

/** Environment variables win over the file; blank values are ignored. */
function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isPlainRecord(raw)) return raw;
  const root: Record<string, unknown> = { ...raw };
  const ftp: Record<string, unknown> = isPlainRecord(root.ftp) ? { ...root.ftp } : {};
  const overrides: Array<[string, string | undefined]> = [
    ["host", env.IMAGE_SYNC_FTP_HOST],
    ["port", env.IMAGE_SYNC_FTP_PORT],
    ["username", env.IMAGE_SYNC_FTP_USERNAME],
    ["password", env.IMAGE_SYNC_FTP_PASSWORD],
    ["concurrent_uploads", env.IMAGE_SYNC_CONCURRENCY],
  ];
  let touched = isPlainRecord(root.ftp);
  for (const [key, value] of overrides) {
    if (value !== undefined && value !== "") {
      ftp[key] = value;
      touched = true;
    }
  }
  if (touched) root.ftp = ftp;
  if (env.LOG_LEVEL) {
    const logging: Record<string, unknown> = isPlainRecord(root.logging) ? { ...root.logging } : {};
    logging.level = env.LOG_LEVEL;
    root.logging = logging;
  }
  return root;
}

function toSyncConfig(raw: RawConfig): SyncConfig {
  return {
    images: raw.images,
    download: {
      userAgent: raw.download.user_agent,
      maxRetries: raw.download.max_retries,
      timeoutMs: raw.download.timeout * 1000,
      forceRedownloadHours: raw.download.force_redownload_hours,
    },
    processing: raw.processing,
    ftp: {
      host: raw.ftp.host,
      port: raw.ftp.port,
      username: raw.ftp.username,
      password: raw.ftp.password,
      remoteDirectory: raw.ftp.remote_directory,
      maxRetries: raw.ftp.max_retries,
      timeoutMs: raw.ftp.timeout * 1000,
      concurrentUploads: raw.ftp.concurrent_uploads,
      secure: raw.ftp.secure,
    },
    retention: {
      workingDays: raw.retention.days_to_keep,
      archiveDays: raw.retention.archive_days,
      cleanupOnStart: raw.retention.cleanup_on_start,
      deleteAfterPublish: raw.retention.delete_after_upload,
    },
    schedule: {
      intervalMinutes: raw.schedule.interval_minutes,
      archiveCleanupAt: raw.schedule.archive_cleanup_at,
    },
    logging: {
      level: parseLogLevel(raw.logging.level),
      file: raw.logging.file || undefined,
    },
    paths: {
      downloads: raw.paths.downloads,
      processed: raw.paths.processed,
      archive: raw.paths.archive,
      ledger: raw.paths.ledger,
      failureLog: raw.paths.failure_log,
    },
  };
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return toSyncConfig(parsed.data);
}

export function loadConfig(file: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  if (!existsSync(file)) {
    throw new ConfigError(`Configuration file ${file} not found. Please create it.`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`Could not read configuration file ${file}: ${errorMessage(e)}`);
  }
  return parseConfig(raw, env);
}
