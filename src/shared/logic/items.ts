import path from "path";
import { ItemValidationError } from "../errors";
import { hashUrl } from "../hash";
import type { ItemSpec, SettingsRecord } from "../types";
import { isPlainRecord, isSettingsRecord } from "./mergeSettings";

/**
 * Tagged view of one raw `images` entry from config.
 * Either a bare URL string or a record with `url` / `source`.
 */
export type ItemEntry =
  | { kind: "locator"; locator: string }
  | { kind: "record"; locator: string; filename?: string; settings: SettingsRecord };

export function classifyItemEntry(raw: unknown): ItemEntry {
  if (typeof raw === "string") {
    return { kind: "locator", locator: raw.trim() };
  }
  if (isPlainRecord(raw)) {
    const url = typeof raw.url === "string" && raw.url.trim() ? raw.url : undefined;
    const source = typeof raw.source === "string" && raw.source.trim() ? raw.source : undefined;
    const locator = url ?? source;
    if (!locator) {
      throw new ItemValidationError("image entry missing 'url' (or 'source') key", raw);
    }
    if (raw.filename !== undefined && raw.filename !== null && typeof raw.filename !== "string") {
      throw new ItemValidationError("image entry 'filename' must be a string", raw);
    }
    let settings: SettingsRecord = {};
    const rawSettings = raw.settings;
    if (rawSettings !== undefined && rawSettings !== null) {
      if (!isSettingsRecord(rawSettings)) {
        throw new ItemValidationError("image entry 'settings' must be an object", raw);
      }
      settings = rawSettings;
    }
    const filename = typeof raw.filename === "string" && raw.filename.trim() ? raw.filename.trim() : undefined;
    return { kind: "record", locator: locator.trim(), filename, settings };
  }
  throw new ItemValidationError(`image entry must be a URL string or an object, got ${raw === null ? "null" : typeof raw}`, raw);
}

function assertAbsoluteLocator(locator: string, raw: unknown): URL {
  if (!locator) throw new ItemValidationError("image entry has an empty URL", raw);
  let parsed: URL;
  try {
    parsed = new URL(locator);
  } catch {
    throw new ItemValidationError(`image URL is not absolute: ${locator}`, raw);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ItemValidationError(`unsupported URL scheme ${parsed.protocol} in ${locator}`, raw);
  }
  return parsed;
}

function fileNameFromUrl(url: URL): string | undefined {
  let name: string;
  try {
    name = path.posix.basename(decodeURIComponent(url.pathname));
  } catch {
    name = path.posix.basename(url.pathname);
  }
  return name && name !== "/" ? name : undefined;
}

/**
 * Normalize a raw config entry into an ItemSpec.
 * Throws ItemValidationError for shapes that cannot be synced.
 */
export function normalizeItem(raw: unknown): ItemSpec {
  const entry = classifyItemEntry(raw);
  const url = assertAbsoluteLocator(entry.locator, raw);
  const configured = entry.kind === "record" ? entry.filename : undefined;
  // strip any directory part a config author put in the name
  const explicitName = configured ? path.basename(configured) : undefined;
  const displayName = explicitName || fileNameFromUrl(url) || `image_${hashUrl(entry.locator)}.jpg`;
  const settings = entry.kind === "record" ? entry.settings : {};
  return Object.freeze({
    identity: entry.locator,
    displayName,
    settings: Object.freeze({ ...settings }),
  });
}

export interface NormalizedItems {
  items: ItemSpec[];
  rejected: Array<{ index: number; error: ItemValidationError }>;
}

export function normalizeItems(raw: readonly unknown[]): NormalizedItems {
  const items: ItemSpec[] = [];
  const rejected: NormalizedItems["rejected"] = [];
  raw.forEach((entry, index) => {
    try {
      items.push(normalizeItem(entry));
    } catch (e) {
      if (e instanceof ItemValidationError) rejected.push({ index, error: e });
      else throw e;
    }
  });
  return { items, rejected };
}

/** `radar.png` → `radar`. */
export function baseName(displayName: string): string {
  const ext = path.extname(displayName);
  return ext ? displayName.slice(0, -ext.length) : displayName;
}

export const PROCESSED_EXTENSION = ".webp";

/** Remote and processed file name: always the encoded-image extension. */
export function processedName(item: ItemSpec): string {
  return `${baseName(item.displayName)}${PROCESSED_EXTENSION}`;
}

export function rawName(item: ItemSpec): string {
  return `${baseName(item.displayName)}.original`;
}
