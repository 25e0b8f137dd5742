import type { SettingValue, SettingsRecord } from "../types";

/** True for `{...}` values; arrays and null are not records. */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isSettingsRecord(value: unknown): value is SettingsRecord {
  return isPlainRecord(value) && isSettingValue(value);
}

/**
 * Merge per-image settings over the processing defaults.
 *
 * - key in both, both values records → merged recursively
 * - key in both otherwise → override wins
 * - key only in defaults → kept
 * - key only in overrides → added as-is
 *
 * Key order follows the defaults, then override-only keys. Neither input is
 * mutated. A non-record `overrides` yields a copy of the defaults.
 */
export function mergeSettings(defaults: SettingsRecord, overrides: unknown): SettingsRecord {
  if (!isPlainRecord(overrides)) return { ...defaults };
  const specific: SettingsRecord = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (isSettingValue(value)) specific[key] = value;
  }

  const result: SettingsRecord = {};
  for (const [key, value] of Object.entries(defaults)) {
    if (key in specific) {
      const override = specific[key];
      result[key] = isSettingsRecord(value) && isSettingsRecord(override) ? mergeSettings(value, override) : override;
    } else {
      result[key] = value;
    }
  }
  for (const [key, value] of Object.entries(specific)) {
    if (!(key in result)) result[key] = value;
  }
  return result;
}

export function isSettingValue(value: unknown): value is SettingValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (Array.isArray(value)) return value.every(isSettingValue);
      return Object.values(value).every(isSettingValue);
    default:
      return false;
  }
}
