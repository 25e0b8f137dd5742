// Leveled, scoped logger writing to the console and an optional log file
import { appendFileSync } from "fs";
import { errorMessage } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Child logger whose lines carry `[scope]`. */
  scope(name: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
  console?: boolean;
}

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = (value || "").trim().toLowerCase();
  if (v === "warning") return "warn";
  if (v === "critical" || v === "fatal") return "error";
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : fallback;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock timestamp, `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatLine(level: LogLevel, scopes: string[], message: string, context?: LogContext, at = new Date()): string {
  const scopeTag = scopes.length ? ` [${scopes.join(":")}]` : "";
  const fields = context
    ? Object.entries(context)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${formatValue(v)}`)
        .join(" ")
    : "";
  return `${formatTimestamp(at)} ${level.toUpperCase().padEnd(5)}${scopeTag} ${message}${fields ? ` ${fields}` : ""}`;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = order[opts.level ?? "info"];
  const toConsole = opts.console ?? true;
  const file = opts.file;
  let fileBroken = false;

  function write(level: LogLevel, scopes: string[], message: string, context?: LogContext) {
    if (order[level] < threshold) return;
    const line = formatLine(level, scopes, message, context);
    if (toConsole) {
      // eslint-disable-next-line no-console
      console[level === "debug" ? "log" : level](line);
    }
    if (file && !fileBroken) {
      try {
        appendFileSync(file, line + "\n", "utf8");
      } catch (e) {
        // keep logging to the console; report the file sink once
        fileBroken = true;
        // eslint-disable-next-line no-console
        console.error(`[logger] cannot write ${file}: ${errorMessage(e)}`);
      }
    }
  }

  function build(scopes: string[]): Logger {
    return {
      debug: (m, c) => write("debug", scopes, m, c),
      info: (m, c) => write("info", scopes, m, c),
      warn: (m, c) => write("warn", scopes, m, c),
      error: (m, c) => write("error", scopes, m, c),
      scope: (name) => build([...scopes, name]),
    };
  }

  return build([]);
}
