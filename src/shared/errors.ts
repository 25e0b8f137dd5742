/**
 * Error types shared across the pipeline.
 *
 * Stage functions return outcome unions for expected failures; these classes
 * cover the cases that cross module boundaries as exceptions (startup config,
 * per-item validation, HTTP status handling inside the fetch retry loop).
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code = "APP_ERROR", context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Missing or malformed configuration. Fatal at startup. */
export class ConfigError extends AppError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, "CONFIG_ERROR", { issues });
  }
}

/** An `images` entry that cannot be turned into an ItemSpec. The item is skipped. */
export class ItemValidationError extends AppError {
  constructor(message: string, public readonly entry: unknown) {
    super(message, "ITEM_VALIDATION_ERROR");
  }
}

export class HttpStatusError extends AppError {
  constructor(public readonly status: number, url: string) {
    super(`HTTP ${status} for ${url}`, "HTTP_STATUS_ERROR", { status, url });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
