export type CrawlErrorKind = "fatal_api" | "storage" | "lease" | "account_mismatch" | "config";

export class CrawlError extends Error {
  constructor(message: string, public kind: CrawlErrorKind, public code: string) {
    super(message);
    this.name = "CrawlError";
  }
}

export class FatalApiError extends CrawlError {
  constructor(message: string, code = "API_FATAL") {
    super(message, "fatal_api", code);
    this.name = "FatalApiError";
  }
}

export class StorageError extends CrawlError {
  constructor(message: string, cause?: unknown) {
    super(message, "storage", "STORAGE_FAILURE");
    this.name = "StorageError";
    this.cause = cause;
  }
}

export class LeaseError extends CrawlError {
  constructor(message: string, public holder?: string) {
    super(message, "lease", "LEASE_HELD");
    this.name = "LeaseError";
  }
}

export class AccountMismatchError extends CrawlError {
  constructor(public boundTo: string, public requested: string) {
    super(`Store already tracks @${boundTo}, refusing @${requested}`, "account_mismatch", "ACCOUNT_MISMATCH");
    this.name = "AccountMismatchError";
  }
}

export class ConfigError extends CrawlError {
  constructor(message: string) {
    super(message, "config", "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
