/**
 * Error types shared by storage, search and the session model.
 *
 * Every error carries a string `code` so callers can branch without
 * `instanceof` checks across module boundaries.
 */

export type StorageErrorCode =
  | "not-found"
  | "invalid-format"
  | "permission-denied"
  | "corrupted-data"
  | "insufficient-space"
  | "encode-failed"
  | "decode-failed";

export type ErrorCode =
  | StorageErrorCode
  | "capacity-exceeded"
  | "invalid-regex"
  | "search-timeout"
  | "invalid-transition";

export class NetrecallError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetrecallError";
    this.code = code;
  }
}

export class StorageError extends NetrecallError {
  declare readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "StorageError";
  }
}

export class CapacityError extends NetrecallError {
  readonly limit: number;

  constructor(limit: number) {
    super("capacity-exceeded", `Session limit of ${limit} reached; delete sessions before saving new ones`);
    this.name = "CapacityError";
    this.limit = limit;
  }
}

export class InvalidRegexError extends NetrecallError {
  readonly pattern: string;

  constructor(pattern: string, message: string, options?: { cause?: unknown }) {
    super("invalid-regex", message, options);
    this.name = "InvalidRegexError";
    this.pattern = pattern;
  }
}

export class SearchTimeoutError extends NetrecallError {
  constructor(timeoutMs: number) {
    super("search-timeout", `Search exceeded the ${timeoutMs}ms timeout`);
    this.name = "SearchTimeoutError";
  }
}

export class SessionStateError extends NetrecallError {
  constructor(message: string) {
    super("invalid-transition", message);
    this.name = "SessionStateError";
  }
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** errno values from fs and result codes from SQLite */
const SYSTEM_ERROR_CODES: Record<string, StorageErrorCode> = {
  ENOENT: "not-found",
  EACCES: "permission-denied",
  EPERM: "permission-denied",
  EROFS: "permission-denied",
  ENOSPC: "insufficient-space",
  EDQUOT: "insufficient-space",
  SQLITE_CANTOPEN: "permission-denied",
  SQLITE_PERM: "permission-denied",
  SQLITE_READONLY: "permission-denied",
  SQLITE_FULL: "insufficient-space",
  SQLITE_CORRUPT: "corrupted-data",
  SQLITE_NOTADB: "corrupted-data",
};

function getErrnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Map a filesystem or SQLite failure onto a StorageError. Errors that are
 * already NetrecallErrors pass through untouched.
 */
export function toStorageError(
  err: unknown,
  context: string,
  fallback: StorageErrorCode = "corrupted-data"
): NetrecallError {
  if (err instanceof NetrecallError) {
    return err;
  }

  const errno = getErrnoCode(err);
  const code = (errno !== undefined ? SYSTEM_ERROR_CODES[errno] : undefined) ?? fallback;
  return new StorageError(code, `${context}: ${getErrorMessage(err)}`, { cause: err });
}
