// ── Memory Errors ────────────────────────────────────────

export type MemoryErrorCode =
  | "STORAGE_UNAVAILABLE"
  | "DUPLICATE_ID"
  | "EMBEDDING_UNAVAILABLE"
  | "CACHE_INCONSISTENT"
  | "PARTIAL_SCAN_FAILURE"
  | "RETRIEVAL_UNAVAILABLE"
  | "INVALID_PROFILE"
  | "PROFILE_REQUIRED"
  | "CONFIG_INVALID";

/** Base class for every error the engine raises or hands back as a value. */
export class MemoryError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Durable backend unreachable or unwritable. Fatal on write paths. */
export class StorageUnavailableError extends MemoryError {
  constructor(message: string, options?: ErrorOptions) {
    super("STORAGE_UNAVAILABLE", message, options);
  }
}

export class DuplicateIdError extends MemoryError {
  readonly recordId: string;

  constructor(profile: string, recordId: string) {
    super("DUPLICATE_ID", `Record ${recordId} already exists in profile "${profile}"`);
    this.recordId = recordId;
  }
}

/** Provider down or misbehaving. Returned as a value, never thrown past the engine. */
export class EmbeddingUnavailableError extends MemoryError {
  constructor(message: string, options?: ErrorOptions) {
    super("EMBEDDING_UNAVAILABLE", message, options);
  }
}

/** Cache generation behind the store. Recovered internally by a rebuild. */
export class CacheInconsistentError extends MemoryError {
  readonly cached: number;
  readonly current: number;

  constructor(cached: number, current: number) {
    super(
      "CACHE_INCONSISTENT",
      `Vector cache at generation ${cached}, store at ${current}`,
    );
    this.cached = cached;
    this.current = current;
  }
}

export class PartialScanFailureError extends MemoryError {
  constructor(profile: string, options?: ErrorOptions) {
    super(
      "PARTIAL_SCAN_FAILURE",
      `Record store scan failed for profile "${profile}"`,
      options,
    );
  }
}

/** Neither the working buffer nor the record store could supply candidates. */
export class RetrievalUnavailableError extends MemoryError {
  constructor(message: string, options?: ErrorOptions) {
    super("RETRIEVAL_UNAVAILABLE", message, options);
  }
}

export class InvalidProfileError extends MemoryError {
  constructor(profile: string) {
    super("INVALID_PROFILE", `Invalid profile name: "${profile}"`);
  }
}

export class ProfileRequiredError extends MemoryError {
  constructor(operation: string) {
    super(
      "PROFILE_REQUIRED",
      `${operation} requires a named profile (anonymous sessions have no persistent memory)`,
    );
  }
}

export class ConfigError extends MemoryError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

/** Narrow an unknown thrown value to an Error for logging and `cause`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
