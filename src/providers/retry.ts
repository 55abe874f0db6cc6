// ── Provider Retry — exponential backoff ─────────────────

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 500), doubled each retry */
  baseDelayMs?: number;
  /** HTTP status codes that trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "OpenAI embeddings") */
  label?: string;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 500,
  retryableStatuses: [429, 500, 502, 503, 504],
  label: "provider call",
};

const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED"]);

/**
 * Wraps an async function with exponential backoff retry logic.
 * Only retries on network errors or HTTP status codes in the retryable list.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, retryableStatuses, label } = {
    ...DEFAULT_OPTIONS,
    ...opts,
  };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryable(error, retryableStatuses)) throw error;
      if (attempt === maxRetries) break;

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "🔁 Provider call failed, backing off",
      );
      await sleep(delayMs);
    }
  }

  throw lastError;
}

// ── Helpers ──────────────────────────────────────────────

export function isRetryable(
  error: unknown,
  retryableStatuses: readonly number[] = DEFAULT_OPTIONS.retryableStatuses,
): boolean {
  // fetch() surfaces network failures as TypeError
  if (error instanceof TypeError) return true;

  const code = getErrorCode(error);
  if (code && RETRYABLE_CODES.has(code)) return true;
  if (
    error instanceof Error &&
    [...RETRYABLE_CODES].some((c) => error.message.includes(c))
  ) {
    return true;
  }

  const status = getStatusCode(error);
  return status !== undefined && retryableStatuses.includes(status);
}

/** `status` (OpenAI SDK) or `statusCode` on an error object */
export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function getErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
