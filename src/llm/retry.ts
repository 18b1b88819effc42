// ── Retry with Exponential Backoff ───────────────────────────────────

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Base delay in ms (default: 500), doubled on each retry */
  baseDelayMs?: number;
  /** Which HTTP status codes should trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "planner") */
  label?: string;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 2,
  baseDelayMs: 500,
  retryableStatuses: [429, 500, 502, 503, 504],
  label: "model call",
};

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

      if (!isRetryable(error, retryableStatuses) || attempt === maxRetries) {
        break;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying model call",
      );
      await sleep(delayMs);
    }
  }

  throw lastError;
}

/**
 * Reject with a "timed out" error if `promise` has not settled within `ms`.
 * The timer is cleared either way so nothing is left pending.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "operation",
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`${label} timed out after ${ms}ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ── Helpers ──────────────────────────────────────────────

function isRetryable(error: unknown, retryableStatuses: number[]): boolean {
  // Network errors (fetch failures, resets)
  if (error instanceof TypeError) return true;
  if (error instanceof Error && error.message.includes("ECONNRESET"))
    return true;
  if (error instanceof Error && error.message.includes("ETIMEDOUT"))
    return true;

  const status = getStatusCode(error);
  return status !== undefined && retryableStatuses.includes(status);
}

export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  // OpenAI SDK errors carry `status`; some transports use `statusCode`
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
