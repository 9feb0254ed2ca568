import { ConfluenceApiError } from "../errors.js";

export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  retryable?: (error: unknown) => boolean;
  /** Called before each wait with the failed attempt number (1-based). */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const RETRYABLE_STATUS = /\b(429|500|502|503|504)\b/;
const TRANSIENT_NETWORK = /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|fetch failed/i;

export function isRetryable(error: unknown): boolean {
  if (error instanceof ConfluenceApiError) {
    return error.status === 429 || (error.status >= 500 && error.status < 600);
  }
  if (!(error instanceof Error)) return false;
  if (error.name === "TimeoutError" || error.name === "AbortError") return true;
  // HTTP 429 and 5xx errors
  if (RETRYABLE_STATUS.test(error.message)) return true;
  // Network-level transient errors
  return TRANSIENT_NETWORK.test(error.message);
}

/**
 * Full-jitter exponential backoff: random delay in [0, min(cap, base * 2^attempt)]
 */
function fullJitterDelay(attempt: number, minMs: number, maxMs: number): number {
  const exponential = Math.min(maxMs, minMs * Math.pow(2, attempt));
  return Math.random() * exponential;
}

/**
 * Retry an async function with full-jitter exponential backoff.
 * Defaults: 5 attempts, 1s–30s delay range.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 5,
    minDelayMs = 1000,
    maxDelayMs = 30000,
    retryable = isRetryable,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const isLast = attempt === maxAttempts - 1;
      if (isLast || !retryable(error)) {
        throw error;
      }

      const delay = fullJitterDelay(attempt, minDelayMs, maxDelayMs);
      onRetry?.(error, attempt + 1, delay);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
