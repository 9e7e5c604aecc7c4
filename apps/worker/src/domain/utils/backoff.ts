/**
 * Pure utility functions for exponential backoff calculation.
 */

export interface BackoffOptions {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 60000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 to add randomness (default: 0) */
  jitterFactor?: number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterFactor: 0,
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 *
 * @example
 * // Default: 1s, 2s, 4s, ... 60s (capped)
 * calculateBackoff(0) // 1000
 * calculateBackoff(1) // 2000
 * calculateBackoff(6) // 60000 (capped)
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = {
    ...DEFAULT_BACKOFF_OPTIONS,
    ...options,
  };

  const exponentialDelay = baseDelayMs * Math.pow(2, Math.max(0, attempt));
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitterFactor > 0) {
    const jitter = cappedDelay * jitterFactor * Math.random();
    return Math.floor(cappedDelay + jitter);
  }

  return cappedDelay;
}

/**
 * Backoff for a dispatch unit whose persistence calls keep failing.
 * `consecutiveFailures` is 1-indexed: the first failure waits the base delay.
 */
export function calculateStorageBackoff(
  consecutiveFailures: number,
  options?: BackoffOptions
): number {
  return calculateBackoff(consecutiveFailures - 1, { jitterFactor: 0.1, ...options });
}
