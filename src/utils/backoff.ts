/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt (500ms, 1s, 2s, ...) up to maxDelayMs.
 * Jitter adds +/-25% randomness so concurrent company runs do not retry in step.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay before retrying after the given zero-indexed attempt.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter, never negative.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function backoffSleep(
  attempt: number,
  config?: Partial<BackoffConfig>,
  label = 'Backoff'
): Promise<void> {
  const delay = calculateBackoffDelay(attempt, config);
  console.error(`[${label}] Attempt ${attempt + 1} failed, waiting ${delay}ms`);
  return new Promise((resolve) => setTimeout(resolve, delay));
}

/**
 * Run fn until it succeeds, a non-retryable error is thrown, or attempts run out.
 * fn receives the zero-indexed attempt number.
 *
 * @throws The last error when every attempt fails
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>,
  label?: string
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        await backoffSleep(attempt, cfg, label);
      }
    }
  }

  throw lastError;
}
