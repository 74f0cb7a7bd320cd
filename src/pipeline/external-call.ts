/**
 * Bounded call policy for OCR, extraction and embedding backends
 *
 * Every attempt gets its own AbortSignal that fires after `timeoutMs`. Failed
 * attempts back off exponentially. When attempts run out the failure becomes an
 * ExternalServiceError, except when the last attempt failed to parse, in which
 * case the ParseError is kept so callers can treat it as a local failure.
 *
 * @module pipeline/external-call
 */

import { withRetry, type BackoffConfig } from '../utils/backoff.js';
import {
  ExternalServiceError,
  PipelineError,
  errorMessage,
  type ErrorContext,
} from './errors.js';

export interface CallPolicy {
  maxAttempts: number;
  timeoutMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_CALL_POLICY: CallPolicy = {
  maxAttempts: 3,
  timeoutMs: 120_000,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

/**
 * Raised inside an attempt when its timer fires
 */
export class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Errors that will not get better by retrying
 */
function isRetryable(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.category === 'PARSE_ERROR' || error.category === 'EXTERNAL_SERVICE_ERROR';
  }
  if (error instanceof Error && error.name === 'CircuitBreakerOpenError') {
    return false;
  }
  return true;
}

async function runAttempt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Call an external capability under the retry and timeout policy.
 *
 * @param operation - Short name used in logs and error messages, e.g. `ocr`
 * @param context - Attached to the resulting error (document, stage)
 */
export async function callExternal<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  policy: CallPolicy = DEFAULT_CALL_POLICY,
  context: ErrorContext = {}
): Promise<T> {
  const backoff: Partial<BackoffConfig> = {
    maxAttempts: policy.maxAttempts,
    baseDelayMs: policy.baseDelayMs,
    maxDelayMs: policy.maxDelayMs,
  };
  let attempts = 0;

  try {
    return await withRetry(
      () => {
        attempts++;
        return runAttempt(fn, policy.timeoutMs);
      },
      isRetryable,
      backoff,
      `External:${operation}`
    );
  } catch (error) {
    if (error instanceof PipelineError) {
      if (error.category === 'PARSE_ERROR') {
        throw error.withContext({ ...context, attempts });
      }
      if (error.category !== 'EXTERNAL_SERVICE_ERROR') {
        throw error.withContext(context);
      }
    }
    throw new ExternalServiceError(
      `${operation} failed after ${attempts} attempt(s): ${errorMessage(error)}`,
      { ...context, attempts }
    );
  }
}
