/**
 * Circuit breaker for the Ollama HTTP API
 *
 * CLOSED -> OPEN after `failureThreshold` consecutive server-side failures.
 * OPEN rejects immediately until the recovery window passes, then HALF_OPEN
 * lets calls through; `halfOpenSuccessThreshold` successes close it again and
 * any failure reopens it with a doubled window (capped at 16x).
 *
 * Only server-side failures count: HTTP 429/5xx, connection errors, timeouts.
 * A malformed model answer is the caller's problem, not the server's.
 *
 * @module services/llm/circuit-breaker
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60_000,
  halfOpenSuccessThreshold: 2,
};

const MAX_RECOVERY_MULTIPLIER = 16;

/**
 * HTTP status carried by errors the client raises for non-2xx responses
 */
export class HttpStatusError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

export function isServerError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  if (!(error instanceof Error)) return false;
  if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;

  const cause = error.cause instanceof Error ? error.cause : null;
  const causeCode =
    cause !== null && 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  const combined = `${error.message} ${cause?.message ?? ''} ${causeCode}`;
  return /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed/i.test(combined);
}

export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private openedAt: number | null = null;
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Recovery window for the current trip count */
  getRecoveryTimeMs(): number {
    const exponent = Math.max(0, this.consecutiveTrips - 1);
    return this.config.recoveryTimeMs * Math.min(Math.pow(2, exponent), MAX_RECOVERY_MULTIPLIER);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();
    if (this.state === CircuitState.OPEN) {
      const remaining = this.timeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(remaining / 1000)}s`,
        remaining
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      timeToRecovery: this.state === CircuitState.OPEN ? this.timeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.openedAt = null;
    this.consecutiveTrips = 0;
  }

  private checkRecovery(): void {
    if (this.state !== CircuitState.OPEN || this.openedAt === null) return;
    if (this.now() - this.openedAt >= this.getRecoveryTimeMs()) {
      console.error(`[CircuitBreaker] OPEN -> HALF_OPEN after trip #${this.consecutiveTrips}`);
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.reset();
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.consecutiveTrips++;
    this.state = CircuitState.OPEN;
    this.openedAt = this.now();
    this.successCount = 0;
    console.error(
      `[CircuitBreaker] OPEN after ${this.failureCount} failure(s), trip #${this.consecutiveTrips}, recovery ${this.getRecoveryTimeMs()}ms`
    );
  }

  private timeToRecovery(): number {
    if (this.openedAt === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (this.now() - this.openedAt));
  }
}
