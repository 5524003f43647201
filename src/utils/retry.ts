/**
 * Retry, timeout and circuit breaker helpers for calls to local backends
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Decide whether a failed attempt may be retried; defaults to isRetryableError */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  /** Aborting this signal aborts the attempt in flight and stops retrying */
  signal?: AbortSignal;
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CircuitOpenError extends Error {
  constructor(readonly retryInMs: number) {
    super(
      `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${retryInMs}ms`
    );
    this.name = 'CircuitOpenError';
  }
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs` (or when `parent`
 * aborts). Rejects with TimeoutError when the deadline passed first.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await fn(controller.signal);
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Executes a function with exponential backoff retry logic.
 * Each attempt gets its own timeout; the last error is rethrown as is.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await withTimeout(fn, config.timeoutMs, options.signal);
      options.onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      const canRetry =
        attempt < config.maxAttempts && !options.signal?.aborted && shouldRetry(error);

      options.onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: canRetry ? lastDelay : undefined,
      });

      if (!canRetry) {
        throw error;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }
}

/**
 * Sleep utility function
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit Breaker Pattern
 * Stops calling a backend that keeps failing until a reset timeout passed
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: Array<{ timestamp: Date; state: CircuitState; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private now: () => number = Date.now
  ) {}

  /**
   * Execute function with circuit breaker protection.
   * Errors for which `countsAsFailure` returns false pass through without
   * tripping the breaker (e.g. an unknown model is not an outage).
   */
  async execute<T>(
    fn: () => Promise<T>,
    countsAsFailure: (error: unknown) => boolean = () => true
  ): Promise<T> {
    if (this.state === 'open') {
      const now = this.now();
      const elapsed = now - (this.lastFailureTime ?? now);
      if (elapsed > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new CircuitOpenError(this.resetTimeout - elapsed);
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          // After 2 successful attempts in half-open, close the circuit
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (countsAsFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.state === 'closed' && this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string) {
    this.logs.push({ timestamp: new Date(), state: newState, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  /**
   * Reset circuit breaker manually
   */
  reset() {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

/**
 * Connection-level failures worth another attempt. Timeouts are not retried:
 * a model that did not answer in time will not answer faster on a second try.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError || error instanceof CircuitOpenError) {
    return false;
  }
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';
  const errorMessage = `${code} ${error instanceof Error ? error.message : ''}`.toLowerCase();

  const retryablePatterns = [
    'econnrefused',
    'econnreset',
    'epipe',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'enotfound',
    'socket hang up',
    'status: 502',
    'status: 503',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
