/**
 * Tests for Retry, Timeout and Circuit Breaker logic
 */

import {
  CircuitBreaker,
  CircuitOpenError,
  RetryConfig,
  RetryLog,
  TimeoutError,
  isRetryableError,
  withRetry,
  withTimeout,
} from '../src/utils/retry.js';

const FAST: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 10,
  maxDelayMs: 20,
  multiplier: 2,
  timeoutMs: 1000,
};

function refused(): Error {
  return new Error('connect ECONNREFUSED 127.0.0.1:11434');
}

function hangUntilAborted(signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

describe('withTimeout', () => {
  it('should pass through the result', async () => {
    await expect(withTimeout(async () => 'done', 100)).resolves.toBe('done');
  });

  it('should reject with TimeoutError when the deadline passes', async () => {
    const failure = withTimeout(hangUntilAborted, 30);

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('Timeout after 30ms');
  });

  it('should abort with the parent signal without reporting a timeout', async () => {
    const parent = new AbortController();
    const failure = withTimeout(hangUntilAborted, 10_000, parent.signal);
    parent.abort();

    await expect(failure).rejects.toThrow('aborted');
  });
});

describe('withRetry', () => {
  it('should succeed on first attempt', async () => {
    const fn = jest.fn(async (_signal: AbortSignal) => 'success');

    await expect(withRetry(fn, FAST)).resolves.toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry connection errors and eventually succeed', async () => {
    const fn = jest
      .fn<Promise<string>, [AbortSignal]>()
      .mockRejectedValueOnce(refused())
      .mockRejectedValueOnce(refused())
      .mockResolvedValueOnce('success');

    await expect(withRetry(fn, FAST)).resolves.toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should rethrow the last error after max attempts', async () => {
    const fn = jest.fn(async (_signal: AbortSignal): Promise<string> => {
      throw refused();
    });

    await expect(withRetry(fn, FAST)).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:11434');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry other errors', async () => {
    const fn = jest.fn(async (_signal: AbortSignal): Promise<string> => {
      throw new Error('Invalid request');
    });

    await expect(withRetry(fn, FAST)).rejects.toThrow('Invalid request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should honor a custom retry predicate', async () => {
    const fn = jest
      .fn<Promise<string>, [AbortSignal]>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, FAST, { shouldRetry: () => true })).resolves.toBe('ok');
  });

  it('should log attempts with the next delay', async () => {
    const logs: RetryLog[] = [];
    const fn = jest
      .fn<Promise<string>, [AbortSignal]>()
      .mockRejectedValueOnce(refused())
      .mockRejectedValueOnce(refused())
      .mockResolvedValueOnce('success');

    await withRetry(fn, FAST, { onLog: (log) => logs.push(log) });

    expect(logs.map((log) => [log.attempt, log.success, log.nextRetryInMs])).toEqual([
      [1, false, 10],
      [2, false, 20],
      [3, true, undefined],
    ]);
  });

  it('should not retry timeouts', async () => {
    const fn = jest.fn(hangUntilAborted);

    await expect(withRetry(fn, { ...FAST, timeoutMs: 20 })).rejects.toBeInstanceOf(TimeoutError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should stop retrying once the caller aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = jest.fn(async (_signal: AbortSignal): Promise<string> => {
      throw refused();
    });

    await expect(withRetry(fn, FAST, { signal: controller.signal })).rejects.toThrow('ECONNREFUSED');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('Circuit Breaker', () => {
  let breaker: CircuitBreaker;
  let clock: number;
  const failing = () => Promise.reject(new Error('Fail'));

  async function trip(times: number) {
    for (let i = 0; i < times; i++) {
      await expect(breaker.execute(failing)).rejects.toThrow('Fail');
    }
  }

  beforeEach(() => {
    clock = 0;
    breaker = new CircuitBreaker(3, 1000, () => clock);
  });

  it('should start in closed state', () => {
    expect(breaker.getState()).toBe('closed');
  });

  it('should open after failure threshold', async () => {
    await trip(3);
    const fn = jest.fn(async () => 'ok');

    expect(breaker.getState()).toBe('open');
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    await expect(breaker.execute(fn)).rejects.toThrow('Circuit breaker is OPEN');
    expect(fn).not.toHaveBeenCalled();
  });

  it('should close after two successes in half-open state', async () => {
    await trip(3);
    clock = 1001;

    await breaker.execute(async () => 'ok');
    expect(breaker.getState()).toBe('half-open');

    await breaker.execute(async () => 'ok');
    expect(breaker.getState()).toBe('closed');
  });

  it('should reopen if a call fails during half-open', async () => {
    await trip(3);
    clock = 1001;

    await expect(breaker.execute(failing)).rejects.toThrow('Fail');
    expect(breaker.getState()).toBe('open');
  });

  it('should ignore errors that do not count as failures', async () => {
    for (let i = 0; i < 5; i++) {
      await expect(breaker.execute(failing, () => false)).rejects.toThrow('Fail');
    }

    expect(breaker.getState()).toBe('closed');
    expect(breaker.getStats().failureCount).toBe(0);
  });

  it('should reset to closed state', async () => {
    await trip(3);

    breaker.reset();

    expect(breaker.getState()).toBe('closed');
    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
  });

  it('should track statistics', async () => {
    clock = 5000;
    await trip(2);

    const stats = breaker.getStats();
    expect(stats.state).toBe('closed');
    expect(stats.failureCount).toBe(2);
    expect(stats.lastFailureTime).toEqual(new Date(5000));
  });
});

describe('isRetryableError', () => {
  it('should identify connection failures', () => {
    expect(isRetryableError(new Error('connect ECONNREFUSED'))).toBe(true);
    expect(isRetryableError(new Error('Service Unavailable'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('socket closed'), { code: 'ECONNRESET' }))).toBe(true);
  });

  it('should not retry timeouts, open circuits or other errors', () => {
    expect(isRetryableError(new TimeoutError(100))).toBe(false);
    expect(isRetryableError(new CircuitOpenError(100))).toBe(false);
    expect(isRetryableError(new Error('Invalid request'))).toBe(false);
    expect(isRetryableError('ECONNREFUSED')).toBe(false);
  });
});
