import { describe, it, expect, vi, afterEach } from 'vitest';
import { withRetry, withTimeout, sleep, isDefined } from '../utils.js';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should throw the last error once retries are exhausted', async () => {
    let calls = 0;
    const fn = async (): Promise<never> => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });

  it('should not retry when shouldRetry rejects the error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, { maxRetries: 5, baseDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should report each retry with an exponential delay', async () => {
    const error = new Error('flaky');
    const onRetry = vi.fn();
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(error)
      .mockRejectedValueOnce(error)
      .mockResolvedValue(7);

    await withRetry(fn, { maxRetries: 3, baseDelayMs: 2, onRetry });

    expect(onRetry).toHaveBeenNthCalledWith(1, error, 0, 2);
    expect(onRetry).toHaveBeenNthCalledWith(2, error, 1, 4);
  });

  it('should cap the delay at maxDelayMs', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('x'))
      .mockRejectedValueOnce(new Error('x'))
      .mockResolvedValue(1);

    await withRetry(fn, { maxRetries: 3, baseDelayMs: 3, maxDelayMs: 4, onRetry });

    expect(onRetry.mock.calls.map((call) => call[2])).toEqual([3, 4]);
  });

  it('should run once when maxRetries is 0', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, { maxRetries: 0 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  const toError = (reason: 'timeout' | 'aborted'): Error => new Error(`call ${reason}`);

  it('should resolve with the work result and leave no timer behind', async () => {
    vi.useFakeTimers();

    await expect(
      withTimeout(async () => 42, { timeoutMs: 1000, onTimeout: toError })
    ).resolves.toBe(42);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should propagate the work rejection unchanged', async () => {
    const failure = new Error('constraint violated');

    await expect(
      withTimeout(() => Promise.reject(failure), { timeoutMs: 1000, onTimeout: toError })
    ).rejects.toBe(failure);
  });

  it('should reject when the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<never>(() => undefined), {
      timeoutMs: 50,
      onTimeout: toError,
    });
    const assertion = expect(pending).rejects.toThrow('call timeout');

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('should reject when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => undefined), {
      timeoutMs: 10_000,
      signal: controller.signal,
      onTimeout: toError,
    });

    controller.abort();

    await expect(pending).rejects.toThrow('call aborted');
  });

  it('should not start the work for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const work = vi.fn(async () => 'never');

    await expect(
      withTimeout(work, { timeoutMs: 1000, signal: controller.signal, onTimeout: toError })
    ).rejects.toThrow('call aborted');
    expect(work).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('should resolve after the given duration', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(100).then(done);

    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
    vi.useRealTimers();
  });
});

describe('isDefined', () => {
  it('should filter null and undefined only', () => {
    expect([0, '', null, undefined, false].filter(isDefined)).toEqual([0, '', false]);
  });
});
