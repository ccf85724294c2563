import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, isRetryableError, withRetry } from '../../../src/shared/RetryPolicy.js';
import { LockHeldError, ProjectNotFoundError } from '../../../src/domain/errors/DomainErrors.js';

const noSleep = () => Promise.resolve();

describe('RetryPolicy', () => {
  it('should succeed on first try', async () => {
    const fn = vi.fn().mockReturnValue('ok');
    const result = await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 10,
      isRetryable: () => true,
      sleep: noSleep,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry a held lock and succeed', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new LockHeldError('/tmp/x.lock', 42))
      .mockReturnValue('ok');

    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 1, sleep: noSleep });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should throw after max retries exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new LockHeldError('/tmp/x.lock'));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1, sleep: noSleep }),
    ).rejects.toBeInstanceOf(LockHeldError);
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it('should not retry manual errors', async () => {
    const fn = vi.fn().mockRejectedValue(new ProjectNotFoundError('ghost'));

    await expect(
      withRetry(fn, { maxRetries: 3, baseDelayMs: 1, sleep: noSleep }),
    ).rejects.toThrow('Project "ghost" not found');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should call onRetry with attempt and delay', async () => {
    const onRetry = vi.fn();
    const sleep = vi.fn(noSleep);
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockReturnValue('ok');

    await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 1,
      isRetryable: () => true,
      onRetry,
      sleep,
    });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), expect.any(Number));
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('caps backoff at maxDelayMs', () => {
    expect(backoffDelay(10, { baseDelayMs: 100, maxDelayMs: 250 })).toBe(250);
    const first = backoffDelay(0, { baseDelayMs: 100 });
    expect(first).toBeGreaterThanOrEqual(100);
    expect(first).toBeLessThan(200);
  });

  it('classifies only retryable worktrail errors as retryable', () => {
    expect(isRetryableError(new LockHeldError('/tmp/x.lock'))).toBe(true);
    expect(isRetryableError(new ProjectNotFoundError('a'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});
