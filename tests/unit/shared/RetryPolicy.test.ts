import { describe, it, expect, vi } from 'vitest';
import { withRetry, isRetryableError } from '../../../src/shared/RetryPolicy.js';
import {
  SummarizerRateLimitError,
  SummarizerUnavailableError,
} from '../../../src/domain/errors/DomainErrors.js';

function isBusy(err: unknown): boolean {
  return err instanceof Error && err.message === 'busy';
}

describe('RetryPolicy', () => {
  it('should succeed on first try', async () => {
    const fn = vi.fn().mockReturnValue('ok');
    const result = await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 10,
      isRetryable: () => true,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on retryable error and succeed', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockReturnValue('ok');

    const result = await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 1, // 測試用最小延遲
      isRetryable: isBusy,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should throw after max retries exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('busy'));

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        isRetryable: () => true,
      })
    ).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it('should not retry non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, {
        maxRetries: 3,
        baseDelayMs: 1,
        isRetryable: isBusy,
      })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should call onRetry callback', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockReturnValue('ok');

    await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 1,
      isRetryable: () => true,
      onRetry,
    });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it('should retry only retryable domain errors by default', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new SummarizerRateLimitError('429'))
      .mockRejectedValueOnce(new SummarizerUnavailableError('down'))
      .mockReturnValue('ok');

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop waiting when aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(() => {
      controller.abort(new Error('stopped'));
      throw new Error('busy');
    });

    await expect(
      withRetry(fn, {
        maxRetries: 3,
        baseDelayMs: 10_000,
        isRetryable: () => true,
        signal: controller.signal,
      })
    ).rejects.toThrow('stopped');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('isRetryableError', () => {
  it('should classify by error classification', () => {
    expect(isRetryableError(new SummarizerRateLimitError('429'))).toBe(true);
    expect(isRetryableError(new SummarizerUnavailableError('down'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
    expect(isRetryableError('string')).toBe(false);
  });
});
