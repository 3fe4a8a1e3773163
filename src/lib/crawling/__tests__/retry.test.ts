/**
 * Retry Tests
 */

import { retryWithBackoff } from '../retry';

describe('retryWithBackoff', () => {
  it('should return the first successful result', async () => {
    const fn = jest.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    await expect(
      retryWithBackoff(fn, { maxRetries: 2, baseDelay: 0, isRetryable: () => true })
    ).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should give up after maxRetries retries', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));

    await expect(
      retryWithBackoff(fn, { maxRetries: 2, baseDelay: 0, isRetryable: () => true })
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry errors that are not retryable', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('bad request'));

    await expect(
      retryWithBackoff(fn, { maxRetries: 5, baseDelay: 0, isRetryable: () => false })
    ).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should double the delay each attempt', async () => {
    jest.useFakeTimers();
    try {
      const fn = jest.fn().mockRejectedValue(new Error('down'));
      const onRetry = jest.fn();

      const result = retryWithBackoff(fn, { maxRetries: 3, baseDelay: 100, isRetryable: () => true, onRetry });
      const settled = result.catch((error: unknown) => error);

      await jest.advanceTimersByTimeAsync(100 + 200 + 400);

      expect(await settled).toEqual(new Error('down'));
      expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
        [1, 100],
        [2, 200],
        [3, 400],
      ]);
    } finally {
      jest.useRealTimers();
    }
  });
});
