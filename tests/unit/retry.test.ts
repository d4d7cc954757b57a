/**
 * Retry Utility Unit Tests
 */

import { retryWithBackoff } from '../../src/utils/retry.js';

describe('retryWithBackoff', () => {
  it('should succeed on first attempt if no error', async () => {
    const fn = jest.fn().mockResolvedValue('success');

    const result = await retryWithBackoff(fn);

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on failure and succeed', async () => {
    const fn = jest
      .fn()
      .mockRejectedValueOnce(new Error('temporary'))
      .mockRejectedValueOnce(new Error('temporary'))
      .mockResolvedValue('success');

    const result = await retryWithBackoff(fn, { maxAttempts: 3, initialDelay: 1 });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should rethrow the last error unchanged after max attempts', async () => {
    class CustomError extends Error {}
    const last = new CustomError('persistent');
    const fn = jest.fn().mockRejectedValueOnce(new Error('first')).mockRejectedValue(last);

    await expect(retryWithBackoff(fn, { maxAttempts: 2, initialDelay: 1 })).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop when shouldRetry declines', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('fatal'));
    const shouldRetry = jest.fn().mockReturnValue(false);

    await expect(
      retryWithBackoff(fn, { maxAttempts: 5, initialDelay: 1, shouldRetry })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledTimes(1);
  });

  it('should call onRetry with growing, capped delays', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));
    const onRetry = jest.fn();

    await expect(
      retryWithBackoff(fn, {
        maxAttempts: 4,
        initialDelay: 2,
        multiplier: 3,
        maxDelay: 10,
        onRetry,
      })
    ).rejects.toThrow('down');

    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 2],
      [2, 6],
      [3, 10],
    ]);
  });

  it('should wrap non-Error rejections', async () => {
    const fn = jest.fn().mockRejectedValue('plain string');

    await expect(retryWithBackoff(fn, { maxAttempts: 1 })).rejects.toThrow('plain string');
  });
});
