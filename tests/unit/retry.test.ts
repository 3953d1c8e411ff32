import { withRetry } from '../../src/retry';

describe('withRetry', () => {
  it('should retry until the call succeeds', async () => {
    const fn = jest.fn().mockRejectedValueOnce(new Error('first')).mockResolvedValueOnce('done');

    expect(await withRetry(fn, { initialBackoffMs: 1 })).toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should double the delay up to the maximum', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));
    const onRetry = jest.fn();

    await expect(withRetry(fn, { maxAttempts: 4, initialBackoffMs: 2, maxBackoffMs: 5, onRetry })).rejects.toThrow(
      'down',
    );

    expect(fn).toHaveBeenCalledTimes(4);
    expect(onRetry.mock.calls.map(([attempt, , delay]) => [attempt, delay])).toEqual([
      [1, 2],
      [2, 4],
      [3, 5],
    ]);
  });

  it('should rethrow errors that are not retryable at once', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('fatal'));

    await expect(withRetry(fn, { isRetryable: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
