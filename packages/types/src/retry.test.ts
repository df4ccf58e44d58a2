import { describe, it, expect, vi, afterEach } from 'vitest';
import { withRetry } from './retry';

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('returns the first successful result without retrying', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until success', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('flaky 1'))
      .mockRejectedValueOnce(new Error('flaky 2'))
      .mockResolvedValue('done');
    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('throws the last error once retries are exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('always'));
    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('always');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows immediately when retryOn rejects the error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));
    await expect(
      withRetry(fn, { baseDelayMs: 1, retryOn: (e) => e.message !== 'fatal' }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    const fn = vi.fn().mockRejectedValue('text failure');
    await expect(withRetry(fn, { maxRetries: 0 })).rejects.toThrow('text failure');
  });

  it('reports each retry through onRetry', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error('once')).mockResolvedValue(1);
    await withRetry(fn, { baseDelayMs: 1, onRetry });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][1]).toMatchObject({ message: 'once' });
  });

  it('doubles the delay up to maxDelayMs', async () => {
    vi.useFakeTimers();
    const timer = vi.spyOn(globalThis, 'setTimeout');
    const fn = vi.fn().mockRejectedValue(new Error('down'));
    const result = withRetry(fn, { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 250 });
    const settled = expect(result).rejects.toThrow('down');
    await vi.runAllTimersAsync();
    await settled;
    expect(timer.mock.calls.map((call) => call[1])).toEqual([100, 200, 250]);
    expect(fn).toHaveBeenCalledTimes(4);
  });
});
