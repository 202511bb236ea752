import { describe, it, expect, vi } from 'vitest';
import { OperationAborted } from '../errors.js';
import { NonRetryableError, withRetry, withTimeout } from './retry.js';
import { mapPool } from './pool.js';

describe('withRetry', () => {
  it('retries until the call succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();
    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));
    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 1 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry NonRetryableError', async () => {
    const fn = vi.fn().mockRejectedValue(new NonRetryableError('bad request'));
    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 1 })).rejects.toBeInstanceOf(NonRetryableError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('rejects with OperationAborted once the time is up', async () => {
    const never = () => new Promise<string>(() => undefined);
    const err = await withTimeout(never, 10, 'slow op').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OperationAborted);
    expect(err instanceof Error ? err.message : '').toBe('slow op timed out after 10ms');
  });

  it('hands the abort signal to the callee', async () => {
    let seen: AbortSignal | undefined;
    const controller = new AbortController();
    const pending = withTimeout((signal) => {
      seen = signal;
      return new Promise<void>(() => undefined);
    }, 1_000, 'cancellable', controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('cancellable aborted');
    expect(seen?.aborted).toBe(true);
  });
});

describe('mapPool', () => {
  it('keeps input order and caps concurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    const out = await mapPool([30, 10, 20, 5, 1], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, ms));
      inFlight--;
      return i * 10;
    });
    expect(out).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });
});
