import { describe, expect, it, vi } from 'vitest';

import { AbortError, calculateDelay, withRetry } from '../retry';

const noSleep = vi.fn(async () => undefined);

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok');
    await expect(withRetry(fn, { sleep: noSleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries every error by default until success', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:9200'))
      .mockRejectedValueOnce(new Error('Request timeout'))
      .mockResolvedValueOnce('connected');
    const onRetry = vi.fn();

    await expect(withRetry(fn, { maxRetries: 3, sleep: noSleep, onRetry })).resolves.toBe('connected');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(expect.any(Error), 2);
  });

  it('gives up after maxRetries + 1 attempts with the last error', async () => {
    const fn = vi.fn(async () => { throw new Error('ECONNREFUSED'); });

    await expect(withRetry(fn, { maxRetries: 2, sleep: noSleep })).rejects.toThrow('ECONNREFUSED');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops at the first error shouldRetry rejects', async () => {
    const fn = vi.fn(async () => { throw new Error('mapper_parsing_exception'); });

    await expect(withRetry(fn, { maxRetries: 5, sleep: noSleep, shouldRetry: () => false }))
      .rejects.toThrow('mapper_parsing_exception');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries only what shouldRetry accepts', async () => {
    class Transient extends Error {}
    const fn = vi.fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Transient('blip'))
      .mockResolvedValueOnce(42);

    await expect(withRetry(fn, { shouldRetry: error => error instanceof Transient, sleep: noSleep })).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBeInstanceOf(AbortError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('calculateDelay', () => {
  const options = { initialDelayMs: 1000, backoffMultiplier: 2, maxDelayMs: 5000 };

  it('grows exponentially within 25% jitter', () => {
    const delay = calculateDelay(3, options);
    expect(delay).toBeGreaterThanOrEqual(3000);
    expect(delay).toBeLessThanOrEqual(5000);
  });

  it('caps at maxDelayMs before jitter', () => {
    const delay = calculateDelay(10, options);
    expect(delay).toBeGreaterThanOrEqual(3750);
    expect(delay).toBeLessThanOrEqual(6250);
  });
});
