import { describe, expect, it, vi } from 'vitest';
import { RunCancelled, TranslationRejected, TranslationUnavailable } from '../errors';
import { FAST_RETRY } from '../test-doubles';
import { classifyServiceError, statusOf } from './classify';
import { DEFAULT_RETRY_POLICY, RequestTimeout, backoffDelay, withRetry, withTimeout } from './retry';

const classify = (error: unknown) => classifyServiceError(error, TranslationUnavailable, TranslationRejected);

class FetchError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
  }
}

describe('classifyServiceError', () => {
  it('treats rate limits and server errors as transient', () => {
    expect(classify(new FetchError('quota', 429))).toBeInstanceOf(TranslationUnavailable);
    expect(classify(new FetchError('down', 503))).toBeInstanceOf(TranslationUnavailable);
    expect(classify(new TypeError('fetch failed'))).toBeInstanceOf(TranslationUnavailable);
    expect(classify(new RequestTimeout(10))).toBeInstanceOf(TranslationUnavailable);
  });

  it('treats other client errors as permanent', () => {
    const error = classify(new FetchError('bad request', 400));
    expect(error).toBeInstanceOf(TranslationRejected);
    expect(error.message).toBe('Service rejected the request (400): bad request');
  });

  it('passes pipeline errors through', () => {
    const rejected = new TranslationRejected('misspelled');
    expect(classify(rejected)).toBe(rejected);
  });

  it('reads numeric status fields only', () => {
    expect(statusOf({ status: 404 })).toBe(404);
    expect(statusOf({ status: 'NOT_FOUND' })).toBeUndefined();
    expect(statusOf(null)).toBeUndefined();
  });
});

describe('withRetry', () => {
  it('retries transient failures until one succeeds', async () => {
    const request = vi.fn()
      .mockRejectedValueOnce(new FetchError('quota', 429))
      .mockRejectedValueOnce(new FetchError('down', 500))
      .mockResolvedValue('ok');

    await expect(withRetry(request, classify, FAST_RETRY)).resolves.toBe('ok');
    expect(request).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured number of attempts', async () => {
    const request = vi.fn().mockRejectedValue(new FetchError('quota', 429));

    await expect(withRetry(request, classify, FAST_RETRY)).rejects.toBeInstanceOf(TranslationUnavailable);
    expect(request).toHaveBeenCalledTimes(3);
  });

  it('does not retry permanent failures', async () => {
    const request = vi.fn().mockRejectedValue(new FetchError('bad', 400));

    await expect(withRetry(request, classify, FAST_RETRY)).rejects.toBeInstanceOf(TranslationRejected);
    expect(request).toHaveBeenCalledTimes(1);
  });

  it('sends no further attempt once the run is cancelled', async () => {
    const controller = new AbortController();
    const request = vi.fn(async () => {
      controller.abort();
      throw new FetchError('quota', 429);
    });
    const policy = { ...FAST_RETRY, backoff: { type: 'fixed' as const, delay: 20 } };

    await expect(withRetry(request, classify, policy, controller.signal)).rejects.toBeInstanceOf(RunCancelled);
    expect(request).toHaveBeenCalledTimes(1);
  });

  it('cuts the backoff wait short when the run is cancelled', async () => {
    const controller = new AbortController();
    const request = vi.fn().mockRejectedValue(new FetchError('down', 503));
    const policy = { ...FAST_RETRY, backoff: { type: 'fixed' as const, delay: 60_000 } };
    setTimeout(() => controller.abort(), 10);

    await expect(withRetry(request, classify, policy, controller.signal)).rejects.toBeInstanceOf(RunCancelled);
    expect(request).toHaveBeenCalledTimes(1);
  });

  it('does not start when the run is already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const request = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(request, classify, FAST_RETRY, controller.signal)).rejects.toBeInstanceOf(RunCancelled);
    expect(request).not.toHaveBeenCalled();
  });

  it('times out a hanging request and aborts its signal', async () => {
    let seen: AbortSignal | undefined;
    const request = (signal: AbortSignal) => {
      seen = signal;
      return new Promise<string>(() => undefined);
    };

    await expect(withTimeout(request, 20)).rejects.toBeInstanceOf(RequestTimeout);
    expect(seen?.aborted).toBe(true);
  });
});

describe('backoffDelay', () => {
  it('doubles the delay on each attempt for exponential backoff', () => {
    expect([1, 2, 3].map(n => backoffDelay(DEFAULT_RETRY_POLICY, n))).toEqual([500, 1000, 2000]);
  });

  it('keeps a fixed delay', () => {
    expect(backoffDelay({ ...DEFAULT_RETRY_POLICY, backoff: { type: 'fixed', delay: 250 } }, 3)).toBe(250);
  });
});
