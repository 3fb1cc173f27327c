import { describe, expect, it, vi } from 'vitest';

import {
  AbortError,
  DEFAULT_BACKOFF,
  TimeoutError,
  calculateDelay,
  isRetryableStatus,
  parseRetryAfter,
  sleep,
  withTimeout,
} from '../retry';

describe('calculateDelay', () => {
  const noJitter = () => 0.5;

  it('grows exponentially from the initial delay', () => {
    expect(calculateDelay(1, DEFAULT_BACKOFF, noJitter)).toBe(500);
    expect(calculateDelay(2, DEFAULT_BACKOFF, noJitter)).toBe(1000);
    expect(calculateDelay(3, DEFAULT_BACKOFF, noJitter)).toBe(2000);
  });

  it('caps at maxDelayMs', () => {
    expect(calculateDelay(20, DEFAULT_BACKOFF, noJitter)).toBe(30000);
  });

  it('applies up to 25% jitter either way', () => {
    expect(calculateDelay(1, DEFAULT_BACKOFF, () => 0)).toBe(375);
    expect(calculateDelay(1, DEFAULT_BACKOFF, () => 1)).toBe(625);
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('rejects with AbortError when the signal fires', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortError);
  });

  it('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AbortError);
  });
});

describe('withTimeout', () => {
  it('returns the operation result', async () => {
    await expect(withTimeout(async () => 'ok', 1000)).resolves.toBe('ok');
  });

  it('aborts the operation signal and throws TimeoutError on deadline', async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withTimeout(signal => {
      seen = signal;
      return new Promise<string>(() => undefined);
    }, 50);
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it('propagates the parent signal', async () => {
    const parent = new AbortController();
    let seen: AbortSignal | undefined;
    const pending = withTimeout(async signal => {
      seen = signal;
      return 'done';
    }, 1000, parent.signal);
    parent.abort();
    await pending;
    expect(seen?.aborted).toBe(true);
  });
});

describe('isRetryableStatus', () => {
  it.each([408, 429, 500, 502, 503, 504, 599])('retries %i', status => {
    expect(isRetryableStatus(status)).toBe(true);
  });

  it.each([400, 401, 403, 404, 409, 422])('does not retry %i', status => {
    expect(isRetryableStatus(status)).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('reads delay seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.UTC(2024, 0, 15, 12, 0, 0);
    expect(parseRetryAfter('Mon, 15 Jan 2024 12:00:05 GMT', now)).toBe(5000);
    expect(parseRetryAfter('Mon, 15 Jan 2024 11:59:00 GMT', now)).toBe(0);
  });

  it('returns 0 for missing or garbage values', () => {
    expect(parseRetryAfter(null)).toBe(0);
    expect(parseRetryAfter('soon')).toBe(0);
  });
});
