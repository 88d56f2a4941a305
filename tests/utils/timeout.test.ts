/**
 * Timeout helper tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, sleep, withTimeout } from '../../src/utils/timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the promise value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'op')).resolves.toBe('ok');
  });

  it('should reject with TimeoutError when the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 100, 'get home');
    const assertion = expect(pending).rejects.toThrow(new TimeoutError('get home', 100));

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it('should pass through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('down')), 50, 'op')).rejects.toThrow('down');
  });
});

describe('sleep', () => {
  it('should resolve early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const sleeping = sleep(60_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await sleeping;

    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
    vi.useRealTimers();
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
