/**
 * PeriodicTask Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PeriodicTask } from '../../src/utils/periodic-task.js';
import { deferred, silentLogger } from '../helpers/fixtures.js';

describe('PeriodicTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run once per interval until stopped', async () => {
    const run = vi.fn(async () => {});
    const task = new PeriodicTask({ name: 'test', intervalMs: 1000, run, logger: silentLogger });

    task.start();
    expect(task.running).toBe(true);

    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(3);

    await task.stop();
    expect(task.running).toBe(false);

    await vi.advanceTimersByTimeAsync(3000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('should keep going after a failed run', async () => {
    const run = vi.fn(async () => {
      throw new Error('flush failed');
    });
    const task = new PeriodicTask({ name: 'test', intervalMs: 1000, run, logger: silentLogger });

    task.start();
    await vi.advanceTimersByTimeAsync(2000);

    expect(run).toHaveBeenCalledTimes(2);
    await task.stop();
  });

  it('should wait for the running job before stop resolves', async () => {
    const gate = deferred();
    const run = vi.fn(() => gate.promise);
    const task = new PeriodicTask({ name: 'test', intervalMs: 1000, run, logger: silentLogger });

    task.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = task.stop().then(() => {
      stopped = true;
    });

    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    gate.resolve();
    await stopping;
    expect(stopped).toBe(true);
  });

  it('should ignore a second start', async () => {
    const run = vi.fn(async () => {});
    const task = new PeriodicTask({ name: 'test', intervalMs: 1000, run, logger: silentLogger });

    task.start();
    task.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(run).toHaveBeenCalledTimes(1);
    await task.stop();
  });
});
