// test/status-poller.test.ts

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PollingError } from '../src/errors.js';
import { defaultSystemParameters } from '../src/messages/system-parameters.js';
import { StatusPoller, type StatusSource } from '../src/status-poller.js';
import type { SystemParameters } from '../src/types/aquaclean-types.js';

describe('StatusPoller', () => {
  let results: (SystemParameters | undefined | Error)[];
  let calls: number;
  let source: StatusSource;

  beforeEach(() => {
    vi.useFakeTimers();
    results = [];
    calls = 0;
    source = {
      readSystemParameters: async () => {
        calls++;
        const next = results.length > 0 ? results.shift() : defaultSystemParameters();
        if (next instanceof Error) throw next;
        return next;
      },
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects invalid intervals', () => {
    expect(() => new StatusPoller(source, { interval: 0 })).toThrow(PollingError);
    expect(() => new StatusPoller(source, { interval: 1.5 })).toThrow(PollingError);
  });

  it('polls immediately and then on every interval', async () => {
    const onData = vi.fn();
    const poller = new StatusPoller(source, { interval: 1000, onData });

    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(calls).toBe(1);
    expect(onData).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(calls).toBe(2);

    poller.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(calls).toBe(2);
    expect(poller.isRunning()).toBe(false);
  });

  it('waits one interval before the first poll when not immediate', async () => {
    const poller = new StatusPoller(source, { interval: 1000, immediate: false });
    poller.start();
    await vi.advanceTimersByTimeAsync(999);
    expect(calls).toBe(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(calls).toBe(1);
    poller.stop();
  });

  it('reports missing responses and errors without stopping', async () => {
    const onNoResponse = vi.fn();
    const onError = vi.fn();
    results = [undefined, new Error('link lost')];
    const poller = new StatusPoller(source, { interval: 100, onNoResponse, onError });

    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(100);
    await vi.advanceTimersByTimeAsync(100);
    poller.stop();

    expect(onNoResponse).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBeInstanceOf(Error);

    const stats = poller.getStats();
    expect(stats.totalRuns).toBe(3);
    expect(stats.noResponses).toBe(1);
    expect(stats.failures).toBe(1);
    expect(stats.successes).toBe(1);
    expect(stats.lastError).toBeNull();
  });

  it('pauses and resumes', async () => {
    const poller = new StatusPoller(source, { interval: 100 });
    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(calls).toBe(1);

    poller.pause();
    await vi.advanceTimersByTimeAsync(500);
    expect(calls).toBe(1);

    poller.resume();
    await vi.advanceTimersByTimeAsync(0);
    expect(calls).toBe(2);
    poller.stop();
  });

  it('applies a new interval from the next cycle', async () => {
    const poller = new StatusPoller(source, { interval: 100 });
    poller.start();
    await vi.advanceTimersByTimeAsync(0);
    poller.setInterval(1000);
    await vi.advanceTimersByTimeAsync(100);
    expect(calls).toBe(2);
    await vi.advanceTimersByTimeAsync(100);
    expect(calls).toBe(2);
    await vi.advanceTimersByTimeAsync(900);
    expect(calls).toBe(3);
    poller.stop();
  });
});
