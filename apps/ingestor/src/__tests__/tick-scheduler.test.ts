/**
 * Poll loop scheduling tests, driven by Jest fake timers.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import type { TickSummary } from '@vizvolt/domain';
import { FixedIntervalPolicy } from '../services/scheduler/backoff-policy.js';
import type { BackoffPolicy, TickOutcome } from '../services/scheduler/backoff-policy.js';
import { FALLBACK_DELAY_MS, TickScheduler } from '../services/scheduler/tick-scheduler.js';

const SUMMARY: TickSummary = { fetched: 2, inserted: 2, failed: 0 };

/** Let pending promise chains run; fake timers do not touch promise jobs. */
async function settle(): Promise<void> {
  for (let i = 0; i < 20; i++) await Promise.resolve();
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

let errorSpy: jest.SpiedFunction<typeof console.error>;

beforeEach(() => {
  jest.useFakeTimers();
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.useRealTimers();
  jest.restoreAllMocks();
});

describe('TickScheduler', () => {
  it('runs the first tick immediately and then every interval', async () => {
    const tick = jest.fn(async () => SUMMARY);
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    expect(tick).toHaveBeenCalledTimes(1);
    await settle();
    expect(scheduler.state).toBe('idle');

    jest.advanceTimersByTime(9_999);
    expect(tick).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(1);
    expect(tick).toHaveBeenCalledTimes(2);
    await settle();

    jest.advanceTimersByTime(10_000);
    expect(tick).toHaveBeenCalledTimes(3);

    await scheduler.stop();
  });

  it('logs a failed tick and retries after the same interval', async () => {
    const tick = jest
      .fn<() => Promise<TickSummary>>()
      .mockRejectedValueOnce(new Error('The operation was aborted due to timeout'))
      .mockResolvedValue(SUMMARY);
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    await settle();

    expect(errorSpy).toHaveBeenCalledWith(
      '[poll-loop] tick failed: The operation was aborted due to timeout',
    );
    expect(scheduler.state).toBe('idle');

    jest.advanceTimersByTime(10_000);
    expect(tick).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('keeps retrying through persistent failures', async () => {
    const tick = jest.fn(async (): Promise<TickSummary> => {
      throw new Error('getaddrinfo ENOTFOUND db.internal');
    });
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    for (let i = 0; i < 5; i++) {
      await settle();
      jest.advanceTimersByTime(10_000);
    }

    expect(tick).toHaveBeenCalledTimes(6);
    await scheduler.stop();
  });

  it('never overlaps ticks', async () => {
    const pending = deferred<TickSummary>();
    const tick = jest.fn(() => pending.promise);
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    expect(scheduler.state).toBe('connecting');
    jest.advanceTimersByTime(60_000);
    expect(tick).toHaveBeenCalledTimes(1);

    pending.resolve(SUMMARY);
    await settle();
    jest.advanceTimersByTime(10_000);
    expect(tick).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('passes each outcome to the backoff policy', async () => {
    const failure = new Error('fetch failed');
    const tick = jest
      .fn<() => Promise<TickSummary>>()
      .mockResolvedValueOnce(SUMMARY)
      .mockRejectedValueOnce(failure);
    const nextDelayMs = jest.fn((outcome: TickOutcome) => (outcome.ok ? 5_000 : 1_000));
    const policy: BackoffPolicy = { nextDelayMs };
    const scheduler = new TickScheduler(tick, policy);

    scheduler.start();
    await settle();
    jest.advanceTimersByTime(5_000);
    await settle();

    expect(nextDelayMs.mock.calls).toEqual([
      [{ ok: true, summary: SUMMARY }],
      [{ ok: false, error: failure }],
    ]);

    await scheduler.stop();
  });

  it('falls back to the default delay when the policy throws', async () => {
    const tick = jest.fn(async () => SUMMARY);
    const policy: BackoffPolicy = {
      nextDelayMs: () => {
        throw new Error('delay table exhausted');
      },
    };
    const scheduler = new TickScheduler(tick, policy);

    scheduler.start();
    await settle();

    expect(errorSpy).toHaveBeenCalledWith('[poll-loop] backoff policy failed: delay table exhausted');
    expect(scheduler.state).toBe('idle');

    jest.advanceTimersByTime(FALLBACK_DELAY_MS - 1);
    expect(tick).toHaveBeenCalledTimes(1);
    jest.advanceTimersByTime(1);
    expect(tick).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('stops scheduling after stop()', async () => {
    const tick = jest.fn(async () => SUMMARY);
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    await settle();
    await scheduler.stop();
    jest.advanceTimersByTime(60_000);

    expect(tick).toHaveBeenCalledTimes(1);
    expect(scheduler.state).toBe('stopped');
  });

  it('waits for an in-flight tick on stop() and does not reschedule', async () => {
    const pending = deferred<TickSummary>();
    const tick = jest.fn(() => pending.promise);
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await settle();
    expect(stopped).toBe(false);

    pending.resolve(SUMMARY);
    await stopping;
    jest.advanceTimersByTime(60_000);

    expect(stopped).toBe(true);
    expect(tick).toHaveBeenCalledTimes(1);
  });

  it('ignores a second start()', async () => {
    const tick = jest.fn(async () => SUMMARY);
    const scheduler = new TickScheduler(tick, new FixedIntervalPolicy(10_000));

    scheduler.start();
    scheduler.start();

    expect(tick).toHaveBeenCalledTimes(1);
    await scheduler.stop();
  });
});
