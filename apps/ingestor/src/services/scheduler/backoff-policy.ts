import type { TickSummary } from '@vizvolt/domain';

export type TickOutcome =
  | { ok: true; summary: TickSummary }
  | { ok: false; error: unknown };

/** Decides how long the scheduler idles after a tick settles. */
export interface BackoffPolicy {
  nextDelayMs(outcome: TickOutcome): number;
}

/** Same delay after success and failure: the interval is the only retry policy. */
export class FixedIntervalPolicy implements BackoffPolicy {
  constructor(private readonly intervalMs: number) {}

  nextDelayMs(_outcome: TickOutcome): number {
    return this.intervalMs;
  }
}
