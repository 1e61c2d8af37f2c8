import type { TickSummary } from '@vizvolt/domain';
import type { BackoffPolicy, TickOutcome } from './backoff-policy.js';

export type TickScheduleState = 'stopped' | 'connecting' | 'idle';

/** Delay used when the policy itself throws. */
export const FALLBACK_DELAY_MS = 10_000;

/**
 * Timer-driven poll loop. The first tick runs on start(); each following tick
 * is scheduled only after the previous one settles, so ticks never overlap.
 * A rejected tick is logged and retried after the policy's delay; the loop
 * itself never gives up.
 */
export class TickScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private _state: TickScheduleState = 'stopped';

  constructor(
    private readonly tick: () => Promise<TickSummary>,
    private readonly policy: BackoffPolicy,
  ) {}

  get state(): TickScheduleState {
    return this._state;
  }

  start(): void {
    if (this._state !== 'stopped') return;
    this._state = 'idle';
    this.runNext();
  }

  async stop(): Promise<void> {
    this._state = 'stopped';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  private runNext(): void {
    this.timer = null;
    this.inFlight = this.runOnce();
  }

  private async runOnce(): Promise<void> {
    this._state = 'connecting';
    let outcome: TickOutcome;
    try {
      const summary = await this.tick();
      outcome = { ok: true, summary };
      console.log(
        `[poll-loop] tick done: fetched=${summary.fetched} inserted=${summary.inserted} failed=${summary.failed}`,
      );
    } catch (err) {
      outcome = { ok: false, error: err };
      console.error(`[poll-loop] tick failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    this.inFlight = null;
    // stop() may have been called while the tick was running.
    if (this.state === 'stopped') return;

    this._state = 'idle';
    this.timer = setTimeout(() => this.runNext(), this.delayAfter(outcome));
  }

  private delayAfter(outcome: TickOutcome): number {
    try {
      return this.policy.nextDelayMs(outcome);
    } catch (err) {
      console.error(
        `[poll-loop] backoff policy failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      return FALLBACK_DELAY_MS;
    }
  }
}
