/**
 * Clock and bounded polling.
 *
 * Readiness is polled against an observable signal instead of waiting a
 * fixed delay. The clock is injectable so tests run without real time.
 */

import { setTimeout as delay } from "node:timers/promises";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(ms);
  },
};

/** Clock whose sleep advances time instantly. Records every sleep. */
export class ManualClock implements Clock {
  public sleeps: number[] = [];
  private current = 0;

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export type PollOutcome<T> = {
  /** Last observed value */
  value: T;
  /** Whether `done` accepted a value before the timeout */
  satisfied: boolean;
  elapsedMs: number;
};

/**
 * Probe until `done` accepts the value or `timeoutMs` passes.
 * Always probes at least once.
 */
export async function pollUntil<T>(
  probe: () => Promise<T>,
  done: (value: T) => boolean,
  opts: { timeoutMs: number; intervalMs: number; clock: Clock },
): Promise<PollOutcome<T>> {
  const { clock } = opts;
  const start = clock.now();
  for (;;) {
    const value = await probe();
    const elapsedMs = clock.now() - start;
    if (done(value)) return { value, satisfied: true, elapsedMs };
    if (elapsedMs >= opts.timeoutMs) return { value, satisfied: false, elapsedMs };
    await clock.sleep(Math.min(opts.intervalMs, opts.timeoutMs - elapsedMs));
  }
}
