/**
 * Minimum-interval gate for providers that throttle per second.
 */

import { setTimeout as sleep } from "node:timers/promises";

export interface RateGate {
  /** Resolves once at least `minIntervalMs` has passed since the last call. */
  wait(): Promise<void>;
}

export function createRateGate(
  minIntervalMs: number,
  clock: { now(): number; sleep(ms: number): Promise<unknown> } = {
    now: () => Date.now(),
    sleep: (ms) => sleep(ms),
  }
): RateGate {
  let lastCallAt: number | null = null;
  // Callers are served one at a time, so concurrent runs share the budget.
  let queue: Promise<void> = Promise.resolve();

  return {
    wait() {
      const turn = queue.then(async () => {
        if (lastCallAt !== null) {
          const remaining = lastCallAt + minIntervalMs - clock.now();
          if (remaining > 0) await clock.sleep(remaining);
        }
        lastCallAt = clock.now();
      });
      queue = turn;
      return turn;
    },
  };
}
