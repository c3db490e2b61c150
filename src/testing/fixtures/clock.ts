import type { Clock } from '@/core/types.js';

export interface ManualClock extends Clock {
  set(ms: number): void;
  advance(ms: number): void;
}

/** A clock that only moves when the test moves it. */
export function createManualClock(startMs: number): ManualClock {
  let current = startMs;
  return {
    now: () => current,
    set(ms: number): void {
      current = ms;
    },
    advance(ms: number): void {
      current += ms;
    },
  };
}
