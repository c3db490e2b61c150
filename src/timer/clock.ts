import type { Clock } from '@/core/types.js';

/**
 * Wall-clock time that never runs backwards.
 *
 * Anchored to `Date.now()` once, then advanced by the monotonic
 * `performance.now()`, so system clock adjustments do not make due tasks
 * wait longer or fire early.
 */
export function createMonotonicClock(): Clock {
  const originWallMs = Date.now();
  const originMonotonicMs = performance.now();

  return {
    now(): number {
      return originWallMs + Math.floor(performance.now() - originMonotonicMs);
    },
  };
}
