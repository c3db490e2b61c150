import { describe, it, expect, vi, afterEach } from 'vitest';
import { createMonotonicClock } from './clock.js';

describe('createMonotonicClock', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts at the wall clock time', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
    vi.spyOn(performance, 'now').mockReturnValue(250);

    const clock = createMonotonicClock();

    expect(clock.now()).toBe(1_700_000_000_000);
  });

  it('advances with monotonic time and ignores wall clock changes', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
    const monotonic = vi.spyOn(performance, 'now').mockReturnValue(100);
    const clock = createMonotonicClock();

    vi.spyOn(Date, 'now').mockReturnValue(1_600_000_000_000);
    monotonic.mockReturnValue(1600.7);

    expect(clock.now()).toBe(1_700_000_001_500);
  });
});
