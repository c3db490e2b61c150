import { describe, expect, it } from 'vitest';

import { taskSchedulerConfigSchema, timerConfigSchema } from './schema.js';

describe('taskSchedulerConfigSchema', () => {
  it('accepts a zero grace duration', () => {
    const parsed = taskSchedulerConfigSchema.parse({ gracefulShutdownIntervalMs: 0 });

    expect(parsed.gracefulShutdownIntervalMs).toBe(0);
  });

  it('rejects a negative grace duration', () => {
    const result = taskSchedulerConfigSchema.safeParse({ gracefulShutdownIntervalMs: -1 });

    expect(result.success).toBe(false);
  });

  it('rejects a fractional tick interval', () => {
    const result = taskSchedulerConfigSchema.safeParse({ tickIntervalMs: 0.5 });

    expect(result.success).toBe(false);
  });

  it('rejects an unknown task set strategy', () => {
    const result = taskSchedulerConfigSchema.safeParse({ taskSetStrategy: 'skiplist' });

    expect(result.success).toBe(false);
  });
});

describe('timerConfigSchema', () => {
  it('applies nested defaults when the scheduler section is omitted', () => {
    const parsed = timerConfigSchema.parse({ logLevel: 'warn' });

    expect(parsed).toEqual({
      logLevel: 'warn',
      taskScheduler: {
        tickIntervalMs: 500,
        gracefulShutdownIntervalMs: 60_000,
        taskSetStrategy: 'concurrent',
      },
    });
  });

  it('rejects an unknown log level', () => {
    expect(timerConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
  });
});
