import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServiceContainer } from './service-container.js';
import type { ServiceContainer } from './service-container.js';
import { TimerError } from '@/core/errors.js';
import type { TimerConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import { createManualClock } from '@/testing/fixtures/clock.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createFakeTransaction } from '@/testing/fixtures/subjects.js';

const T0 = Date.UTC(2025, 0, 1, 12, 0, 0);

const config: TimerConfig = {
  logLevel: 'info',
  taskScheduler: {
    tickIntervalMs: 10,
    gracefulShutdownIntervalMs: 1000,
    taskSetStrategy: 'locked',
  },
};

describe('ServiceContainer', () => {
  let logger: Logger;
  let services: ServiceContainer;

  beforeEach(() => {
    logger = createMockLogger();
    services = createServiceContainer({ config, logger, clock: createManualClock(T0) });
  });

  afterEach(async () => {
    await services.shutdown();
  });

  it('creates the scheduler once and starts it', () => {
    const scheduler = services.getTaskScheduler();

    expect(services.getTaskScheduler()).toBe(scheduler);
    expect(scheduler.getState()).toBe('active');
    expect(logger.info).toHaveBeenCalledWith(
      'Task scheduler started',
      expect.objectContaining({ tickIntervalMs: 10, taskSetStrategy: 'locked' }),
    );
  });

  it('stops the scheduler on shutdown', async () => {
    const scheduler = services.getTaskScheduler();
    await scheduler.scheduleTimeout(createFakeTransaction('tx-1'), new Date(T0 + 60_000));

    await services.shutdown();

    expect(services.isShutDown()).toBe(true);
    expect(scheduler.getState()).toBe('stopped');
  });

  it('refuses to hand out services after shutdown', async () => {
    await services.shutdown();

    expect(() => services.getTaskScheduler()).toThrow(TimerError);
    expect(() => services.getTaskScheduler()).toThrow('Services have been shut down');
  });

  it('shuts down cleanly when no service was ever started', async () => {
    await services.shutdown();
    await services.shutdown();

    expect(logger.info).toHaveBeenCalledWith('Services shut down', { component: 'service-container' });
    expect(logger.info).toHaveBeenCalledTimes(2);
  });
});
