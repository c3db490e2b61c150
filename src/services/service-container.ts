/**
 * ServiceContainer — explicit owner of the running task scheduler.
 *
 * Transaction-manager code is handed a container instead of reaching for a
 * global: the scheduler is built from configuration on first use, started,
 * and shut down once with the configured grace duration.
 */
import { TimerError } from '@/core/errors.js';
import type { Clock } from '@/core/types.js';
import type { TimerConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import { createTaskScheduler } from '@/timer/task-scheduler.js';
import type { TaskScheduler } from '@/timer/task-scheduler.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ServiceContainerOptions {
  config: TimerConfig;
  logger: Logger;
  clock?: Clock;
}

export interface ServiceContainer {
  /** The running scheduler, created and started on first call. */
  getTaskScheduler(): TaskScheduler;
  /** Shut down every started service. Later calls resolve immediately. */
  shutdown(): Promise<void>;
  isShutDown(): boolean;
}

// ─── Factory ────────────────────────────────────────────────────

const COMPONENT = 'service-container';

/** Create a ServiceContainer. Nothing starts until a service is requested. */
export function createServiceContainer(options: ServiceContainerOptions): ServiceContainer {
  const { config, logger, clock } = options;
  const schedulerConfig = config.taskScheduler;

  let taskScheduler: TaskScheduler | null = null;
  let shutDown = false;

  return {
    getTaskScheduler(): TaskScheduler {
      if (shutDown) {
        throw new TimerError({
          message: 'Services have been shut down',
          code: 'SERVICES_SHUT_DOWN',
        });
      }

      if (taskScheduler === null) {
        taskScheduler = createTaskScheduler({
          logger,
          clock,
          tickIntervalMs: schedulerConfig.tickIntervalMs,
          gracefulShutdownIntervalMs: schedulerConfig.gracefulShutdownIntervalMs,
          taskSetStrategy: schedulerConfig.taskSetStrategy,
        });
        taskScheduler.start();
      }
      return taskScheduler;
    },

    async shutdown(): Promise<void> {
      if (shutDown) return;
      shutDown = true;

      logger.info('Shutting down services', { component: COMPONENT });
      if (taskScheduler !== null) {
        await taskScheduler.shutdown(schedulerConfig.gracefulShutdownIntervalMs);
      }
      logger.info('Services shut down', { component: COMPONENT });
    },

    isShutDown(): boolean {
      return shutDown;
    },
  };
}
