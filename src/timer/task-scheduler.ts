/**
 * TaskScheduler — single authority over timed transaction-manager obligations.
 *
 * Holds at most one pending task per subject. A background loop scans the
 * task set every tick, runs the due tasks' effects, and drops them whether
 * they succeeded or not. Tasks never repeat; an effect that wants another
 * attempt schedules a fresh task itself.
 */
import { InvalidArgumentError, ObligationExecutionError, ShutdownTimeoutError } from '@/core/errors.js';
import type { Clock } from '@/core/types.js';
import type { TaskSetStrategy } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import { createMonotonicClock } from './clock.js';
import {
  createPoolShrinkTask,
  createRecoveryTask,
  createTimeoutTask,
  describeSubject,
  describeTask,
  executeTask,
  isDue,
} from './task.js';
import { createTaskSet } from './task-set.js';
import type {
  PoolShrinkSubject,
  RecoverySubject,
  SchedulerState,
  Subject,
  Task,
  TimeoutSubject,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface TaskSchedulerOptions {
  logger: Logger;
  /** Defaults to a monotonic wall clock. */
  clock?: Clock;
  /** Pause between scan passes in milliseconds. Defaults to 500. */
  tickIntervalMs?: number;
  /** Default wait for the loop to exit on shutdown. Defaults to 60_000. */
  gracefulShutdownIntervalMs?: number;
  /** Defaults to `concurrent`. */
  taskSetStrategy?: TaskSetStrategy;
}

export interface TaskScheduler {
  /**
   * Mark `transaction` as timed out at `executionTime`. Replaces any task
   * already queued for the same transaction.
   */
  scheduleTimeout(transaction: TimeoutSubject, executionTime: Date): Promise<void>;
  /** Resolves to `false` when nothing was queued for the transaction. */
  cancelTimeout(transaction: TimeoutSubject): Promise<boolean>;
  /** Run a recovery pass at `executionTime`. */
  scheduleRecovery(recoverer: RecoverySubject, executionTime: Date): Promise<void>;
  cancelRecovery(recoverer: RecoverySubject): Promise<boolean>;
  /** Shrink `pool` at the time the pool itself reports. */
  schedulePoolShrink(pool: PoolShrinkSubject): Promise<void>;
  cancelPoolShrink(pool: PoolShrinkSubject): Promise<boolean>;
  countQueued(): Promise<number>;
  /** Start the background loop. No-op when already started or shut down. */
  start(): void;
  /**
   * Run one scan pass and resolve to the number of due tasks it ran.
   * Joins the pass already in progress, if any.
   */
  runPass(): Promise<number>;
  getState(): SchedulerState;
  /**
   * Stop the loop and wait up to `graceDurationMs` for it to exit. Only the
   * first call waits; later calls resolve immediately.
   */
  shutdown(graceDurationMs?: number): Promise<void>;
}

// ─── Helpers ────────────────────────────────────────────────────

const COMPONENT = 'task-scheduler';

function requireSubject<T extends object>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined || (typeof value !== 'object' && typeof value !== 'function')) {
    throw new InvalidArgumentError(`Expected a non-null ${name}`, { argument: name });
  }
  return value;
}

function requireExecutionTime(value: Date | null | undefined): Date {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new InvalidArgumentError('Expected a non-null execution time', {
      argument: 'executionTime',
      received: String(value),
    });
  }
  return value;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a TaskScheduler. The loop does not run until `start()`. */
export function createTaskScheduler(options: TaskSchedulerOptions): TaskScheduler {
  const {
    logger,
    clock = createMonotonicClock(),
    tickIntervalMs = 500,
    gracefulShutdownIntervalMs = 60_000,
    taskSetStrategy = 'concurrent',
  } = options;

  const taskSet = createTaskSet(taskSetStrategy);
  const { lock } = taskSet;

  let state: SchedulerState = 'active';
  let loop: Promise<void> | null = null;
  let currentPass: Promise<number> | null = null;
  let wake: (() => void) | null = null;

  logger.debug('Task scheduler created', {
    component: COMPONENT,
    taskSetStrategy: taskSet.strategy,
    tickIntervalMs,
  });

  /** Run `fn` inside the task set's critical section. */
  async function serialized<T>(fn: () => T): Promise<T> {
    if (lock === null) return fn();
    return lock.runExclusive(fn);
  }

  async function addTask(task: Task, subject: Subject): Promise<void> {
    const { superseded, queued } = await serialized(() => {
      const found = taskSet.removeBySubject(subject);
      taskSet.insert(task);
      return { superseded: found, queued: taskSet.size() };
    });

    logger.debug('Scheduled task', {
      component: COMPONENT,
      task: describeTask(task),
      superseded,
      queued,
    });
  }

  async function removeTaskBySubject(subject: Subject, kind: Task['kind']): Promise<boolean> {
    const { found, queued } = await serialized(() => ({
      found: taskSet.removeBySubject(subject),
      queued: taskSet.size(),
    }));

    if (found) {
      logger.debug('Cancelled task', { component: COMPONENT, kind, subject: describeSubject(subject), queued });
    } else {
      logger.debug('No task found for subject', { component: COMPONENT, kind, subject: describeSubject(subject) });
    }
    return found;
  }

  async function executeElapsedTasks(): Promise<number> {
    if (taskSet.size() === 0) return 0;

    const snapshot = await serialized(() => taskSet.snapshot());
    const now = clock.now();
    const executed = new Set<Task>();

    for (const task of snapshot) {
      // The snapshot is ordered, so nothing after this one is due either.
      if (!isDue(task, now)) break;

      executed.add(task);
      try {
        logger.debug('Running task', { component: COMPONENT, task: describeTask(task) });
        const ran = await executeTask(task);
        if (ran) {
          logger.debug('Successfully ran task', { component: COMPONENT, taskId: task.id });
        } else {
          logger.debug('Subject of task no longer exists, skipped', {
            component: COMPONENT,
            taskId: task.id,
            kind: task.kind,
          });
        }
      } catch (error) {
        const failure = new ObligationExecutionError(describeTask(task), error);
        logger.warn(failure.message, {
          component: COMPONENT,
          code: failure.code,
          taskId: task.id,
          kind: task.kind,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (executed.size > 0) {
      const queued = await serialized(() => {
        taskSet.removeTasks(executed);
        return taskSet.size();
      });
      logger.debug('Scan pass complete', {
        component: COMPONENT,
        executed: executed.size,
        queued,
      });
    }

    return executed.size;
  }

  function runPass(): Promise<number> {
    if (currentPass !== null) return currentPass;
    const pass = executeElapsedTasks().finally(() => {
      currentPass = null;
    });
    currentPass = pass;
    return pass;
  }

  /** Sleep one tick; `wake()` ends the sleep early. */
  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        wake = null;
        resolve();
      }, ms);
      // A pending tick never keeps the process alive.
      timer.unref();
      wake = (): void => {
        clearTimeout(timer);
        wake = null;
        resolve();
      };
    });
  }

  async function runLoop(): Promise<void> {
    logger.info('Task scheduler started', {
      component: COMPONENT,
      tickIntervalMs,
      taskSetStrategy: taskSet.strategy,
    });

    while (state === 'active') {
      try {
        await runPass();
      } catch (error) {
        logger.error('Scan pass failed', {
          component: COMPONENT,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      if (state !== 'active') break;
      await sleep(tickIntervalMs);
    }

    state = 'stopped';
    logger.info('Task scheduler stopped', { component: COMPONENT });
  }

  return {
    scheduleTimeout(transaction: TimeoutSubject, executionTime: Date): Promise<void> {
      const subject = requireSubject(transaction, 'transaction');
      const time = requireExecutionTime(executionTime);
      return addTask(createTimeoutTask(subject, time), subject);
    },

    cancelTimeout(transaction: TimeoutSubject): Promise<boolean> {
      const subject = requireSubject(transaction, 'transaction');
      return removeTaskBySubject(subject, 'timeout');
    },

    scheduleRecovery(recoverer: RecoverySubject, executionTime: Date): Promise<void> {
      const subject = requireSubject(recoverer, 'recoverer');
      const time = requireExecutionTime(executionTime);
      return addTask(createRecoveryTask(subject, time), subject);
    },

    cancelRecovery(recoverer: RecoverySubject): Promise<boolean> {
      const subject = requireSubject(recoverer, 'recoverer');
      return removeTaskBySubject(subject, 'recovery');
    },

    schedulePoolShrink(pool: PoolShrinkSubject): Promise<void> {
      const subject = requireSubject(pool, 'pool');
      const time = requireExecutionTime(subject.getNextShrinkTime());
      return addTask(createPoolShrinkTask(subject, time), subject);
    },

    cancelPoolShrink(pool: PoolShrinkSubject): Promise<boolean> {
      const subject = requireSubject(pool, 'pool');
      return removeTaskBySubject(subject, 'pool-shrink');
    },

    countQueued(): Promise<number> {
      return serialized(() => taskSet.size());
    },

    start(): void {
      if (loop !== null || state !== 'active') return;
      loop = runLoop();
    },

    runPass,

    getState(): SchedulerState {
      return state;
    },

    async shutdown(graceDurationMs: number = gracefulShutdownIntervalMs): Promise<void> {
      if (state !== 'active') return;
      state = 'stopping';
      wake?.();

      if (loop === null) {
        state = 'stopped';
        logger.info('Task scheduler stopped', { component: COMPONENT });
        return;
      }

      logger.debug('Graceful scheduler shutdown interval', {
        component: COMPONENT,
        graceDurationMs,
      });

      let timer: ReturnType<typeof setTimeout> | undefined;
      const timedOut = await Promise.race([
        loop.then(() => false),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(true), graceDurationMs);
        }),
      ]);
      clearTimeout(timer);

      if (timedOut) {
        const timeout = new ShutdownTimeoutError(graceDurationMs);
        logger.warn(timeout.message, {
          component: COMPONENT,
          code: timeout.code,
          queued: taskSet.size(),
        });
      }
    },
  };
}
