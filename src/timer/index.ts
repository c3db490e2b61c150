// Timer module — scheduled obligations, task set strategies, and the scheduler
export type {
  PoolShrinkSubject,
  PoolShrinkTask,
  RecoverySubject,
  RecoveryTask,
  SchedulerState,
  Subject,
  Task,
  TaskKind,
  TimeoutSubject,
  TimeoutTask,
} from './types.js';

export {
  compareTasks,
  createPoolShrinkTask,
  createRecoveryTask,
  createTimeoutTask,
  describeSubject,
  describeTask,
  executeTask,
  isDue,
  isTaskFor,
} from './task.js';

export { createConcurrentTaskSet, createLockedTaskSet, createTaskSet } from './task-set.js';
export type { TaskSet } from './task-set.js';

export { createMonotonicClock } from './clock.js';

export { createTaskScheduler } from './task-scheduler.js';
export type { TaskScheduler, TaskSchedulerOptions } from './task-scheduler.js';
