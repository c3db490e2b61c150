import type { z } from 'zod';
import type { taskSchedulerConfigSchema, timerConfigSchema } from './schema.js';

/** Validated configuration, defaults applied. */
export type TimerConfig = z.infer<typeof timerConfigSchema>;

export type TaskSchedulerConfig = z.infer<typeof taskSchedulerConfigSchema>;

export type TaskSetStrategy = TaskSchedulerConfig['taskSetStrategy'];
