/**
 * Zod schemas for validating the timer configuration file.
 * Every field has a default, so an empty object is a valid configuration.
 */
import { z } from 'zod';

// ─── Task Scheduler Config ──────────────────────────────────────

/**
 * Schema for the task scheduler section.
 * `taskSetStrategy` picks how the pending task set is kept consistent
 * under concurrent producers.
 */
export const taskSchedulerConfigSchema = z.object({
  tickIntervalMs: z.number().int().positive('Tick interval must be a positive integer').default(500),
  gracefulShutdownIntervalMs: z
    .number()
    .int()
    .min(0, 'Graceful shutdown interval cannot be negative')
    .default(60_000),
  taskSetStrategy: z.enum(['concurrent', 'locked']).default('concurrent'),
});

// ─── Timer Config File ──────────────────────────────────────────

export const timerConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  taskScheduler: taskSchedulerConfigSchema.default({}),
});
