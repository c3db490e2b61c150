// ─── Types ──────────────────────────────────────────────────────
export type { TaskSchedulerConfig, TaskSetStrategy, TimerConfig } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export { taskSchedulerConfigSchema, timerConfigSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadTimerConfig, parseTimerConfig, resolveEnvVars } from './loader.js';
