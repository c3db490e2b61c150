// Core module — shared types, result helpers, error hierarchy
export type { Clock, TaskId } from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  TimerError,
  InvalidArgumentError,
  ObligationExecutionError,
  ShutdownTimeoutError,
} from './errors.js';
