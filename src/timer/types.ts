/**
 * Timer types — scheduled obligations and the callback contracts their
 * subjects satisfy.
 *
 * A subject is referenced weakly and compared by identity only. The
 * scheduler never extends a subject's lifetime.
 */
import type { TaskId } from '@/core/types.js';

// ─── Subject Contracts ──────────────────────────────────────────

/** A transaction that can be marked as timed out. */
export interface TimeoutSubject {
  markTimedOut(): void | Promise<void>;
}

/** The recovery subsystem entry point. */
export interface RecoverySubject {
  runRecovery(): void | Promise<void>;
}

/** A connection pool that knows when it next wants to close idle connections. */
export interface PoolShrinkSubject {
  /** `undefined` when the pool has no shrink planned. */
  getNextShrinkTime(): Date | undefined;
  shrink(): void | Promise<void>;
}

// ─── Tasks ──────────────────────────────────────────────────────

export type TaskKind = 'timeout' | 'recovery' | 'pool-shrink';

interface TaskBase {
  readonly id: TaskId;
  readonly executionTime: Date;
  /** Creation order; breaks ties between tasks due at the same instant. */
  readonly sequence: number;
}

export interface TimeoutTask extends TaskBase {
  readonly kind: 'timeout';
  readonly subject: WeakRef<TimeoutSubject>;
}

export interface RecoveryTask extends TaskBase {
  readonly kind: 'recovery';
  readonly subject: WeakRef<RecoverySubject>;
}

export interface PoolShrinkTask extends TaskBase {
  readonly kind: 'pool-shrink';
  readonly subject: WeakRef<PoolShrinkSubject>;
}

export type Task = TimeoutTask | RecoveryTask | PoolShrinkTask;

export type Subject = TimeoutSubject | RecoverySubject | PoolShrinkSubject;

// ─── Lifecycle ──────────────────────────────────────────────────

export type SchedulerState = 'active' | 'stopping' | 'stopped';
