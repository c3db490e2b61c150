/**
 * Task construction, ordering, and effect dispatch.
 */
import { nanoid } from 'nanoid';
import type { TaskId } from '@/core/types.js';
import type {
  PoolShrinkSubject,
  PoolShrinkTask,
  RecoverySubject,
  RecoveryTask,
  Subject,
  Task,
  TimeoutSubject,
  TimeoutTask,
} from './types.js';

let nextSequence = 0;

function baseFields(executionTime: Date): { id: TaskId; executionTime: Date; sequence: number } {
  return {
    id: nanoid() as TaskId,
    // Copied so a caller mutating its Date cannot reorder the set.
    executionTime: new Date(executionTime.getTime()),
    sequence: nextSequence++,
  };
}

// ─── Factories ──────────────────────────────────────────────────

/** Create a task that marks `transaction` as timed out. */
export function createTimeoutTask(transaction: TimeoutSubject, executionTime: Date): TimeoutTask {
  const task: TimeoutTask = {
    kind: 'timeout',
    subject: new WeakRef(transaction),
    ...baseFields(executionTime),
  };
  return Object.freeze(task);
}

/** Create a task that runs a recovery pass. */
export function createRecoveryTask(recoverer: RecoverySubject, executionTime: Date): RecoveryTask {
  const task: RecoveryTask = {
    kind: 'recovery',
    subject: new WeakRef(recoverer),
    ...baseFields(executionTime),
  };
  return Object.freeze(task);
}

/** Create a task that asks `pool` to close idle connections. */
export function createPoolShrinkTask(pool: PoolShrinkSubject, executionTime: Date): PoolShrinkTask {
  const task: PoolShrinkTask = {
    kind: 'pool-shrink',
    subject: new WeakRef(pool),
    ...baseFields(executionTime),
  };
  return Object.freeze(task);
}

// ─── Ordering & Identity ────────────────────────────────────────

/** Total order: execution time, then creation sequence. */
export function compareTasks(a: Task, b: Task): number {
  const byTime = a.executionTime.getTime() - b.executionTime.getTime();
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}

/** Reference equality against the task's subject. */
export function isTaskFor(task: Task, subject: Subject): boolean {
  return task.subject.deref() === subject;
}

/** Whether the task is eligible to run at `nowMs`. */
export function isDue(task: Task, nowMs: number): boolean {
  return task.executionTime.getTime() <= nowMs;
}

/** Log-line name of a subject. Falls back to `<subject>` when it cannot be stringified. */
export function describeSubject(subject: Subject | undefined): string {
  if (subject === undefined) return '<collected>';
  try {
    return String(subject);
  } catch {
    return '<subject>';
  }
}

/** Human-readable form for log lines. */
export function describeTask(task: Task): string {
  const subjectName = describeSubject(task.subject.deref());
  return `${task.kind} task ${task.id} on ${subjectName} scheduled for ${task.executionTime.toISOString()}`;
}

// ─── Effect ─────────────────────────────────────────────────────

/**
 * Invoke the task's effect. Resolves to `false` when the subject has
 * already been garbage collected and there was nothing to run.
 */
export async function executeTask(task: Task): Promise<boolean> {
  switch (task.kind) {
    case 'timeout': {
      const transaction = task.subject.deref();
      if (transaction === undefined) return false;
      await transaction.markTimedOut();
      return true;
    }
    case 'recovery': {
      const recoverer = task.subject.deref();
      if (recoverer === undefined) return false;
      await recoverer.runRecovery();
      return true;
    }
    case 'pool-shrink': {
      const pool = task.subject.deref();
      if (pool === undefined) return false;
      await pool.shrink();
      return true;
    }
  }
}
