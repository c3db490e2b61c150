/**
 * Ordered containers for pending tasks.
 *
 * Two strategies with identical behavior:
 * - `concurrent`: copy-on-write sorted array. Every mutation swaps in a new
 *   array, so a snapshot is the live array and stays valid while producers
 *   keep inserting and removing. Needs no lock.
 * - `locked`: sorted array mutated in place. Callers must hold `lock` around
 *   every operation, and `snapshot()` hands out a defensive copy.
 */
import { Mutex } from 'async-mutex';
import type { TaskSetStrategy } from '@/config/types.js';
import { compareTasks, isTaskFor } from './task.js';
import type { Subject, Task } from './types.js';

// ─── Interface ──────────────────────────────────────────────────

export interface TaskSet {
  readonly strategy: TaskSetStrategy;
  /** Lock serializing access, or `null` when the set is safe without one. */
  readonly lock: Mutex | null;
  /** Add a task in `(executionTime, sequence)` order. */
  insert(task: Task): void;
  /** Remove the first task whose subject is `subject` (reference equality). */
  removeBySubject(subject: Subject): boolean;
  /** Remove exactly these task objects. Returns how many were still present. */
  removeTasks(tasks: ReadonlySet<Task>): number;
  /** Ordered view that callers may iterate while the set changes. */
  snapshot(): readonly Task[];
  size(): number;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Index of the first element ordered after `task` (binary search). */
function insertionIndex(tasks: readonly Task[], task: Task): number {
  let low = 0;
  let high = tasks.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const current = tasks[mid];
    if (current !== undefined && compareTasks(current, task) <= 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

// ─── Copy-on-write ──────────────────────────────────────────────

/** Create a task set that tolerates mutation during iteration without a lock. */
export function createConcurrentTaskSet(): TaskSet {
  let tasks: readonly Task[] = [];

  return {
    strategy: 'concurrent',
    lock: null,

    insert(task: Task): void {
      const index = insertionIndex(tasks, task);
      tasks = [...tasks.slice(0, index), task, ...tasks.slice(index)];
    },

    removeBySubject(subject: Subject): boolean {
      const index = tasks.findIndex((task) => isTaskFor(task, subject));
      if (index === -1) return false;
      tasks = [...tasks.slice(0, index), ...tasks.slice(index + 1)];
      return true;
    },

    removeTasks(toRemove: ReadonlySet<Task>): number {
      const remaining = tasks.filter((task) => !toRemove.has(task));
      const removed = tasks.length - remaining.length;
      tasks = remaining;
      return removed;
    },

    snapshot(): readonly Task[] {
      return tasks;
    },

    size(): number {
      return tasks.length;
    },
  };
}

// ─── Locked ─────────────────────────────────────────────────────

/** Create a task set mutated in place and guarded by a mutex. */
export function createLockedTaskSet(): TaskSet {
  const tasks: Task[] = [];

  return {
    strategy: 'locked',
    lock: new Mutex(),

    insert(task: Task): void {
      tasks.splice(insertionIndex(tasks, task), 0, task);
    },

    removeBySubject(subject: Subject): boolean {
      const index = tasks.findIndex((task) => isTaskFor(task, subject));
      if (index === -1) return false;
      tasks.splice(index, 1);
      return true;
    },

    removeTasks(toRemove: ReadonlySet<Task>): number {
      let removed = 0;
      for (let i = tasks.length - 1; i >= 0; i--) {
        const task = tasks[i];
        if (task !== undefined && toRemove.has(task)) {
          tasks.splice(i, 1);
          removed++;
        }
      }
      return removed;
    },

    snapshot(): readonly Task[] {
      return [...tasks];
    },

    size(): number {
      return tasks.length;
    },
  };
}

// ─── Factory ────────────────────────────────────────────────────

/** Create the task set for the configured strategy. */
export function createTaskSet(strategy: TaskSetStrategy): TaskSet {
  switch (strategy) {
    case 'concurrent':
      return createConcurrentTaskSet();
    case 'locked':
      return createLockedTaskSet();
  }
}
