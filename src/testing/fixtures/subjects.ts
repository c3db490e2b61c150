/**
 * In-process stand-ins for the transaction manager collaborators a task
 * scheduler calls back into.
 */
import type { PoolShrinkSubject, RecoverySubject, TimeoutSubject } from '@/timer/types.js';

export interface FakeTransaction extends TimeoutSubject {
  readonly gtrid: string;
  timedOut: boolean;
  toString(): string;
}

/** Create a transaction that records being marked as timed out. */
export function createFakeTransaction(gtrid: string, onTimeout?: () => void | Promise<void>): FakeTransaction {
  const transaction: FakeTransaction = {
    gtrid,
    timedOut: false,
    async markTimedOut(): Promise<void> {
      transaction.timedOut = true;
      await onTimeout?.();
    },
    toString(): string {
      return `transaction ${gtrid}`;
    },
  };
  return transaction;
}

export interface FakeRecoverer extends RecoverySubject {
  runs: number;
  toString(): string;
}

/** Create a recoverer that counts passes and runs `onRecovery` after each. */
export function createFakeRecoverer(onRecovery?: () => void | Promise<void>): FakeRecoverer {
  const recoverer: FakeRecoverer = {
    runs: 0,
    async runRecovery(): Promise<void> {
      recoverer.runs++;
      await onRecovery?.();
    },
    toString(): string {
      return 'recoverer';
    },
  };
  return recoverer;
}

export interface FakePool extends PoolShrinkSubject {
  readonly uniqueName: string;
  nextShrinkTime: Date | undefined;
  shrinks: number;
  toString(): string;
}

/** Create a pool whose next shrink time the test controls. */
export function createFakePool(uniqueName: string, nextShrinkTime?: Date): FakePool {
  const pool: FakePool = {
    uniqueName,
    nextShrinkTime,
    shrinks: 0,
    getNextShrinkTime(): Date | undefined {
      return pool.nextShrinkTime;
    },
    shrink(): void {
      pool.shrinks++;
    },
    toString(): string {
      return `pool ${uniqueName}`;
    },
  };
  return pool;
}
