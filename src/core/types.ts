// ─── Branded ID Types ────────────────────────────────────────────
// Branded types keep a TaskId from being passed where another string is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type TaskId = Brand<string, 'TaskId'>;

// ─── Time ───────────────────────────────────────────────────────

/** Source of the current time in epoch milliseconds. */
export interface Clock {
  now(): number;
}
