/**
 * Finite state machine for the lifecycle of a `WorkBatch`.
 *
 * Valid transitions:
 * - `pending` → `dispatched` | `failed`
 * - `dispatched` → `consolidating` | `failed`
 * - `consolidating` → `complete` | `partial` | `needs_review`
 * - `partial` → `complete` | `needs_review`
 * - `needs_review` → `complete` | `partial`
 * - `complete`, `failed` → (terminal)
 *
 * A batch never returns to an earlier phase. `partial` and `needs_review`
 * only move forward once an operator re-dispatches or repairs the missing data.
 */
export const BatchStatus = {
  PENDING: 'pending',
  DISPATCHED: 'dispatched',
  CONSOLIDATING: 'consolidating',
  COMPLETE: 'complete',
  PARTIAL: 'partial',
  NEEDS_REVIEW: 'needs_review',
  FAILED: 'failed',
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

const VALID_TRANSITIONS: Record<BatchStatus, readonly BatchStatus[]> = {
  [BatchStatus.PENDING]: [BatchStatus.DISPATCHED, BatchStatus.FAILED],
  [BatchStatus.DISPATCHED]: [BatchStatus.CONSOLIDATING, BatchStatus.FAILED],
  [BatchStatus.CONSOLIDATING]: [BatchStatus.COMPLETE, BatchStatus.PARTIAL, BatchStatus.NEEDS_REVIEW],
  [BatchStatus.PARTIAL]: [BatchStatus.COMPLETE, BatchStatus.NEEDS_REVIEW],
  [BatchStatus.NEEDS_REVIEW]: [BatchStatus.COMPLETE, BatchStatus.PARTIAL],
  [BatchStatus.COMPLETE]: [],
  [BatchStatus.FAILED]: [],
};

/**
 * Statuses during which a batch blocks a new `startBatch()` for the same date.
 * `needs_review` stays here until an operator repairs the batch.
 */
export const ACTIVE_BATCH_STATUSES: readonly BatchStatus[] = [
  BatchStatus.PENDING,
  BatchStatus.DISPATCHED,
  BatchStatus.CONSOLIDATING,
  BatchStatus.NEEDS_REVIEW,
];

/** Statuses from which the Consolidator may (re)run a merge. */
export const CONSOLIDATABLE_STATUSES: readonly BatchStatus[] = [
  BatchStatus.CONSOLIDATING,
  BatchStatus.PARTIAL,
  BatchStatus.NEEDS_REVIEW,
];

/** Check whether a state transition is valid according to the batch lifecycle FSM. */
export function canTransition(from: BatchStatus, to: BatchStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isActiveStatus(status: BatchStatus): boolean {
  return ACTIVE_BATCH_STATUSES.includes(status);
}
