import type { BatchStatus } from '../model/BatchStatus.js';
import type { ShardStatus } from '../model/ShardStatus.js';
import type { ShardState, WorkBatch } from '../model/WorkBatch.js';

/** Fields that may change together with a status transition. */
export interface BatchTransitionPatch {
  readonly completedAt?: number;
  readonly statusReason?: string;
}

/**
 * Port for persisting `WorkBatch` records in the system-of-record.
 *
 * Batches are never deleted. Status and shard updates are compare-and-set so
 * that concurrent Coordinator and Consolidator invocations cannot overwrite
 * each other.
 */
export interface BatchRepository {
  create(batch: WorkBatch): Promise<void>;
  get(batchId: string): Promise<WorkBatch | null>;
  /** The batch for `targetDate` in `pending`, `dispatched` or `consolidating`, if any. */
  findActiveByDate(targetDate: string): Promise<WorkBatch | null>;
  findByStatus(statuses: readonly BatchStatus[]): Promise<readonly WorkBatch[]>;
  /**
   * Move the batch to `to` if its current status is one of `from`.
   *
   * @returns The updated batch, or `null` when the current status did not match.
   */
  transition(
    batchId: string,
    from: readonly BatchStatus[],
    to: BatchStatus,
    patch?: BatchTransitionPatch,
  ): Promise<WorkBatch | null>;
  /**
   * Replace one shard's state if its current status is one of `expected`.
   *
   * @returns The updated batch, or `null` when the shard status did not match.
   */
  saveShard(batchId: string, shard: ShardState, expected: readonly ShardStatus[]): Promise<WorkBatch | null>;
}
