import type { BatchStatus } from './BatchStatus.js';
import type { ShardEntity } from './PredictionRequest.js';
import { ShardStatus, isTerminalShardStatus } from './ShardStatus.js';

/** Persisted state of one shard within a batch. */
export interface ShardState {
  readonly shardId: string;
  /** Zero-based position of the shard within the batch. */
  readonly index: number;
  readonly entityCount: number;
  /** The entities the shard was cut with, so a re-dispatch sends the same request. */
  readonly entities: readonly ShardEntity[];
  readonly status: ShardStatus;
  /** How many times the shard has been dispatched. */
  readonly attempts: number;
  /** Message id of the most recent dispatch. */
  readonly messageId?: string;
  /** Valid results the worker staged. */
  readonly resultCount: number;
  /** Results the Validation Gate rejected. */
  readonly rejectedCount: number;
  /** Entity/strategy pairs that yielded no result: missing inputs or a throwing strategy. */
  readonly omittedCount: number;
  /** Failure or degradation reason reported for the shard. */
  readonly reason?: string;
  readonly reportedAt?: number;
}

/**
 * One coordinated run of result generation for a target date.
 *
 * Persisted in the system-of-record and passed by id through every message;
 * no process keeps a "current batch" in memory.
 */
export interface WorkBatch {
  readonly batchId: string;
  /** Calendar date the predictions are for, as `YYYY-MM-DD`. */
  readonly targetDate: string;
  /** Free-form label of what started the batch (scheduler, backfill tool, operator). */
  readonly triggerSource: string;
  readonly status: BatchStatus;
  readonly expectedShards: number;
  readonly completedShards: number;
  readonly shards: readonly ShardState[];
  /** Epoch ms after which the Coordinator stops waiting for stragglers. */
  readonly deadlineAt: number;
  readonly createdAt: number;
  readonly completedAt?: number;
  readonly statusReason?: string;
}

export type ShardCounts = Readonly<Record<ShardStatus, number>>;

/** Create a pending shard record. */
export function createShardState(shardId: string, index: number, entities: readonly ShardEntity[]): ShardState {
  return {
    shardId,
    index,
    entityCount: entities.length,
    entities,
    status: ShardStatus.PENDING,
    attempts: 0,
    resultCount: 0,
    rejectedCount: 0,
    omittedCount: 0,
  };
}

export function countShards(shards: readonly ShardState[]): ShardCounts {
  const counts: Record<ShardStatus, number> = {
    [ShardStatus.PENDING]: 0,
    [ShardStatus.DISPATCHED]: 0,
    [ShardStatus.COMPLETED]: 0,
    [ShardStatus.FAILED]: 0,
  };
  for (const shard of shards) {
    counts[shard.status]++;
  }
  return counts;
}

export function allShardsTerminal(batch: WorkBatch): boolean {
  return batch.shards.length > 0 && batch.shards.every((s) => isTerminalShardStatus(s.status));
}

export function allShardsCompleted(batch: WorkBatch): boolean {
  return batch.shards.length > 0 && batch.shards.every((s) => s.status === ShardStatus.COMPLETED);
}

export function findShard(batch: WorkBatch, shardId: string): ShardState | undefined {
  return batch.shards.find((s) => s.shardId === shardId);
}

/** Replace one shard and recompute the derived counters. */
export function replaceShard(batch: WorkBatch, shard: ShardState): WorkBatch {
  const shards = batch.shards.map((s) => (s.shardId === shard.shardId ? shard : s));
  return {
    ...batch,
    shards,
    expectedShards: shards.length,
    completedShards: shards.filter((s) => s.status === ShardStatus.COMPLETED).length,
  };
}
