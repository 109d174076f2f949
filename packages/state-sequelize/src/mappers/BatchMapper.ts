import type { ShardEntity, ShardState, WorkBatch } from '@predgrid/core';
import { BatchStatus, ShardStatus } from '@predgrid/core';
import type { BatchRow } from '../models/BatchModel.js';
import type { ShardRow } from '../models/ShardModel.js';
import { parseJson } from '../utils/parseJson.js';
import { isRecord, parseEnum, toEpoch, toOptionalEpoch } from '../utils/columns.js';

const BATCH_STATUSES = Object.values(BatchStatus);
const SHARD_STATUSES = Object.values(ShardStatus);

export function toBatchRow(batch: WorkBatch): BatchRow {
  return {
    batchId: batch.batchId,
    targetDate: batch.targetDate,
    triggerSource: batch.triggerSource,
    status: batch.status,
    expectedShards: batch.expectedShards,
    deadlineAt: batch.deadlineAt,
    createdAt: batch.createdAt,
    completedAt: batch.completedAt ?? null,
    statusReason: batch.statusReason ?? null,
  };
}

export function toShardRow(batchId: string, shard: ShardState): ShardRow {
  return {
    shardId: shard.shardId,
    batchId,
    shardIndex: shard.index,
    entityCount: shard.entityCount,
    entities: shard.entities,
    status: shard.status,
    attempts: shard.attempts,
    messageId: shard.messageId ?? null,
    resultCount: shard.resultCount,
    rejectedCount: shard.rejectedCount,
    omittedCount: shard.omittedCount,
    reason: shard.reason ?? null,
    reportedAt: shard.reportedAt ?? null,
  };
}

function toShardEntity(value: unknown): ShardEntity {
  if (!isRecord(value)) {
    throw new Error('Malformed shard entity in database');
  }
  const { entityId, eventId, quotedLine, lineSource } = value;
  if (typeof entityId !== 'string' || typeof eventId !== 'string') {
    throw new Error('Malformed shard entity in database');
  }
  return {
    entityId,
    eventId,
    quotedLine: typeof quotedLine === 'number' ? quotedLine : null,
    lineSource: typeof lineSource === 'string' ? lineSource : null,
  };
}

export function toShardState(row: ShardRow): ShardState {
  const entities = parseJson(row.entities, 'entities');
  if (!Array.isArray(entities)) {
    throw new Error(`Shard ${row.shardId} has no entity list`);
  }
  return {
    shardId: row.shardId,
    index: row.shardIndex,
    entityCount: row.entityCount,
    entities: entities.map(toShardEntity),
    status: parseEnum(SHARD_STATUSES, row.status, 'shard status'),
    attempts: row.attempts,
    messageId: row.messageId ?? undefined,
    resultCount: row.resultCount,
    rejectedCount: row.rejectedCount,
    omittedCount: row.omittedCount,
    reason: row.reason ?? undefined,
    reportedAt: toOptionalEpoch(row.reportedAt),
  };
}

/** Assemble a batch from its row and its shard rows. `completedShards` is derived from the shards. */
export function toWorkBatch(row: BatchRow, shardRows: readonly ShardRow[]): WorkBatch {
  const shards = [...shardRows].sort((a, b) => a.shardIndex - b.shardIndex).map(toShardState);
  return {
    batchId: row.batchId,
    targetDate: row.targetDate,
    triggerSource: row.triggerSource,
    status: parseEnum(BATCH_STATUSES, row.status, 'batch status'),
    expectedShards: row.expectedShards,
    completedShards: shards.filter((s) => s.status === ShardStatus.COMPLETED).length,
    shards,
    deadlineAt: toEpoch(row.deadlineAt),
    createdAt: toEpoch(row.createdAt),
    completedAt: toOptionalEpoch(row.completedAt),
    statusReason: row.statusReason ?? undefined,
  };
}
