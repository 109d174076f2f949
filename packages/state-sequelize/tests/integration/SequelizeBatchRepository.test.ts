import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { BatchStatus, ShardStatus } from '@predgrid/core';
import type { ShardState } from '@predgrid/core';
import { T0, TARGET_DATE, openSqliteStore, sampleBatch, shardEntity } from '../helpers.js';
import type { SqliteFixture } from '../helpers.js';
import type { SequelizeBatchRepository } from '../../src/SequelizeBatchRepository.js';

describe('SequelizeBatchRepository', () => {
  let fixture: SqliteFixture;
  let batches: SequelizeBatchRepository;

  beforeEach(async () => {
    fixture = await openSqliteStore();
    batches = fixture.store.batches;
  });

  afterEach(async () => {
    await fixture.close();
  });

  it('should store a batch with its shards and read it back unchanged', async () => {
    const batch = sampleBatch();
    await batches.create(batch);

    expect(await batches.get('batch-1')).toEqual(batch);
  });

  it('should return null for an unknown batch', async () => {
    expect(await batches.get('missing')).toBeNull();
  });

  it('should keep shards in index order with their entities', async () => {
    await batches.create(sampleBatch());
    const stored = await batches.get('batch-1');

    expect(stored?.shards.map((s) => s.shardId)).toEqual(['batch-1-s0', 'batch-1-s1']);
    expect(stored?.shards[1]?.entities).toEqual([shardEntity(2, null)]);
  });

  it('should find the active batch of a date', async () => {
    await batches.create(sampleBatch('done', BatchStatus.COMPLETE));
    await batches.create(sampleBatch('running', BatchStatus.DISPATCHED));

    expect((await batches.findActiveByDate(TARGET_DATE))?.batchId).toBe('running');
    expect(await batches.findActiveByDate('2026-03-15')).toBeNull();
  });

  it('should keep a batch awaiting review active', async () => {
    await batches.create(sampleBatch('flagged', BatchStatus.NEEDS_REVIEW));

    expect((await batches.findActiveByDate(TARGET_DATE))?.batchId).toBe('flagged');
  });

  it('should not report a finalized batch as active', async () => {
    await batches.create(sampleBatch('done', BatchStatus.PARTIAL));

    expect(await batches.findActiveByDate(TARGET_DATE)).toBeNull();
  });

  it('should list batches by status', async () => {
    await batches.create(sampleBatch('a', BatchStatus.DISPATCHED));
    await batches.create(sampleBatch('b', BatchStatus.PARTIAL));
    await batches.create(sampleBatch('c', BatchStatus.COMPLETE));

    const found = await batches.findByStatus([BatchStatus.DISPATCHED, BatchStatus.PARTIAL]);

    expect(found.map((b) => b.batchId).sort()).toEqual(['a', 'b']);
    expect(found.every((b) => b.shards.length === 2)).toBe(true);
  });

  it('should transition only from an expected status', async () => {
    await batches.create(sampleBatch());

    expect(await batches.transition('batch-1', [BatchStatus.PENDING], BatchStatus.FAILED)).toBeNull();

    const moved = await batches.transition('batch-1', [BatchStatus.DISPATCHED], BatchStatus.CONSOLIDATING);
    expect(moved?.status).toBe(BatchStatus.CONSOLIDATING);
    expect(moved?.completedAt).toBeUndefined();
  });

  it('should apply the patch with the transition', async () => {
    await batches.create(sampleBatch('batch-1', BatchStatus.CONSOLIDATING));

    const moved = await batches.transition('batch-1', [BatchStatus.CONSOLIDATING], BatchStatus.PARTIAL, {
      completedAt: T0 + 5_000,
      statusReason: 'Missing shards: batch-1-s1',
    });

    expect(moved?.completedAt).toBe(T0 + 5_000);
    expect(moved?.statusReason).toBe('Missing shards: batch-1-s1');
  });

  it('should let only one of two racing transitions win', async () => {
    await batches.create(sampleBatch());

    const first = await batches.transition('batch-1', [BatchStatus.DISPATCHED], BatchStatus.CONSOLIDATING);
    const second = await batches.transition('batch-1', [BatchStatus.DISPATCHED], BatchStatus.FAILED);

    expect(first?.status).toBe(BatchStatus.CONSOLIDATING);
    expect(second).toBeNull();
  });

  it('should save a shard when its status matches and derive completedShards', async () => {
    const batch = sampleBatch();
    await batches.create(batch);
    const shard = batch.shards[0];
    if (!shard) throw new Error('fixture has no shard');
    const completed: ShardState = {
      ...shard,
      status: ShardStatus.COMPLETED,
      attempts: 1,
      messageId: 'msg-1',
      resultCount: 4,
      reportedAt: T0 + 60_000,
    };

    const updated = await batches.saveShard('batch-1', completed, [ShardStatus.PENDING, ShardStatus.DISPATCHED]);

    expect(updated?.completedShards).toBe(1);
    expect(updated?.shards[0]).toEqual(completed);
  });

  it('should refuse a shard update from an unexpected status', async () => {
    const batch = sampleBatch();
    await batches.create(batch);
    const shard = batch.shards[0];
    if (!shard) throw new Error('fixture has no shard');

    const updated = await batches.saveShard(
      'batch-1',
      { ...shard, status: ShardStatus.FAILED, reason: 'late' },
      [ShardStatus.DISPATCHED],
    );

    expect(updated).toBeNull();
    expect((await batches.get('batch-1'))?.shards[0]?.status).toBe(ShardStatus.PENDING);
  });
});
