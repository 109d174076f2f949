import { describe, it, expect, vi } from 'vitest';
import type { DomainEvent, ShardMessage } from '@predgrid/core';
import { AlreadyRunningError, RedispatchNotAllowedError } from '@predgrid/core';
import { TARGET_DATE, createHarness, deliver, drain } from '../fixtures.js';

describe('Coordinator', () => {
  describe('startBatch', () => {
    it('should create a dispatched batch and publish one message per shard', async () => {
      const { pipeline, queue } = createHarness({ entityCount: 12 });

      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const status = await pipeline.getStatus(batchId);

      expect(status.status).toBe('dispatched');
      expect(status.expectedShards).toBe(3);
      expect(status.completedShards).toBe(0);
      expect(status.shardCounts).toEqual({ pending: 0, dispatched: 3, completed: 0, failed: 0 });
      expect(status.shards.map((s) => s.entityCount)).toEqual([5, 5, 2]);

      const messages = queue.drain();
      expect(messages).toHaveLength(3);
      expect(messages[0]?.request).toMatchObject({
        batchId,
        shardIndex: 0,
        targetDate: TARGET_DATE,
        strategyIds: ['baseline', 'momentum'],
      });
      expect(new Set(messages.map((m) => m.messageId)).size).toBe(3);
    });

    it('should skip ineligible entities', async () => {
      const { pipeline, entities } = createHarness({ entityCount: 6 });
      entities.candidates = entities.candidates.map((c, i) => (i === 0 ? { ...c, withdrawn: true } : c));

      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

      expect((await pipeline.getStatus(batchId)).shards.map((s) => s.entityCount)).toEqual([5]);
    });

    it('should refuse a second batch while one is active for the date', async () => {
      const { pipeline } = createHarness();
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

      const second = pipeline.startBatch(TARGET_DATE, 'operator');

      await expect(second).rejects.toBeInstanceOf(AlreadyRunningError);
      await expect(second).rejects.toMatchObject({ activeBatchId: batchId, code: 'ALREADY_RUNNING' });
    });

    it('should let exactly one of two concurrent starts win', async () => {
      const harness = createHarness();

      const results = await Promise.allSettled([
        harness.pipeline.startBatch(TARGET_DATE, 'scheduler'),
        harness.another().startBatch(TARGET_DATE, 'scheduler'),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r) => r.status === 'rejected');
      expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(AlreadyRunningError);
    });

    it('should allow a new batch once the previous one is complete', async () => {
      const { pipeline, queue } = createHarness();
      const first = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      await drain(pipeline, queue);

      const second = await pipeline.startBatch(TARGET_DATE, 'operator');

      expect((await pipeline.getStatus(first)).status).toBe('complete');
      expect(second).not.toBe(first);
    });

    it('should refuse a new batch while the previous one awaits review', async () => {
      const { pipeline, queue, sharedStore } = createHarness();
      vi.spyOn(sharedStore, 'countResultKeys').mockResolvedValueOnce(0);
      const flagged = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      await drain(pipeline, queue);
      expect((await pipeline.getStatus(flagged)).status).toBe('needs_review');

      const second = pipeline.startBatch(TARGET_DATE, 'operator');

      await expect(second).rejects.toMatchObject({ activeBatchId: flagged, code: 'ALREADY_RUNNING' });

      await pipeline.consolidate(flagged);
      expect((await pipeline.getStatus(flagged)).status).toBe('complete');
      expect(await pipeline.startBatch(TARGET_DATE, 'operator')).not.toBe(flagged);
    });

    it('should fail a batch without eligible entities', async () => {
      const { pipeline, entities, alerts, queue } = createHarness();
      entities.candidates = [];

      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const status = await pipeline.getStatus(batchId);

      expect(status.status).toBe('failed');
      expect(status.statusReason).toBe('No eligible entities');
      expect(queue.pending).toBe(0);
      expect(alerts.ofKind('batch_failed')).toHaveLength(1);
    });

    it('should mark a shard failed when publishing exhausts its retries and carry on', async () => {
      const { pipeline, queue } = createHarness();
      const publish = queue.publish.bind(queue);
      vi.spyOn(queue, 'publish').mockImplementation((message: ShardMessage) =>
        message.request.shardIndex === 1 ? Promise.reject(new Error('broker unavailable')) : publish(message),
      );
      const events: DomainEvent[] = [];
      pipeline.onAny((e) => events.push(e));

      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

      const status = await pipeline.getStatus(batchId);
      expect(status.status).toBe('dispatched');
      expect(status.shards[1]).toMatchObject({ status: 'failed', reason: 'Publish failed: broker unavailable' });
      expect(events.filter((e) => e.type === 'operation:retried')).toHaveLength(3);
      expect(events.find((e) => e.type === 'shard:publish_failed')).toMatchObject({ shardId: `${batchId}-s1` });

      await drain(pipeline, queue);
      expect((await pipeline.getStatus(batchId)).status).toBe('partial');
    });

    it('should fail the batch when no shard can be published', async () => {
      const { pipeline, queue } = createHarness();
      vi.spyOn(queue, 'publish').mockRejectedValue(new Error('broker unavailable'));

      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

      const status = await pipeline.getStatus(batchId);
      expect(status.status).toBe('failed');
      expect(status.statusReason).toBe('Every shard failed');
    });
  });

  describe('recordShardCompletion', () => {
    it('should keep the first report of a completed shard', async () => {
      const { pipeline, queue } = createHarness({ entityCount: 10 });
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const [first] = queue.drain();
      if (!first) throw new Error('expected a message');
      await pipeline.processShard(first);
      const late: DomainEvent[] = [];
      pipeline.on('shard:late_report', (e) => late.push(e));

      const result = await pipeline.recordShardCompletion({
        batchId,
        shardId: first.request.shardId,
        messageId: 'other-message',
        outcome: 'failure',
        resultCount: 0,
        rejectedCount: 0,
        omittedCount: 0,
        reason: 'stale worker',
        reportedAt: 0,
      });

      expect(result.recorded).toBe(false);
      expect(result.shard).toMatchObject({ status: 'completed', resultCount: 10 });
      expect(late).toHaveLength(1);
    });

    it('should reject a report for an unknown batch', async () => {
      const { pipeline } = createHarness();

      await expect(
        pipeline.recordShardCompletion({
          batchId: 'missing',
          shardId: 's0',
          messageId: 'm',
          outcome: 'success',
          resultCount: 0,
          rejectedCount: 0,
          omittedCount: 0,
          reportedAt: 0,
        }),
      ).rejects.toMatchObject({ code: 'BATCH_NOT_FOUND' });
    });
  });

  describe('checkDeadline', () => {
    it('should wait until the deadline has passed', async () => {
      const { pipeline } = createHarness();
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

      expect(await pipeline.checkDeadline(batchId)).toEqual({ batchId, action: 'not_due', consolidation: null });
    });

    it('should consolidate in partial mode over whatever staging exists after the deadline', async () => {
      const { pipeline, queue, sharedStore, advance, alerts } = createHarness({ entityCount: 10 });
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const [first] = queue.drain();
      if (!first) throw new Error('expected a message');
      await pipeline.processShard(first);
      const timedOut: DomainEvent[] = [];
      pipeline.on('batch:timed_out', (e) => timedOut.push(e));

      advance(2 * 60 * 60 * 1000);
      const result = await pipeline.checkDeadline(batchId);

      expect(result.action).toBe('consolidated');
      expect(result.consolidation).toMatchObject({ outcome: 'partial', rowsMerged: 10 });
      const status = await pipeline.getStatus(batchId);
      expect(status.status).toBe('partial');
      expect(status.statusReason).toBe(`Missing shards: ${batchId}-s1`);
      expect(status.shards[1]).toMatchObject({ status: 'failed', reason: 'Deadline exceeded' });
      expect(timedOut).toHaveLength(1);
      expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(10);
      expect(alerts.ofKind('batch_partial')).toHaveLength(1);
    });

    it('should fail a batch whose deadline passed with no completed shard and nothing staged', async () => {
      const { pipeline, advance } = createHarness();
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

      advance(2 * 60 * 60 * 1000);
      const result = await pipeline.checkDeadline(batchId);

      expect(result.action).toBe('skipped');
      const status = await pipeline.getStatus(batchId);
      expect(status.status).toBe('failed');
      expect(status.statusReason).toBe('Deadline exceeded with no completed shard and no staging');
    });

    it('should merge rows staged by a shard that never managed to report', async () => {
      const { pipeline, queue, batches, staging, sharedStore, advance } = createHarness({ entityCount: 5 });
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const [only] = queue.drain();
      if (!only) throw new Error('expected a message');
      const saveShard = vi.spyOn(batches, 'saveShard').mockRejectedValue(new Error('coordinator unreachable'));
      const failure = await deliver(pipeline, only);
      saveShard.mockRestore();
      expect(failure).toBeInstanceOf(Error);
      expect((await staging.listAreas(batchId))[0]?.rows).toHaveLength(10);

      advance(2 * 60 * 60 * 1000);
      const result = await pipeline.checkDeadline(batchId);

      expect(result.action).toBe('consolidated');
      expect(result.consolidation).toMatchObject({ outcome: 'partial', rowsMerged: 10, stagingAreasDeleted: 1 });
      expect((await pipeline.getStatus(batchId)).status).toBe('partial');
      expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(10);

      await pipeline.processShard(only);
      expect((await pipeline.getStatus(batchId)).status).toBe('complete');
      expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(10);
    });
  });

  describe('redispatchShard', () => {
    it('should republish a failed shard under a fresh message id and complete the batch', async () => {
      const { pipeline, queue, advance } = createHarness({ entityCount: 10 });
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const [first, second] = queue.drain();
      if (!first || !second) throw new Error('expected two messages');
      await pipeline.processShard(first);
      advance(2 * 60 * 60 * 1000);
      await pipeline.checkDeadline(batchId);

      const messageId = await pipeline.redispatchShard(batchId, second.request.shardId);
      const [republished] = queue.drain();

      expect(messageId).not.toBe(second.messageId);
      expect(republished?.messageId).toBe(messageId);
      expect(republished?.request.entities).toEqual(second.request.entities);
      expect((await pipeline.getStatus(batchId)).shards[1]).toMatchObject({ status: 'dispatched', attempts: 2 });

      if (!republished) throw new Error('expected a message');
      await pipeline.processShard(republished);
      expect((await pipeline.getStatus(batchId)).status).toBe('complete');
    });

    it('should refuse to redispatch a completed shard or a finished batch', async () => {
      const { pipeline, queue } = createHarness({ entityCount: 5 });
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const [only] = queue.drain();
      if (!only) throw new Error('expected a message');
      await pipeline.processShard(only);

      await expect(pipeline.redispatchShard(batchId, only.request.shardId)).rejects.toBeInstanceOf(
        RedispatchNotAllowedError,
      );
    });
  });
});
