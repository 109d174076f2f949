import { describe, it, expect, vi } from 'vitest';
import type { DomainEvent, PredictionResult } from '@predgrid/core';
import { LockManager } from '@predgrid/core';
import { LINE, TARGET_DATE, createHarness, drain } from '../fixtures.js';

const strayRow = (batchId: string, value: number): PredictionResult => ({
  entityId: 'ent-900',
  eventId: 'evt-900',
  strategyId: 'baseline',
  quotedLine: LINE,
  targetDate: TARGET_DATE,
  batchId,
  value,
  confidence: 0.5,
  recommendation: 'UNDER',
  lineSource: 'ODDS_API',
  strategyVersion: '1.0.0',
  computedAt: 0,
});

describe('Consolidator', () => {
  it('should merge every staging area and delete it once verified', async () => {
    const { pipeline, queue, sharedStore, staging } = createHarness();
    const completed: DomainEvent[] = [];
    pipeline.on('consolidation:completed', (e) => completed.push(e));
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

    await drain(pipeline, queue);

    expect((await pipeline.getStatus(batchId)).status).toBe('complete');
    expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(20);
    expect(await staging.listAreas(batchId)).toHaveLength(0);
    expect(completed[0]).toMatchObject({ batchId, mode: 'full', rowsMerged: 20, stagingAreasDeleted: 2, finalStatus: 'complete' });
  });

  it('should skip a batch that is not ready to consolidate', async () => {
    const { pipeline } = createHarness();
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

    const result = await pipeline.consolidate(batchId);

    expect(result).toMatchObject({ outcome: 'skipped', reason: 'Batch is dispatched', rowsMerged: 0 });
  });

  it('should back off while another process holds the batch lease', async () => {
    const { pipeline, queue, ports, clock, sharedStore } = createHarness();
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
    const other = new LockManager(ports.leaseStore, { now: () => clock.now });
    await other.acquire(`consolidation:${batchId}`, 'other-process', 60_000);
    const contended: DomainEvent[] = [];
    pipeline.on('consolidation:contended', (e) => contended.push(e));

    await drain(pipeline, queue);

    expect((await pipeline.getStatus(batchId)).status).toBe('consolidating');
    expect(contended[0]).toMatchObject({ batchId, heldBy: 'other-process' });
    expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(0);
    expect(await pipeline.consolidate(batchId)).toMatchObject({ outcome: 'contended' });
  });

  it('should gate staged rows again and drop the ones that fail', async () => {
    const { pipeline, queue, staging, sharedStore, clock } = createHarness();
    const rejected: DomainEvent[] = [];
    const completed: DomainEvent[] = [];
    pipeline.on('result:rejected', (e) => rejected.push(e));
    pipeline.on('consolidation:completed', (e) => completed.push(e));
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
    const [first, second] = queue.drain();
    if (!first || !second) throw new Error('expected two messages');
    await pipeline.processShard(first);
    await staging.writeArea({ batchId, shardId: 'stray', writtenAt: clock.now, rows: [strayRow(batchId, 20)] });

    await pipeline.processShard(second);

    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ shardId: 'stray', code: 'SENTINEL_VALUE' });
    expect(completed[0]).toMatchObject({ rowsMerged: 20, stagingAreasDeleted: 3 });
    expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(20);
  });

  it('should flag the batch for review when staging holds the same key twice', async () => {
    const { pipeline, queue, staging, clock, alerts } = createHarness();
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
    await staging.writeArea({ batchId, shardId: 'stray-a', writtenAt: clock.now, rows: [strayRow(batchId, 12)] });
    await staging.writeArea({ batchId, shardId: 'stray-b', writtenAt: clock.now, rows: [strayRow(batchId, 13)] });

    await drain(pipeline, queue);

    const status = await pipeline.getStatus(batchId);
    expect(status.status).toBe('needs_review');
    expect(status.statusReason).toBe('Staging holds 22 valid rows but only 21 distinct business keys');
    expect(await staging.listAreas(batchId)).toHaveLength(4);
    expect(alerts.ofKind('batch_needs_review')[0]?.severity).toBe('critical');
  });

  it('should keep staging when the store does not hold every merged key, and finish once repaired', async () => {
    const { pipeline, queue, staging, sharedStore } = createHarness();
    vi.spyOn(sharedStore, 'countResultKeys').mockResolvedValueOnce(19);
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

    await drain(pipeline, queue);

    const status = await pipeline.getStatus(batchId);
    expect(status.status).toBe('needs_review');
    expect(status.statusReason).toBe('Shared store holds 19 of 20 merged keys');
    expect(await staging.listAreas(batchId)).toHaveLength(2);

    const retried = await pipeline.consolidate(batchId);

    expect(retried).toMatchObject({ outcome: 'complete', rowsMerged: 20, stagingAreasDeleted: 2 });
    expect((await pipeline.getStatus(batchId)).status).toBe('complete');
    expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(20);
  });

  it('should leave the batch consolidating when its lease expired during the merge', async () => {
    const { pipeline, queue, staging, sharedStore, advance } = createHarness();
    const upsert = sharedStore.upsertResults.bind(sharedStore);
    vi.spyOn(sharedStore, 'upsertResults').mockImplementationOnce((rows) => {
      advance(6 * 60 * 1000);
      return upsert(rows);
    });
    const lost: DomainEvent[] = [];
    pipeline.on('consolidation:lease_lost', (e) => lost.push(e));
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');

    await drain(pipeline, queue);

    expect(lost).toHaveLength(1);
    expect((await pipeline.getStatus(batchId)).status).toBe('consolidating');
    expect(await staging.listAreas(batchId)).toHaveLength(2);

    const [swept] = await pipeline.sweepDeadlines();

    expect(swept).toMatchObject({ batchId, action: 'consolidated', consolidation: { outcome: 'complete' } });
    expect(await sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(20);
  });

  describe('purgeOrphanedStaging', () => {
    it('should delete old areas of finished or unknown batches only', async () => {
      const { pipeline, queue, staging, clock, advance } = createHarness();
      const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
      const [first] = queue.drain();
      if (!first) throw new Error('expected a message');
      await pipeline.processShard(first);
      await staging.writeArea({ batchId: 'gone', shardId: 'gone-s0', writtenAt: clock.now, rows: [] });
      advance(2 * 24 * 60 * 60 * 1000);
      await staging.writeArea({ batchId: 'recent', shardId: 'recent-s0', writtenAt: clock.now, rows: [] });

      const purged = await pipeline.purgeOrphanedStaging(24 * 60 * 60 * 1000);

      expect(purged).toBe(1);
      expect((await staging.listSummaries()).map((s) => s.shardId).sort()).toEqual([`${batchId}-s0`, 'recent-s0']);
    });
  });
});
