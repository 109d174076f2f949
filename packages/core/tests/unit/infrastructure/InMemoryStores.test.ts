import { describe, it, expect } from 'vitest';
import { InMemorySharedStore } from '../../../src/infrastructure/memory/InMemorySharedStore.js';
import { InMemoryStagingStore } from '../../../src/infrastructure/memory/InMemoryStagingStore.js';
import { InMemoryBatchRepository } from '../../../src/infrastructure/memory/InMemoryBatchRepository.js';
import { InMemoryIdempotencyStore } from '../../../src/infrastructure/memory/InMemoryIdempotencyStore.js';
import { createShardState } from '../../../src/domain/model/WorkBatch.js';
import type { WorkBatch } from '../../../src/domain/model/WorkBatch.js';
import type { PredictionResult } from '../../../src/domain/model/PredictionResult.js';

const entities = (count: number) =>
  Array.from({ length: count }, (_, i) => ({
    entityId: `e-${String(i)}`,
    eventId: `ev-${String(i)}`,
    quotedLine: 10.5,
    lineSource: 'ODDS_API',
  }));

const row = (entityId: string, overrides: Partial<PredictionResult> = {}): PredictionResult => ({
  entityId,
  eventId: 'ev-1',
  strategyId: 'baseline',
  quotedLine: 24.5,
  targetDate: '2026-03-14',
  batchId: 'b-1',
  value: 26,
  confidence: 0.6,
  recommendation: 'OVER',
  lineSource: 'ODDS_API',
  strategyVersion: '1',
  computedAt: 0,
  ...overrides,
});

describe('InMemorySharedStore', () => {
  it('should overwrite rows with the same business key', async () => {
    const store = new InMemorySharedStore();

    await store.upsertResults([row('a'), row('b')]);
    await store.upsertResults([row('a', { value: 31, batchId: 'b-2' })]);

    const rows = await store.findResults({ targetDate: '2026-03-14' });
    expect(rows).toHaveLength(2);
    expect(rows.find((r) => r.entityId === 'a')?.value).toBe(31);
  });

  it('should key a missing line separately from any real line', async () => {
    const store = new InMemorySharedStore();

    await store.upsertResults([row('a', { quotedLine: null }), row('a')]);

    expect(await store.countResultKeys([row('a', { quotedLine: null }), row('a'), row('z')])).toBe(2);
  });

  it('should hide voided rows unless asked', async () => {
    const store = new InMemorySharedStore();
    await store.upsertResults([row('a'), row('b')]);

    expect(await store.markVoided([row('a')], 'did not play')).toBe(1);
    expect(await store.markVoided([row('a')], 'did not play')).toBe(0);

    expect((await store.findResults({ targetDate: '2026-03-14' })).map((r) => r.entityId)).toEqual(['b']);
    const all = await store.findResults({ targetDate: '2026-03-14', includeVoided: true });
    expect(all.find((r) => r.entityId === 'a')).toMatchObject({ voided: true, voidReason: 'did not play' });
  });
});

describe('InMemoryStagingStore', () => {
  it('should replace an area as a whole', async () => {
    const store = new InMemoryStagingStore();

    await store.writeArea({ batchId: 'b-1', shardId: 's0', writtenAt: 1, rows: [row('a'), row('b')] });
    await store.writeArea({ batchId: 'b-1', shardId: 's0', writtenAt: 2, rows: [row('c')] });

    const areas = await store.listAreas('b-1');
    expect(areas).toHaveLength(1);
    expect(areas[0]?.rows.map((r) => r.entityId)).toEqual(['c']);
    expect(await store.deleteAreas('b-1', ['s0', 's9'])).toBe(1);
    expect(await store.listSummaries()).toEqual([]);
  });
});

describe('InMemoryBatchRepository', () => {
  const batch: WorkBatch = {
    batchId: 'b-1',
    targetDate: '2026-03-14',
    triggerSource: 'test',
    status: 'pending',
    expectedShards: 1,
    completedShards: 0,
    shards: [createShardState('s0', 0, entities(10))],
    deadlineAt: 0,
    createdAt: 0,
  };

  it('should apply a transition only from an expected status', async () => {
    const repo = new InMemoryBatchRepository();
    await repo.create(batch);

    expect(await repo.transition('b-1', ['dispatched'], 'consolidating')).toBeNull();
    expect((await repo.transition('b-1', ['pending'], 'dispatched'))?.status).toBe('dispatched');
    expect((await repo.findActiveByDate('2026-03-14'))?.batchId).toBe('b-1');
  });

  it('should compare-and-set shard updates', async () => {
    const repo = new InMemoryBatchRepository();
    await repo.create(batch);
    const shard = createShardState('s0', 0, entities(10));

    const first = await repo.saveShard('b-1', { ...shard, status: 'completed' }, ['pending', 'dispatched']);
    const second = await repo.saveShard('b-1', { ...shard, status: 'failed' }, ['pending', 'dispatched']);

    expect(first?.completedShards).toBe(1);
    expect(second).toBeNull();
  });
});

describe('InMemoryIdempotencyStore', () => {
  it('should forget records after their retention window', async () => {
    const store = new InMemoryIdempotencyStore();
    await store.save({ messageId: 'm-1', processedAt: 0, expiresAt: 100, outcome: 'success' });

    expect(await store.find('m-1', 99)).not.toBeNull();
    expect(await store.find('m-1', 100)).toBeNull();
    expect(await store.purgeExpired(100)).toBe(1);
    expect(await store.purgeExpired(100)).toBe(0);
  });
});
