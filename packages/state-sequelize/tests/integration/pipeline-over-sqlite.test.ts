import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { EntitySource, FeatureSource, FeatureVector, Outcome, OutcomeSource, PredictionStrategy } from '@predgrid/core';
import { AlreadyRunningError, BatchStatus, InMemoryAlertSink, InMemoryWorkQueue } from '@predgrid/core';
import { PredictionPipeline } from '@predgrid/pipeline';
import { T0, TARGET_DATE, openSqliteStore } from '../helpers.js';
import type { SqliteFixture } from '../helpers.js';

const ENTITY_COUNT = 7;
const LINE = 15.5;
const ids = Array.from({ length: ENTITY_COUNT }, (_, i) => i);

const entities: EntitySource = {
  findCandidates: () =>
    Promise.resolve(
      ids.map((i) => ({
        entityId: `ent-${String(i)}`,
        eventId: `evt-${String(i)}`,
        hasScheduledEvent: true,
        hasRequiredInputs: true,
        withdrawn: false,
        quotedLine: LINE,
        lineSource: 'ODDS_API',
      })),
    ),
};

const features: FeatureSource = {
  loadFeatures: (_date, entityIds) =>
    Promise.resolve(new Map<string, FeatureVector>(entityIds.map((id) => [id, { mean: 10 + Number(id.slice(4)) }]))),
};

/** Verified value 14 for everyone except `ent-4`, who did not play. */
const outcomes: OutcomeSource = {
  fetchOutcomes: (_date, refs) =>
    Promise.resolve({
      ok: true,
      outcomes: refs.map(
        (ref): Outcome =>
          ref.entityId === 'ent-4'
            ? { ...ref, status: 'void', value: null, reason: 'Scratched' }
            : { ...ref, status: 'verified', value: 14 },
      ),
    }),
  requestBackfill: () => Promise.resolve(),
};

const baseline: PredictionStrategy = {
  id: 'baseline',
  version: '1.0.0',
  predict: (vector, context) => {
    const value = vector.mean ?? 0;
    return { value, confidence: 0.6, recommendation: context.quotedLine !== null && value > context.quotedLine ? 'OVER' : 'UNDER' };
  },
};

describe('PredictionPipeline over SQLite', () => {
  let fixture: SqliteFixture;
  let queue: InMemoryWorkQueue;
  let pipeline: PredictionPipeline;

  beforeEach(async () => {
    fixture = await openSqliteStore();
    queue = new InMemoryWorkQueue();
    let nextId = 0;
    pipeline = new PredictionPipeline({
      ports: {
        ...fixture.store.ports(),
        workQueue: queue,
        entitySource: entities,
        featureSource: features,
        outcomeSource: outcomes,
        alertSink: new InMemoryAlertSink(),
        strategies: [baseline],
      },
      config: { shardSize: 3 },
      now: () => T0,
      newId: () => `id-${String(++nextId)}`,
      sleep: () => Promise.resolve(),
    });
  });

  afterEach(async () => {
    await fixture.close();
  });

  it('should run a batch to completion and grade it', async () => {
    const batchId = await pipeline.startBatch(TARGET_DATE, 'scheduler');
    const messages = queue.drain();
    expect(messages).toHaveLength(3);

    for (const message of messages) {
      expect((await pipeline.processShard(message)).status).toBe('success');
    }

    const status = await pipeline.getStatus(batchId);
    expect(status.status).toBe(BatchStatus.COMPLETE);
    expect(status.completedShards).toBe(3);
    expect(await fixture.store.staging.listSummaries()).toEqual([]);
    expect(await fixture.store.sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(ENTITY_COUNT);

    const graded = await pipeline.grade(TARGET_DATE);
    expect(graded).toMatchObject({ outcome: 'graded', graded: 6, voided: 1 });
    expect(await fixture.store.sharedStore.findResults({ targetDate: TARGET_DATE })).toHaveLength(6);
    expect(await fixture.store.gradingStates.get(TARGET_DATE)).toMatchObject({ status: 'graded' });
  });

  it('should ignore a redelivered message', async () => {
    await pipeline.startBatch(TARGET_DATE, 'scheduler');
    const [first] = queue.drain();
    if (!first) throw new Error('nothing published');

    await pipeline.processShard(first);
    const again = await pipeline.processShard(first);

    expect(again.status).toBe('duplicate');
    expect(await fixture.store.staging.listSummaries()).toHaveLength(1);
  });

  it('should refuse a second batch for a date with one still active', async () => {
    await pipeline.startBatch(TARGET_DATE, 'scheduler');

    await expect(pipeline.startBatch(TARGET_DATE, 'operator')).rejects.toBeInstanceOf(AlreadyRunningError);
  });
});
