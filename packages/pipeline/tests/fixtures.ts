import type {
  EntityCandidate,
  EntityEventRef,
  EntitySource,
  FeatureSource,
  FeatureVector,
  Outcome,
  OutcomeFetchResult,
  OutcomeSource,
  PipelineConfigOverrides,
  PredictionStrategy,
  ShardMessage,
} from '@predgrid/core';
import {
  InMemoryAlertSink,
  InMemoryBatchRepository,
  InMemoryCircuitStateStore,
  InMemoryGradingStateStore,
  InMemoryIdempotencyStore,
  InMemoryLeaseStore,
  InMemorySharedStore,
  InMemoryStagingStore,
  InMemoryWorkQueue,
} from '@predgrid/core';
import { PredictionPipeline } from '../src/PredictionPipeline.js';
import type { PipelinePorts } from '../src/PipelineContext.js';
import type { ShardProcessResult } from '../src/ProcessShard.js';

export const TARGET_DATE = '2026-03-14';
export const LINE = 15.5;

export const entityId = (i: number): string => `ent-${String(i).padStart(3, '0')}`;
export const eventId = (i: number): string => `evt-${String(i).padStart(3, '0')}`;

export function makeCandidates(count: number): EntityCandidate[] {
  return Array.from({ length: count }, (_, i) => ({
    entityId: entityId(i),
    eventId: eventId(i),
    hasScheduledEvent: true,
    hasRequiredInputs: true,
    withdrawn: false,
    quotedLine: LINE,
    lineSource: 'ODDS_API',
  }));
}

export class StaticEntitySource implements EntitySource {
  constructor(public candidates: EntityCandidate[]) {}

  findCandidates(): Promise<readonly EntityCandidate[]> {
    return Promise.resolve(this.candidates);
  }
}

/**
 * Features keyed by entity id. Every entity gets `{ mean: 10 + (i % 9) }`
 * unless overridden or listed in `missing`.
 */
export class StaticFeatureSource implements FeatureSource {
  readonly calls: string[][] = [];
  readonly overrides = new Map<string, FeatureVector>();
  readonly missing = new Set<string>();
  /** Entity ids whose shard read fails. Shards without them read normally. */
  readonly failingFor = new Set<string>();
  failures = 0;

  loadFeatures(_targetDate: string, entityIds: readonly string[]): Promise<ReadonlyMap<string, FeatureVector>> {
    this.calls.push([...entityIds]);
    if (this.failures > 0 || entityIds.some((id) => this.failingFor.has(id))) {
      if (this.failures > 0) this.failures--;
      return Promise.reject(new Error('feature store unavailable'));
    }
    const map = new Map<string, FeatureVector>();
    for (const id of entityIds) {
      if (this.missing.has(id)) continue;
      map.set(id, this.overrides.get(id) ?? { mean: 10 + (Number(id.slice(4)) % 9) });
    }
    return Promise.resolve(map);
  }
}

export class StaticOutcomeSource implements OutcomeSource {
  readonly outcomes = new Map<string, Outcome>();
  readonly backfills: string[] = [];
  failure: string | null = null;

  set(outcome: Outcome): void {
    this.outcomes.set(`${outcome.entityId}|${outcome.eventId}`, outcome);
  }

  fetchOutcomes(_targetDate: string, refs: readonly EntityEventRef[]): Promise<OutcomeFetchResult> {
    if (this.failure !== null) return Promise.resolve({ ok: false, reason: this.failure });
    const found: Outcome[] = [];
    for (const ref of refs) {
      const outcome = this.outcomes.get(`${ref.entityId}|${ref.eventId}`);
      if (outcome) found.push(outcome);
    }
    return Promise.resolve({ ok: true, outcomes: found });
  }

  requestBackfill(targetDate: string): Promise<void> {
    this.backfills.push(targetDate);
    return Promise.resolve();
  }
}

/** Predicts the feature mean; OVER above the line, UNDER below, PASS without one. */
export const baseline: PredictionStrategy = {
  id: 'baseline',
  version: '1.0.0',
  predict: (features, context) => {
    const value = features.mean ?? 0;
    const recommendation = context.quotedLine === null ? 'PASS' : value > context.quotedLine ? 'OVER' : 'UNDER';
    return { value, confidence: 0.6, recommendation };
  },
};

/** Like `baseline`, one point higher and more confident. */
export const momentum: PredictionStrategy = {
  id: 'momentum',
  version: '2.1.0',
  predict: (features, context) => {
    const value = (features.mean ?? 0) + 1;
    const recommendation = context.quotedLine === null ? 'PASS' : value > context.quotedLine ? 'OVER' : 'UNDER';
    return { value, confidence: 0.75, recommendation };
  },
};

export interface Harness {
  readonly pipeline: PredictionPipeline;
  readonly ports: PipelinePorts;
  readonly queue: InMemoryWorkQueue;
  readonly alerts: InMemoryAlertSink;
  readonly batches: InMemoryBatchRepository;
  readonly staging: InMemoryStagingStore;
  readonly sharedStore: InMemorySharedStore;
  readonly entities: StaticEntitySource;
  readonly features: StaticFeatureSource;
  readonly outcomes: StaticOutcomeSource;
  readonly clock: { now: number };
  advance(ms: number): void;
  /** A second pipeline over the same ports and clock, as another process would run it. */
  another(): PredictionPipeline;
}

export interface HarnessOptions {
  readonly entityCount?: number;
  readonly strategies?: readonly PredictionStrategy[];
  readonly config?: PipelineConfigOverrides;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = { now: Date.UTC(2026, 2, 14, 6, 0, 0) };
  let nextId = 0;

  const queue = new InMemoryWorkQueue();
  const alerts = new InMemoryAlertSink();
  const batches = new InMemoryBatchRepository();
  const staging = new InMemoryStagingStore();
  const sharedStore = new InMemorySharedStore();
  const entities = new StaticEntitySource(makeCandidates(options.entityCount ?? 10));
  const features = new StaticFeatureSource();
  const outcomes = new StaticOutcomeSource();

  const ports: PipelinePorts = {
    leaseStore: new InMemoryLeaseStore(),
    batches,
    staging,
    sharedStore,
    idempotency: new InMemoryIdempotencyStore(),
    circuits: new InMemoryCircuitStateStore(),
    gradingStates: new InMemoryGradingStateStore(),
    workQueue: queue,
    entitySource: entities,
    featureSource: features,
    outcomeSource: outcomes,
    alertSink: alerts,
    strategies: options.strategies ?? [baseline, momentum],
  };

  const build = (prefix: string): PredictionPipeline =>
    new PredictionPipeline({
      ports,
      config: { shardSize: 5, ...options.config },
      now: () => clock.now,
      newId: () => {
        nextId++;
        return `${prefix}-${String(nextId)}`;
      },
      sleep: () => Promise.resolve(),
      random: () => 0,
    });
  const pipeline = build('id');
  let instances = 0;

  return {
    pipeline,
    ports,
    queue,
    alerts,
    batches,
    staging,
    sharedStore,
    entities,
    features,
    outcomes,
    clock,
    advance: (ms) => {
      clock.now += ms;
    },
    another: () => {
      instances++;
      return build(`p${String(instances)}`);
    },
  };
}

/** Deliver every queued message once, in publish order. */
export async function drain(pipeline: PredictionPipeline, queue: InMemoryWorkQueue): Promise<ShardProcessResult[]> {
  const results: ShardProcessResult[] = [];
  for (const message of queue.drain()) {
    results.push(await pipeline.processShard(message));
  }
  return results;
}

/** Deliver one message, returning the error instead of throwing it. */
export async function deliver(
  pipeline: PredictionPipeline,
  message: ShardMessage,
): Promise<ShardProcessResult | Error> {
  try {
    return await pipeline.processShard(message);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}
