import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Sequelize } from 'sequelize';
import type { GradeRecord, PredictionResult, ShardEntity, WorkBatch } from '@predgrid/core';
import { BatchStatus, createShardState } from '@predgrid/core';
import { SQLite3Wrapper } from './better-sqlite3-adapter.js';
import { SequelizeStateStore } from '../src/SequelizeStateStore.js';
import type { SequelizeStateStoreOptions } from '../src/SequelizeStateStore.js';

export const T0 = Date.UTC(2026, 2, 14, 6, 0, 0);
export const TARGET_DATE = '2026-03-14';

export interface SqliteFixture {
  readonly sequelize: Sequelize;
  readonly store: SequelizeStateStore;
  close(): Promise<void>;
}

/** A fresh SQLite file with every table created. One pooled connection, as SQLite allows one writer. */
export async function openSqliteStore(options?: SequelizeStateStoreOptions): Promise<SqliteFixture> {
  const dbPath = path.join(os.tmpdir(), `predgrid-${String(Date.now())}-${String(Math.random()).slice(2)}.sqlite`);
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage: dbPath,
    logging: false,
    dialectModule: { Database: SQLite3Wrapper },
    pool: { max: 1, min: 1, idle: 30_000, acquire: 60_000, evict: 30_000 },
  });
  const store = new SequelizeStateStore(sequelize, options);
  await store.initialize();

  return {
    sequelize,
    store,
    close: async () => {
      await sequelize.close();
      fs.rmSync(dbPath, { force: true });
    },
  };
}

export const shardEntity = (i: number, quotedLine: number | null = 15.5): ShardEntity => ({
  entityId: `ent-${String(i)}`,
  eventId: `evt-${String(i)}`,
  quotedLine,
  lineSource: quotedLine === null ? null : 'ODDS_API',
});

/** Two shards: `s0` with entities 0 and 1, `s1` with entity 2. */
export function sampleBatch(batchId = 'batch-1', status: BatchStatus = BatchStatus.DISPATCHED): WorkBatch {
  const shards = [
    createShardState(`${batchId}-s0`, 0, [shardEntity(0), shardEntity(1)]),
    createShardState(`${batchId}-s1`, 1, [shardEntity(2, null)]),
  ];
  return {
    batchId,
    targetDate: TARGET_DATE,
    triggerSource: 'scheduler',
    status,
    expectedShards: shards.length,
    completedShards: 0,
    shards,
    deadlineAt: T0 + 2 * 60 * 60 * 1000,
    createdAt: T0,
  };
}

export function sampleResult(i: number, overrides: Partial<PredictionResult> = {}): PredictionResult {
  return {
    entityId: `ent-${String(i)}`,
    eventId: `evt-${String(i)}`,
    strategyId: 'baseline',
    quotedLine: 15.5,
    targetDate: TARGET_DATE,
    batchId: 'batch-1',
    value: 10 + i,
    confidence: 0.6,
    recommendation: 'UNDER',
    lineSource: 'ODDS_API',
    strategyVersion: '1.0.0',
    computedAt: T0 + 1_000,
    ...overrides,
  };
}

export function sampleGrade(i: number, overrides: Partial<GradeRecord> = {}): GradeRecord {
  return {
    entityId: `ent-${String(i)}`,
    eventId: `evt-${String(i)}`,
    strategyId: 'baseline',
    quotedLine: 15.5,
    gradingRunId: 'run-1',
    targetDate: TARGET_DATE,
    recommendation: 'UNDER',
    predictedValue: 10,
    actualValue: 16,
    absoluteError: 6,
    signedError: -6,
    withinTolerance: [
      { band: 3, within: false },
      { band: 5, within: false },
    ],
    predictedMargin: -5.5,
    actualMargin: 0.5,
    correct: false,
    confidenceDecile: 7,
    gradedAt: T0 + 86_400_000,
    ...overrides,
  };
}
