import type { LogLevel } from '../domain/ports/Logger.js';
import { DEFAULT_ACCEPTED_LINE_SOURCES, DEFAULT_SENTINEL_VALUE } from '../domain/services/ValidationGate.js';
import { DEFAULT_TOLERANCE_BANDS } from '../domain/services/GradeCalculator.js';

export interface RetryConfig {
  readonly publishRetries: number;
  readonly stagingWriteRetries: number;
  readonly featureReadRetries: number;
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterRatio: number;
}

export interface CircuitBreakerConfig {
  readonly failureThreshold: number;
  readonly openDurationMs: number;
  readonly halfOpenSuccesses: number;
}

/** Runtime settings shared by every predgrid use case. */
export interface PipelineConfig {
  /** Entities per shard. */
  readonly shardSize: number;
  /** How long the Coordinator waits for shards before consolidating in partial mode. */
  readonly batchDeadlineMs: number;
  readonly startLeaseTtlMs: number;
  readonly consolidationLeaseTtlMs: number;
  readonly gradingLeaseTtlMs: number;
  /** Must exceed the longest redelivery delay of the work queue. */
  readonly idempotencyRetentionMs: number;
  readonly retry: RetryConfig;
  readonly circuitBreaker: CircuitBreakerConfig;
  readonly sentinelValue: number;
  readonly acceptedLineSources: readonly string[];
  readonly toleranceBands: readonly number[];
  readonly logLevel: LogLevel;
}

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export const defaultPipelineConfig: PipelineConfig = {
  shardSize: 100,
  batchDeadlineMs: 2 * HOUR,
  startLeaseTtlMs: 30_000,
  consolidationLeaseTtlMs: 5 * MINUTE,
  gradingLeaseTtlMs: 10 * MINUTE,
  idempotencyRetentionMs: 7 * 24 * HOUR,
  retry: {
    publishRetries: 3,
    stagingWriteRetries: 3,
    featureReadRetries: 2,
    minDelayMs: 200,
    maxDelayMs: 5_000,
    jitterRatio: 0.2,
  },
  circuitBreaker: {
    failureThreshold: 5,
    openDurationMs: 30 * MINUTE,
    halfOpenSuccesses: 2,
  },
  sentinelValue: DEFAULT_SENTINEL_VALUE,
  acceptedLineSources: DEFAULT_ACCEPTED_LINE_SOURCES,
  toleranceBands: DEFAULT_TOLERANCE_BANDS,
  logLevel: 'info',
};

/** Partial override of `PipelineConfig`, one level deep. */
export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'retry' | 'circuitBreaker'>> & {
  readonly retry?: Partial<RetryConfig>;
  readonly circuitBreaker?: Partial<CircuitBreakerConfig>;
};

export function resolvePipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  return {
    ...defaultPipelineConfig,
    ...overrides,
    retry: { ...defaultPipelineConfig.retry, ...overrides.retry },
    circuitBreaker: { ...defaultPipelineConfig.circuitBreaker, ...overrides.circuitBreaker },
  };
}

type Env = Readonly<Record<string, string | undefined>>;

const readInteger = (env: Env, name: string, min: number): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${String(min)}`);
  }
  return value;
};

const readNumber = (env: Env, name: string): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number. Received: ${raw}`);
  }
  return value;
};

const readList = (env: Env, name: string): string[] | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  const items = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
  if (items.length === 0) {
    throw new Error(`${name} must list at least one value`);
  }
  return items;
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const readLogLevel = (env: Env, name: string): LogLevel | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
  if (!level) {
    throw new Error(`${name} must be one of ${LOG_LEVELS.join(', ')}. Received: ${raw}`);
  }
  return level;
};

/**
 * Build a `PipelineConfig` from `PREDGRID_*` environment variables on top of
 * the defaults. Malformed values throw with the variable name.
 */
export const loadPipelineConfig = (env: Env = process.env): PipelineConfig => {
  const d = defaultPipelineConfig;
  const toleranceBands = readList(env, 'PREDGRID_TOLERANCE_BANDS')?.map((band) => {
    const value = Number(band);
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`PREDGRID_TOLERANCE_BANDS must list positive numbers. Received: ${band}`);
    }
    return value;
  });

  return {
    shardSize: readInteger(env, 'PREDGRID_SHARD_SIZE', 1) ?? d.shardSize,
    batchDeadlineMs: readInteger(env, 'PREDGRID_BATCH_DEADLINE_MS', 1) ?? d.batchDeadlineMs,
    startLeaseTtlMs: readInteger(env, 'PREDGRID_START_LEASE_TTL_MS', 1) ?? d.startLeaseTtlMs,
    consolidationLeaseTtlMs: readInteger(env, 'PREDGRID_CONSOLIDATION_LEASE_TTL_MS', 1) ?? d.consolidationLeaseTtlMs,
    gradingLeaseTtlMs: readInteger(env, 'PREDGRID_GRADING_LEASE_TTL_MS', 1) ?? d.gradingLeaseTtlMs,
    idempotencyRetentionMs: readInteger(env, 'PREDGRID_IDEMPOTENCY_RETENTION_MS', 1) ?? d.idempotencyRetentionMs,
    retry: {
      publishRetries: readInteger(env, 'PREDGRID_PUBLISH_RETRIES', 0) ?? d.retry.publishRetries,
      stagingWriteRetries: readInteger(env, 'PREDGRID_STAGING_WRITE_RETRIES', 0) ?? d.retry.stagingWriteRetries,
      featureReadRetries: readInteger(env, 'PREDGRID_FEATURE_READ_RETRIES', 0) ?? d.retry.featureReadRetries,
      minDelayMs: readInteger(env, 'PREDGRID_RETRY_MIN_DELAY_MS', 0) ?? d.retry.minDelayMs,
      maxDelayMs: readInteger(env, 'PREDGRID_RETRY_MAX_DELAY_MS', 0) ?? d.retry.maxDelayMs,
      jitterRatio: readNumber(env, 'PREDGRID_RETRY_JITTER_RATIO') ?? d.retry.jitterRatio,
    },
    circuitBreaker: {
      failureThreshold: readInteger(env, 'PREDGRID_CIRCUIT_FAILURE_THRESHOLD', 1) ?? d.circuitBreaker.failureThreshold,
      openDurationMs: readInteger(env, 'PREDGRID_CIRCUIT_OPEN_DURATION_MS', 1) ?? d.circuitBreaker.openDurationMs,
      halfOpenSuccesses:
        readInteger(env, 'PREDGRID_CIRCUIT_HALF_OPEN_SUCCESSES', 1) ?? d.circuitBreaker.halfOpenSuccesses,
    },
    sentinelValue: readNumber(env, 'PREDGRID_SENTINEL_VALUE') ?? d.sentinelValue,
    acceptedLineSources: readList(env, 'PREDGRID_ACCEPTED_LINE_SOURCES') ?? d.acceptedLineSources,
    toleranceBands: toleranceBands ?? d.toleranceBands,
    logLevel: readLogLevel(env, 'PREDGRID_LOG_LEVEL') ?? d.logLevel,
  };
};
