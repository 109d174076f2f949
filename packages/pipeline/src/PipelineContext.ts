import type {
  AlertKind,
  AlertSeverity,
  AlertSink,
  BatchRepository,
  BatchStatus,
  BatchTransitionPatch,
  CircuitStateStore,
  EntitySource,
  FeatureSource,
  GradingStateStore,
  IdempotencyStore,
  LeaseStore,
  Logger,
  OutcomeSource,
  PipelineConfig,
  PipelineConfigOverrides,
  PredictionStrategy,
  SharedStore,
  StagingStore,
  WorkBatch,
  WorkQueue,
} from '@predgrid/core';
import {
  CircuitBreaker,
  EventBus,
  InvalidTransitionError,
  LockManager,
  ValidationGate,
  canTransition,
  errorMessage,
  isTransient,
  resolvePipelineConfig,
  retry,
  silentLogger,
  sleep,
} from '@predgrid/core';

/** Every collaborator a predgrid deployment is wired to. */
export interface PipelinePorts {
  readonly leaseStore: LeaseStore;
  readonly batches: BatchRepository;
  readonly staging: StagingStore;
  readonly sharedStore: SharedStore;
  readonly idempotency: IdempotencyStore;
  readonly circuits: CircuitStateStore;
  readonly gradingStates: GradingStateStore;
  readonly workQueue: WorkQueue;
  readonly entitySource: EntitySource;
  readonly featureSource: FeatureSource;
  readonly outcomeSource: OutcomeSource;
  readonly alertSink: AlertSink;
  readonly strategies: readonly PredictionStrategy[];
}

export interface PipelineRuntimeOptions {
  readonly config?: PipelineConfigOverrides;
  readonly eventBus?: EventBus;
  readonly logger?: Logger;
  /** Clock in epoch ms. Default: `Date.now`. */
  readonly now?: () => number;
  /** Id source for batches, shards, messages, lease holders and grading runs. */
  readonly newId?: () => string;
  /** Wait used between retries. Tests pass a no-op. */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Randomness for retry jitter. Default: `Math.random`. */
  readonly random?: () => number;
}

/** Downstream dependencies guarded by a circuit breaker. */
export const Dependency = {
  WORK_QUEUE: 'work-queue',
  FEATURE_STORE: 'feature-store',
  OUTCOME_SOURCE: 'outcome-source',
} as const;

export type Dependency = (typeof Dependency)[keyof typeof Dependency];

/**
 * Ports plus runtime settings shared by the use cases of one process.
 *
 * Holds no batch state: every use case reloads what it needs by id.
 */
export class PipelineContext {
  readonly config: PipelineConfig;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  readonly now: () => number;
  readonly newId: () => string;
  readonly locks: LockManager;
  readonly gate: ValidationGate;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    readonly ports: PipelinePorts,
    options: PipelineRuntimeOptions = {},
  ) {
    this.config = resolvePipelineConfig(options.config);
    const logger = options.logger ?? silentLogger;
    this.logger = logger;
    this.eventBus =
      options.eventBus ??
      new EventBus({
        onHandlerError: (error, event) =>
          logger.warn('Event handler failed', { event: event.type, error: errorMessage(error) }),
      });
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? (() => crypto.randomUUID());
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.locks = new LockManager(ports.leaseStore, { now: this.now });
    this.gate = new ValidationGate({
      sentinelValue: this.config.sentinelValue,
      acceptedLineSources: this.config.acceptedLineSources,
    });
  }

  /** Breaker for `dependency`. State lives in the circuit store, so instances are cheap. */
  breaker(dependency: Dependency): CircuitBreaker {
    return new CircuitBreaker(dependency, this.ports.circuits, {
      ...this.config.circuitBreaker,
      now: this.now,
      eventBus: this.eventBus,
    });
  }

  /** Run `fn`, retrying transient failures with backoff and jitter. */
  withRetry<T>(operation: string, retries: number, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      retries,
      minDelayMs: this.config.retry.minDelayMs,
      maxDelayMs: this.config.retry.maxDelayMs,
      jitterRatio: this.config.retry.jitterRatio,
      randomFn: this.random,
      sleepFn: this.sleep,
      shouldRetry: isTransient,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.eventBus.emit({
          type: 'operation:retried',
          operation,
          attempt,
          maxAttempts,
          delayMs,
          error: errorMessage(error),
          timestamp: this.now(),
        });
      },
      onGiveUp: ({ attempt, error }) => {
        this.logger.error(`${operation} failed`, { attempts: attempt, error: errorMessage(error) });
      },
    });
  }

  /** Hand an alert to the alert sink. A failing sink is logged and does not fail the caller. */
  async alert(
    kind: AlertKind,
    severity: AlertSeverity,
    message: string,
    context: Readonly<Record<string, unknown>>,
  ): Promise<void> {
    try {
      await this.ports.alertSink.send({ kind, severity, message, context, timestamp: this.now() });
    } catch (error) {
      this.logger.error('Alert delivery failed', { kind, message, error: errorMessage(error) });
    }
  }

  /**
   * Move `batch` from the status it was read with to `to`.
   *
   * @returns The updated batch, or `null` when another invocation changed the status first.
   */
  async transition(batch: WorkBatch, to: BatchStatus, patch?: BatchTransitionPatch): Promise<WorkBatch | null> {
    if (!canTransition(batch.status, to)) {
      throw new InvalidTransitionError(batch.batchId, batch.status, to);
    }
    const updated = await this.ports.batches.transition(batch.batchId, [batch.status], to, patch);
    if (updated) {
      this.eventBus.emit({
        type: 'batch:status_changed',
        batchId: batch.batchId,
        from: batch.status,
        to,
        reason: patch?.statusReason,
        timestamp: this.now(),
      });
    }
    return updated;
  }
}
