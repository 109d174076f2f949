import type {
  ConsolidationMode,
  DomainEvent,
  EventPayload,
  EventType,
  ShardCompletionReport,
  ShardMessage,
} from '@predgrid/core';
import { attachEventLogger } from '@predgrid/core';
import { PipelineContext } from './PipelineContext.js';
import type { PipelinePorts, PipelineRuntimeOptions } from './PipelineContext.js';
import { Coordinator } from './Coordinator.js';
import type { BatchStatusView, DeadlineCheckResult, ShardReportResult } from './Coordinator.js';
import { Consolidator } from './Consolidator.js';
import type { ConsolidationResult } from './Consolidator.js';
import { ProcessShard } from './ProcessShard.js';
import type { ShardProcessResult } from './ProcessShard.js';
import { GradingEngine } from './GradingEngine.js';
import type { GradingResult } from './GradingEngine.js';

/** Configuration for a `PredictionPipeline`: the ports plus runtime options. */
export interface PredictionPipelineConfig extends PipelineRuntimeOptions {
  readonly ports: PipelinePorts;
}

/**
 * Facade over the Coordinator, Worker, Consolidator and Grading Engine of
 * one process.
 *
 * Every handler is stateless: run the scheduler's `startBatch()`, each
 * queue delivery's `processShard()` and the periodic `sweepDeadlines()` in
 * as many processes as needed, against the same persistent ports.
 *
 * @example
 * ```typescript
 * // === Scheduler ===
 * const pipeline = new PredictionPipeline({ ports });
 * const batchId = await pipeline.startBatch('2026-03-14', 'nightly');
 *
 * // === Queue consumer ===
 * queue.consume(async (message) => {
 *   await pipeline.processShard(message); // throws on transient failure: nack for redelivery
 * });
 *
 * // === Every few minutes ===
 * await pipeline.sweepDeadlines();
 *
 * // === Next morning ===
 * await pipeline.grade('2026-03-14');
 * ```
 */
export class PredictionPipeline {
  private readonly ctx: PipelineContext;
  private readonly coordinator: Coordinator;
  private readonly consolidator: Consolidator;
  private readonly worker: ProcessShard;
  private readonly grading: GradingEngine;

  constructor(config: PredictionPipelineConfig) {
    const { ports, ...options } = config;
    this.ctx = new PipelineContext(ports, options);
    if (options.logger) {
      attachEventLogger(this.ctx.eventBus, options.logger);
    }
    this.consolidator = new Consolidator(this.ctx);
    this.coordinator = new Coordinator(this.ctx, this.consolidator);
    this.worker = new ProcessShard(this.ctx, {
      report: async (report) => {
        await this.coordinator.recordShardCompletion(report);
      },
    });
    this.grading = new GradingEngine(this.ctx);
  }

  /** Start the batch of `targetDate`. Throws `AlreadyRunningError` while one is active. */
  startBatch(targetDate: string, triggerSource: string): Promise<string> {
    return this.coordinator.startBatch(targetDate, triggerSource);
  }

  getStatus(batchId: string): Promise<BatchStatusView> {
    return this.coordinator.getStatus(batchId);
  }

  /** Handle one work-queue delivery. */
  processShard(message: ShardMessage): Promise<ShardProcessResult> {
    return this.worker.execute(message);
  }

  /** Completion channel for workers running in another process. */
  recordShardCompletion(report: ShardCompletionReport): Promise<ShardReportResult> {
    return this.coordinator.recordShardCompletion(report);
  }

  checkDeadline(batchId: string, now?: number): Promise<DeadlineCheckResult> {
    return this.coordinator.checkDeadline(batchId, now);
  }

  sweepDeadlines(now?: number): Promise<readonly DeadlineCheckResult[]> {
    return this.coordinator.sweepDeadlines(now);
  }

  /** Manual backfill of a failed or missing shard. Returns the new message id. */
  redispatchShard(batchId: string, shardId: string): Promise<string> {
    return this.coordinator.redispatchShard(batchId, shardId);
  }

  /** Run a consolidation directly, e.g. after repairing a `needs_review` batch. */
  consolidate(batchId: string, mode: ConsolidationMode = 'full'): Promise<ConsolidationResult> {
    return this.consolidator.consolidate(batchId, mode);
  }

  purgeOrphanedStaging(maxAgeMs: number, now?: number): Promise<number> {
    return this.consolidator.purgeOrphanedStaging(maxAgeMs, now);
  }

  purgeIdempotency(now?: number): Promise<number> {
    return this.worker.purgeIdempotency(now);
  }

  /** Grade the stored predictions of `targetDate`, optionally for some strategies only. */
  grade(targetDate: string, strategyIds?: readonly string[]): Promise<GradingResult> {
    return this.grading.trigger(targetDate, strategyIds);
  }

  /** Subscribe to a specific domain event type. Events are local to this process. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}
