import type {
  CompletionReporter,
  FeatureVector,
  PredictionRequest,
  PredictionResult,
  PredictionStrategy,
  RejectionCode,
  ShardMessage,
  ShardOutcome,
  StrategyOutput,
} from '@predgrid/core';
import { FatalShardError, PredgridError, TransientInfraError, businessKeyOf, errorMessage } from '@predgrid/core';
import type { PipelineContext } from './PipelineContext.js';
import { Dependency } from './PipelineContext.js';

/** How a delivered message was settled. `duplicate` means it had already been processed. */
export type ShardProcessStatus = ShardOutcome | 'duplicate';

export interface ShardProcessResult {
  readonly messageId: string;
  readonly status: ShardProcessStatus;
  readonly resultCount: number;
  readonly rejectedCount: number;
  /** Entity/strategy pairs without a result: missing features or a throwing strategy. */
  readonly omittedCount: number;
  readonly reason?: string;
}

interface Rejection {
  readonly result: PredictionResult;
  readonly businessKey: string;
  readonly code: RejectionCode;
  readonly reason: string;
}

interface ComputedShard {
  readonly rows: readonly PredictionResult[];
  readonly rejections: readonly Rejection[];
  readonly omittedCount: number;
}

const NOTHING_COMPUTED: ComputedShard = { rows: [], rejections: [], omittedCount: 0 };

/**
 * Worker use case: compute one shard and stage its results.
 *
 * Safe under at-least-once delivery. A message id already recorded in the
 * idempotency store is acknowledged without work, and the staging write
 * replaces the whole area, so a recomputation lands on the same content.
 *
 * Transient failures that survive the local retries are rethrown so the
 * queue redelivers the message; nothing is recorded for it.
 */
export class ProcessShard {
  constructor(
    private readonly ctx: PipelineContext,
    private readonly reporter: CompletionReporter,
  ) {}

  async execute(message: ShardMessage): Promise<ShardProcessResult> {
    const { ports, eventBus } = this.ctx;
    const { messageId, request } = message;

    if (await ports.idempotency.find(messageId, this.ctx.now())) {
      eventBus.emit({ type: 'shard:duplicate', messageId, timestamp: this.ctx.now() });
      return { messageId, status: 'duplicate', resultCount: 0, rejectedCount: 0, omittedCount: 0 };
    }

    let strategies: readonly PredictionStrategy[];
    try {
      strategies = this.resolveRequest(request);
    } catch (error) {
      if (!(error instanceof FatalShardError)) throw error;
      return this.settle(message, 'failure', NOTHING_COMPUTED, error.message);
    }

    eventBus.emit({
      type: 'shard:started',
      batchId: request.batchId,
      shardId: request.shardId,
      messageId,
      entityCount: request.entities.length,
      timestamp: this.ctx.now(),
    });

    const features = await this.loadFeatures(request);
    const computed = this.compute(request, strategies, features);
    for (const rejection of computed.rejections) {
      await this.ctx.alert('result_rejected', 'warning', rejection.reason, {
        batchId: request.batchId,
        shardId: request.shardId,
        businessKey: rejection.businessKey,
        code: rejection.code,
        value: rejection.result.value,
        confidence: rejection.result.confidence,
        quotedLine: rejection.result.quotedLine,
        lineSource: rejection.result.lineSource,
        strategyVersion: rejection.result.strategyVersion,
      });
    }
    await this.stage(request, computed.rows);

    const outcome: ShardOutcome = computed.rejections.length + computed.omittedCount === 0 ? 'success' : 'partial';
    return this.settle(message, outcome, computed);
  }

  /** Drop idempotency records past their retention window. */
  async purgeIdempotency(now: number = this.ctx.now()): Promise<number> {
    return this.ctx.ports.idempotency.purgeExpired(now);
  }

  /** Reject requests no retry could fix. */
  private resolveRequest(request: PredictionRequest): readonly PredictionStrategy[] {
    const context = { batchId: request.batchId, shardId: request.shardId };
    if (!request.batchId || !request.shardId || !request.targetDate) {
      throw new FatalShardError('Malformed request: missing batch, shard or date', context);
    }
    if (request.entities.length === 0) {
      throw new FatalShardError('Malformed request: no entities', context);
    }
    const ids = new Set(request.entities.map((e) => e.entityId));
    if (ids.size !== request.entities.length) {
      throw new FatalShardError('Malformed request: duplicate entity ids', context);
    }
    if (request.strategyIds.length === 0) {
      throw new FatalShardError('Malformed request: no strategies', context);
    }

    return request.strategyIds.map((id) => {
      const strategy = this.ctx.ports.strategies.find((s) => s.id === id);
      if (!strategy) throw new FatalShardError(`Unknown strategy: ${id}`, { ...context, strategyId: id });
      return strategy;
    });
  }

  /** One batched read for the whole shard. */
  private async loadFeatures(request: PredictionRequest): Promise<ReadonlyMap<string, FeatureVector>> {
    const breaker = this.ctx.breaker(Dependency.FEATURE_STORE);
    const entityIds = request.entities.map((e) => e.entityId);
    try {
      return await this.ctx.withRetry('feature read', this.ctx.config.retry.featureReadRetries, () =>
        breaker.execute(() => this.ctx.ports.featureSource.loadFeatures(request.targetDate, entityIds)),
      );
    } catch (error) {
      throw new TransientInfraError(
        `Feature read failed for shard ${request.shardId}`,
        { batchId: request.batchId, shardId: request.shardId },
        { cause: error },
      );
    }
  }

  private compute(
    request: PredictionRequest,
    strategies: readonly PredictionStrategy[],
    features: ReadonlyMap<string, FeatureVector>,
  ): ComputedShard {
    const { eventBus, gate } = this.ctx;
    const rows: PredictionResult[] = [];
    const rejections: Rejection[] = [];
    let omittedCount = 0;

    const omit = (entityId: string, strategyId: string, reason: string): void => {
      omittedCount++;
      eventBus.emit({
        type: 'entity:omitted',
        batchId: request.batchId,
        shardId: request.shardId,
        entityId,
        strategyId,
        reason,
        timestamp: this.ctx.now(),
      });
    };

    for (const entity of request.entities) {
      const vector = features.get(entity.entityId);
      for (const strategy of strategies) {
        if (!vector) {
          omit(entity.entityId, strategy.id, 'Missing features');
          continue;
        }

        let output: StrategyOutput;
        try {
          output = strategy.predict(vector, {
            entityId: entity.entityId,
            eventId: entity.eventId,
            quotedLine: entity.quotedLine,
          });
        } catch (error) {
          omit(entity.entityId, strategy.id, `Strategy failed: ${errorMessage(error)}`);
          continue;
        }

        const result: PredictionResult = {
          entityId: entity.entityId,
          eventId: entity.eventId,
          strategyId: strategy.id,
          quotedLine: entity.quotedLine,
          targetDate: request.targetDate,
          batchId: request.batchId,
          value: output.value,
          confidence: output.confidence,
          recommendation: output.recommendation,
          lineSource: entity.lineSource,
          strategyVersion: strategy.version,
          computedAt: this.ctx.now(),
        };

        const decision = gate.validate(result);
        if (!decision.ok) {
          const businessKey = businessKeyOf(result);
          rejections.push({ result, businessKey, code: decision.code, reason: decision.reason });
          eventBus.emit({
            type: 'result:rejected',
            batchId: request.batchId,
            shardId: request.shardId,
            businessKey,
            code: decision.code,
            reason: decision.reason,
            timestamp: this.ctx.now(),
          });
          continue;
        }
        rows.push(result);
      }
    }

    return { rows, rejections, omittedCount };
  }

  /** Replace the shard's staging area in one write, retrying the whole write. */
  private async stage(request: PredictionRequest, rows: readonly PredictionResult[]): Promise<void> {
    let attempts = 0;
    try {
      await this.ctx.withRetry('staging write', this.ctx.config.retry.stagingWriteRetries, () => {
        attempts++;
        return this.ctx.ports.staging.writeArea({
          batchId: request.batchId,
          shardId: request.shardId,
          writtenAt: this.ctx.now(),
          rows,
        });
      });
    } catch (error) {
      throw new TransientInfraError(
        `Staging write failed for shard ${request.shardId}`,
        { batchId: request.batchId, shardId: request.shardId, attempts },
        { cause: error },
      );
    }

    this.ctx.eventBus.emit({
      type: 'shard:staged',
      batchId: request.batchId,
      shardId: request.shardId,
      rowCount: rows.length,
      attempts,
      timestamp: this.ctx.now(),
    });
  }

  /**
   * Report to the Coordinator, then remember the message id. A report the
   * Coordinator refuses outright (unknown batch or shard) is logged; the
   * message is still recorded so it is not redelivered forever.
   */
  private async settle(
    message: ShardMessage,
    outcome: ShardOutcome,
    computed: ComputedShard,
    reason?: string,
  ): Promise<ShardProcessResult> {
    const { ports, config } = this.ctx;
    const { messageId, request } = message;
    const now = this.ctx.now();

    const rejectedCount = computed.rejections.length;

    try {
      await this.ctx.withRetry('completion report', config.retry.publishRetries, () =>
        this.reporter.report({
          batchId: request.batchId,
          shardId: request.shardId,
          messageId,
          outcome,
          resultCount: computed.rows.length,
          rejectedCount,
          omittedCount: computed.omittedCount,
          reason,
          reportedAt: now,
        }),
      );
    } catch (error) {
      if (!(error instanceof PredgridError) || error.category !== 'fatal') throw error;
      this.ctx.logger.error('Completion report refused', { messageId, error: error.message });
    }
    await ports.idempotency.save({
      messageId,
      processedAt: now,
      expiresAt: now + config.idempotencyRetentionMs,
      outcome,
    });

    this.ctx.eventBus.emit({
      type: 'shard:completed',
      batchId: request.batchId,
      shardId: request.shardId,
      outcome,
      resultCount: computed.rows.length,
      rejectedCount,
      omittedCount: computed.omittedCount,
      reason,
      timestamp: now,
    });
    return {
      messageId,
      status: outcome,
      resultCount: computed.rows.length,
      rejectedCount,
      omittedCount: computed.omittedCount,
      reason,
    };
  }
}
