import type {
  BatchStatus as BatchStatusType,
  ConsolidationMode,
  ShardCompletionReport,
  ShardCounts,
  ShardMessage,
  ShardState,
  WorkBatch,
} from '@predgrid/core';
import {
  AlreadyRunningError,
  BatchNotFoundError,
  BatchStatus,
  RedispatchNotAllowedError,
  ShardNotFoundError,
  ShardSplitter,
  ShardStatus,
  allShardsCompleted,
  allShardsTerminal,
  countShards,
  createShardState,
  errorMessage,
  findShard,
  selectEligible,
} from '@predgrid/core';
import type { PipelineContext } from './PipelineContext.js';
import { Dependency } from './PipelineContext.js';
import type { ConsolidationResult, Consolidator } from './Consolidator.js';

/** Status of a batch as reported by `getStatus()`. */
export interface BatchStatusView {
  readonly batchId: string;
  readonly targetDate: string;
  readonly status: BatchStatusType;
  readonly expectedShards: number;
  readonly completedShards: number;
  readonly shardCounts: ShardCounts;
  readonly deadlineAt: number;
  readonly statusReason?: string;
  readonly shards: readonly ShardState[];
}

/** What a completion report changed. */
export interface ShardReportResult {
  /** `false` for a duplicate or late report that left the shard untouched. */
  readonly recorded: boolean;
  readonly shard: ShardState;
  /** Set when this report settled the last shard and triggered consolidation. */
  readonly consolidation: ConsolidationResult | null;
}

export type DeadlineAction = 'not_due' | 'consolidated' | 'skipped';

export interface DeadlineCheckResult {
  readonly batchId: string;
  readonly action: DeadlineAction;
  readonly consolidation: ConsolidationResult | null;
}

const DEADLINE_REASON = 'Deadline exceeded';

/**
 * Starts batches, tracks shard completion and hands finished batches to the
 * Consolidator. Stateless between calls: the `WorkBatch` is reloaded by id.
 */
export class Coordinator {
  private readonly splitter: ShardSplitter;

  constructor(
    private readonly ctx: PipelineContext,
    private readonly consolidator: Consolidator,
  ) {
    this.splitter = new ShardSplitter(ctx.config.shardSize);
  }

  /**
   * Create a batch for `targetDate` and publish one message per shard.
   *
   * @throws AlreadyRunningError when a batch for the date is pending,
   *   dispatched, consolidating or awaiting review, or another start for the
   *   date is in flight.
   */
  async startBatch(targetDate: string, triggerSource: string): Promise<string> {
    const { ports, config } = this.ctx;
    const started = await this.ctx.locks.withLease(
      `batch-start:${targetDate}`,
      this.ctx.newId(),
      config.startLeaseTtlMs,
      async () => {
        const active = await ports.batches.findActiveByDate(targetDate);
        if (active) throw new AlreadyRunningError(targetDate, active.batchId);
        return this.createBatch(targetDate, triggerSource);
      },
    );
    if (!started.acquired) {
      throw new AlreadyRunningError(targetDate, null);
    }

    const batch = started.value;
    if (batch.status === BatchStatus.FAILED) {
      return batch.batchId;
    }

    for (const shard of batch.shards) {
      await this.dispatch(batch, shard);
    }

    await this.afterShardsChanged(batch.batchId);
    return batch.batchId;
  }

  async getStatus(batchId: string): Promise<BatchStatusView> {
    const batch = await this.load(batchId);
    return {
      batchId: batch.batchId,
      targetDate: batch.targetDate,
      status: batch.status,
      expectedShards: batch.expectedShards,
      completedShards: batch.completedShards,
      shardCounts: countShards(batch.shards),
      deadlineAt: batch.deadlineAt,
      statusReason: batch.statusReason,
      shards: batch.shards,
    };
  }

  /**
   * Record a worker's completion report.
   *
   * A completed shard keeps its first report. A success arriving for a shard
   * already failed (e.g. by the deadline) is accepted, which lets a `partial`
   * batch become `complete`.
   */
  async recordShardCompletion(report: ShardCompletionReport): Promise<ShardReportResult> {
    const batch = await this.load(report.batchId);
    const shard = findShard(batch, report.shardId);
    if (!shard) throw new ShardNotFoundError(report.batchId, report.shardId);

    const succeeded = report.outcome !== 'failure';
    const next: ShardState = {
      ...shard,
      status: succeeded ? ShardStatus.COMPLETED : ShardStatus.FAILED,
      messageId: report.messageId,
      resultCount: report.resultCount,
      rejectedCount: report.rejectedCount,
      omittedCount: report.omittedCount,
      reason: report.reason,
      reportedAt: report.reportedAt,
    };
    const expected = succeeded
      ? [ShardStatus.PENDING, ShardStatus.DISPATCHED, ShardStatus.FAILED]
      : [ShardStatus.PENDING, ShardStatus.DISPATCHED];

    const updated = await this.ctx.ports.batches.saveShard(batch.batchId, next, expected);
    if (!updated) {
      this.ctx.eventBus.emit({
        type: 'shard:late_report',
        batchId: batch.batchId,
        shardId: shard.shardId,
        messageId: report.messageId,
        timestamp: this.ctx.now(),
      });
      return { recorded: false, shard, consolidation: null };
    }

    if (!succeeded) {
      await this.ctx.alert('shard_failed', 'warning', `Shard ${shard.shardId} failed`, {
        batchId: batch.batchId,
        shardId: shard.shardId,
        reason: report.reason,
      });
    }

    const consolidation = await this.afterShardsChanged(batch.batchId);
    return { recorded: true, shard: next, consolidation };
  }

  /**
   * Stop waiting for stragglers once the deadline passed: outstanding shards
   * are marked failed and the batch is consolidated in partial mode over
   * whatever staging exists. A batch with nothing completed and nothing
   * staged fails. A batch left `consolidating` by a crashed consolidation is
   * retried.
   */
  async checkDeadline(batchId: string, now: number = this.ctx.now()): Promise<DeadlineCheckResult> {
    const batch = await this.load(batchId);

    if (batch.status === BatchStatus.CONSOLIDATING) {
      const consolidation = await this.consolidator.consolidate(batchId, this.modeOf(batch));
      return { batchId, action: 'consolidated', consolidation };
    }
    if (batch.status === BatchStatus.PARTIAL && allShardsCompleted(batch)) {
      const consolidation = await this.consolidator.consolidate(batchId, 'full');
      return { batchId, action: 'consolidated', consolidation };
    }
    if (batch.status !== BatchStatus.DISPATCHED) {
      return { batchId, action: 'skipped', consolidation: null };
    }
    if (allShardsTerminal(batch)) {
      const consolidation = await this.afterShardsChanged(batchId);
      return { batchId, action: consolidation ? 'consolidated' : 'skipped', consolidation };
    }
    if (now < batch.deadlineAt) {
      return { batchId, action: 'not_due', consolidation: null };
    }
    if (batch.completedShards === 0 && (await this.ctx.ports.staging.listAreas(batchId)).length === 0) {
      await this.failOutstandingShards(batch);
      await this.fail(batch, `${DEADLINE_REASON} with no completed shard and no staging`);
      return { batchId, action: 'skipped', consolidation: null };
    }

    const consolidating = await this.ctx.transition(batch, BatchStatus.CONSOLIDATING, {
      statusReason: DEADLINE_REASON,
    });
    if (!consolidating) {
      return { batchId, action: 'skipped', consolidation: null };
    }

    const current = await this.failOutstandingShards(consolidating);
    this.ctx.eventBus.emit({
      type: 'batch:timed_out',
      batchId,
      completedShards: current.completedShards,
      expectedShards: current.expectedShards,
      timestamp: now,
    });
    const consolidation = await this.consolidator.consolidate(batchId, 'partial');
    return { batchId, action: 'consolidated', consolidation };
  }

  /**
   * Publish a failed or never-reported shard again under a fresh message id.
   *
   * @returns The new message id.
   */
  async redispatchShard(batchId: string, shardId: string): Promise<string> {
    const batch = await this.load(batchId);
    const shard = findShard(batch, shardId);
    if (!shard) throw new ShardNotFoundError(batchId, shardId);

    const allowed: readonly BatchStatusType[] = [BatchStatus.DISPATCHED, BatchStatus.PARTIAL, BatchStatus.NEEDS_REVIEW];
    if (!allowed.includes(batch.status)) {
      throw new RedispatchNotAllowedError(batchId, shardId, `batch is ${batch.status}`);
    }
    if (shard.status === ShardStatus.COMPLETED) {
      throw new RedispatchNotAllowedError(batchId, shardId, 'shard already completed');
    }

    const messageId = await this.dispatch(batch, shard);
    if (messageId === null) {
      throw new RedispatchNotAllowedError(batchId, shardId, 'publish failed');
    }
    return messageId;
  }

  /** Run `checkDeadline` for every batch that may need attention. */
  async sweepDeadlines(now: number = this.ctx.now()): Promise<readonly DeadlineCheckResult[]> {
    const batches = await this.ctx.ports.batches.findByStatus([
      BatchStatus.DISPATCHED,
      BatchStatus.CONSOLIDATING,
      BatchStatus.PARTIAL,
    ]);
    const results: DeadlineCheckResult[] = [];
    for (const batch of batches) {
      results.push(await this.checkDeadline(batch.batchId, now));
    }
    return results;
  }

  private async createBatch(targetDate: string, triggerSource: string): Promise<WorkBatch> {
    const { ports, config } = this.ctx;
    const candidates = await ports.entitySource.findCandidates(targetDate);
    const { eligible } = selectEligible(candidates);

    const batchId = this.ctx.newId();
    const now = this.ctx.now();
    const shards = [...this.splitter.split(eligible)].map(({ items, shardIndex }) =>
      createShardState(`${batchId}-s${String(shardIndex)}`, shardIndex, items),
    );
    const pending: WorkBatch = {
      batchId,
      targetDate,
      triggerSource,
      status: BatchStatus.PENDING,
      expectedShards: shards.length,
      completedShards: 0,
      shards,
      deadlineAt: now + config.batchDeadlineMs,
      createdAt: now,
    };
    await ports.batches.create(pending);

    this.ctx.eventBus.emit({
      type: 'batch:started',
      batchId,
      targetDate,
      triggerSource,
      entityCount: eligible.length,
      expectedShards: shards.length,
      timestamp: now,
    });

    if (eligible.length === 0) {
      const failed = await this.fail(pending, 'No eligible entities');
      return failed ?? pending;
    }

    const dispatched = await this.ctx.transition(pending, BatchStatus.DISPATCHED);
    return dispatched ?? pending;
  }

  /** Publish one shard. Returns the message id, or `null` when publishing gave up. */
  private async dispatch(batch: WorkBatch, shard: ShardState): Promise<string | null> {
    const { ports, config } = this.ctx;
    const messageId = this.ctx.newId();
    const attempts = shard.attempts + 1;
    const saved = await ports.batches.saveShard(
      batch.batchId,
      { ...shard, status: ShardStatus.DISPATCHED, messageId, attempts, reason: undefined },
      [shard.status],
    );
    if (!saved) {
      throw new RedispatchNotAllowedError(batch.batchId, shard.shardId, 'shard changed concurrently');
    }

    const message: ShardMessage = {
      messageId,
      publishedAt: this.ctx.now(),
      request: {
        batchId: batch.batchId,
        shardId: shard.shardId,
        shardIndex: shard.index,
        targetDate: batch.targetDate,
        entities: shard.entities,
        strategyIds: ports.strategies.map((s) => s.id),
      },
    };

    const breaker = this.ctx.breaker(Dependency.WORK_QUEUE);
    try {
      await this.ctx.withRetry('shard publish', config.retry.publishRetries, () =>
        breaker.execute(() => ports.workQueue.publish(message)),
      );
    } catch (error) {
      const reason = `Publish failed: ${errorMessage(error)}`;
      await ports.batches.saveShard(
        batch.batchId,
        { ...shard, status: ShardStatus.FAILED, messageId, attempts, reason },
        [ShardStatus.DISPATCHED],
      );
      this.ctx.eventBus.emit({
        type: 'shard:publish_failed',
        batchId: batch.batchId,
        shardId: shard.shardId,
        attempts,
        error: errorMessage(error),
        timestamp: this.ctx.now(),
      });
      await this.ctx.alert('shard_failed', 'warning', `Shard ${shard.shardId} could not be published`, {
        batchId: batch.batchId,
        shardId: shard.shardId,
        reason,
      });
      return null;
    }

    this.ctx.eventBus.emit({
      type: 'shard:dispatched',
      batchId: batch.batchId,
      shardId: shard.shardId,
      messageId,
      attempts,
      timestamp: this.ctx.now(),
    });
    return messageId;
  }

  /**
   * Once every shard is settled, consolidate the batch, or fail it when no
   * shard completed.
   */
  private async afterShardsChanged(batchId: string): Promise<ConsolidationResult | null> {
    const batch = await this.load(batchId);
    if (!allShardsTerminal(batch)) return null;

    if (batch.status === BatchStatus.DISPATCHED && batch.completedShards === 0) {
      await this.fail(batch, 'Every shard failed');
      return null;
    }
    if (batch.status === BatchStatus.DISPATCHED) {
      return this.beginConsolidation(batch);
    }
    if (batch.status === BatchStatus.PARTIAL && allShardsCompleted(batch)) {
      return this.consolidator.consolidate(batchId, 'full');
    }
    return null;
  }

  /** Move a dispatched batch to `consolidating`; only the invocation that wins the move consolidates. */
  private async beginConsolidation(batch: WorkBatch): Promise<ConsolidationResult | null> {
    const consolidating = await this.ctx.transition(batch, BatchStatus.CONSOLIDATING);
    if (!consolidating) return null;
    return this.consolidator.consolidate(batch.batchId, this.modeOf(consolidating));
  }

  private async fail(batch: WorkBatch, reason: string): Promise<WorkBatch | null> {
    const failed = await this.ctx.transition(batch, BatchStatus.FAILED, {
      statusReason: reason,
      completedAt: this.ctx.now(),
    });
    if (failed) {
      await this.ctx.alert('batch_failed', 'critical', `Batch ${batch.batchId} failed: ${reason}`, {
        batchId: batch.batchId,
        targetDate: batch.targetDate,
        reason,
      });
    }
    return failed;
  }

  private async failOutstandingShards(batch: WorkBatch): Promise<WorkBatch> {
    let current = batch;
    for (const shard of batch.shards) {
      if (shard.status !== ShardStatus.PENDING && shard.status !== ShardStatus.DISPATCHED) continue;
      const saved = await this.ctx.ports.batches.saveShard(
        batch.batchId,
        { ...shard, status: ShardStatus.FAILED, reason: DEADLINE_REASON },
        [shard.status],
      );
      if (saved) current = saved;
    }
    return current;
  }

  private modeOf(batch: WorkBatch): ConsolidationMode {
    return allShardsCompleted(batch) ? 'full' : 'partial';
  }

  private async load(batchId: string): Promise<WorkBatch> {
    const batch = await this.ctx.ports.batches.get(batchId);
    if (!batch) throw new BatchNotFoundError(batchId);
    return batch;
  }
}
