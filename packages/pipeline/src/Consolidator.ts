import type { BusinessKey, ConsolidationMode, PredictionResult, WorkBatch } from '@predgrid/core';
import {
  BatchNotFoundError,
  BatchStatus,
  CONSOLIDATABLE_STATUSES,
  ShardStatus,
  allShardsCompleted,
  businessKeyOf,
  toBusinessKey,
} from '@predgrid/core';
import type { PipelineContext } from './PipelineContext.js';

export type ConsolidationOutcome = 'complete' | 'partial' | 'needs_review' | 'contended' | 'lease_lost' | 'skipped';

/** Result of one `consolidate()` call. */
export interface ConsolidationResult {
  readonly batchId: string;
  readonly outcome: ConsolidationOutcome;
  /** Rows written to the shared store. */
  readonly rowsMerged: number;
  /** Staged rows dropped by the Validation Gate on the way in. */
  readonly rejectedRows: number;
  readonly stagingAreasDeleted: number;
  readonly reason?: string;
}

const emptyResult = (batchId: string, outcome: ConsolidationOutcome, reason?: string): ConsolidationResult => ({
  batchId,
  outcome,
  rowsMerged: 0,
  rejectedRows: 0,
  stagingAreasDeleted: 0,
  reason,
});

/**
 * Single writer of finalized results.
 *
 * Merges every staging area of a batch into the shared store under the
 * `consolidation:<batchId>` lease. The merge is a keyed upsert, so repeating
 * it after a crash or lease expiry converges to the same store content.
 */
export class Consolidator {
  constructor(private readonly ctx: PipelineContext) {}

  async consolidate(batchId: string, mode: ConsolidationMode): Promise<ConsolidationResult> {
    const { locks, config, eventBus } = this.ctx;
    const acquired = await locks.acquire(`consolidation:${batchId}`, this.ctx.newId(), config.consolidationLeaseTtlMs);
    if (!acquired.acquired) {
      eventBus.emit({ type: 'consolidation:contended', batchId, heldBy: acquired.heldBy, timestamp: this.ctx.now() });
      return emptyResult(batchId, 'contended');
    }

    const lease = acquired.lease;
    try {
      const batch = await this.ctx.ports.batches.get(batchId);
      if (!batch) throw new BatchNotFoundError(batchId);
      if (!CONSOLIDATABLE_STATUSES.includes(batch.status)) {
        return emptyResult(batchId, 'skipped', `Batch is ${batch.status}`);
      }

      const merged = await this.merge(batch, mode);

      const renewed = await locks.renew(lease);
      if (!renewed.renewed) {
        eventBus.emit({ type: 'consolidation:lease_lost', batchId, timestamp: this.ctx.now() });
        return { ...emptyResult(batchId, 'lease_lost'), rowsMerged: merged.rows.length, rejectedRows: merged.rejected };
      }

      const verification = await this.verify(merged.rows, merged.stagedCount);
      if (!verification.ok) {
        return this.flagForReview(batch, merged, verification);
      }

      const stagingAreasDeleted = await this.ctx.ports.staging.deleteAreas(batchId, merged.shardIds);
      const target = allShardsCompleted(batch) ? BatchStatus.COMPLETE : BatchStatus.PARTIAL;
      if (batch.status !== target) {
        await this.ctx.transition(batch, target, {
          completedAt: this.ctx.now(),
          statusReason: target === BatchStatus.PARTIAL ? this.missingShardsReason(batch) : undefined,
        });
      }
      if (target === BatchStatus.PARTIAL) {
        await this.ctx.alert('batch_partial', 'warning', `Batch ${batchId} finalized without every shard`, {
          batchId,
          targetDate: batch.targetDate,
          completedShards: batch.completedShards,
          expectedShards: batch.expectedShards,
        });
      }

      eventBus.emit({
        type: 'consolidation:completed',
        batchId,
        mode,
        rowsMerged: merged.rows.length,
        stagingAreasDeleted,
        finalStatus: target,
        timestamp: this.ctx.now(),
      });
      return {
        batchId,
        outcome: target,
        rowsMerged: merged.rows.length,
        rejectedRows: merged.rejected,
        stagingAreasDeleted,
      };
    } finally {
      await locks.release(lease);
    }
  }

  /**
   * Delete staging areas whose batch is finalized (`complete` or `failed`) or
   * gone, once they are older than `maxAgeMs`.
   *
   * @returns Number of staging areas removed.
   */
  async purgeOrphanedStaging(maxAgeMs: number, now: number = this.ctx.now()): Promise<number> {
    const { batches, staging } = this.ctx.ports;
    const byBatch = new Map<string, string[]>();
    for (const summary of await staging.listSummaries()) {
      if (summary.writtenAt > now - maxAgeMs) continue;
      const shardIds = byBatch.get(summary.batchId) ?? [];
      shardIds.push(summary.shardId);
      byBatch.set(summary.batchId, shardIds);
    }

    let purged = 0;
    for (const [batchId, shardIds] of byBatch) {
      const batch = await batches.get(batchId);
      if (batch && batch.status !== BatchStatus.COMPLETE && batch.status !== BatchStatus.FAILED) continue;
      purged += await staging.deleteAreas(batchId, shardIds);
    }
    return purged;
  }

  private async merge(batch: WorkBatch, mode: ConsolidationMode): Promise<MergeSet> {
    const areas = await this.ctx.ports.staging.listAreas(batch.batchId);
    this.ctx.eventBus.emit({
      type: 'consolidation:started',
      batchId: batch.batchId,
      mode,
      stagingAreas: areas.length,
      timestamp: this.ctx.now(),
    });

    // staging was gated by the worker; gate again in case the rules changed since
    const byKey = new Map<string, PredictionResult>();
    let stagedCount = 0;
    let rejected = 0;
    for (const area of areas) {
      for (const row of area.rows) {
        const decision = this.ctx.gate.validate(row);
        if (!decision.ok) {
          rejected++;
          this.ctx.eventBus.emit({
            type: 'result:rejected',
            batchId: batch.batchId,
            shardId: area.shardId,
            businessKey: businessKeyOf(row),
            code: decision.code,
            reason: decision.reason,
            timestamp: this.ctx.now(),
          });
          continue;
        }
        stagedCount++;
        byKey.set(businessKeyOf(row), row);
      }
    }

    const rows = [...byKey.values()];
    if (rows.length > 0) {
      await this.ctx.withRetry('shared store upsert', this.ctx.config.retry.stagingWriteRetries, () =>
        this.ctx.ports.sharedStore.upsertResults(rows),
      );
    }
    return { rows, stagedCount, rejected, shardIds: areas.map((a) => a.shardId) };
  }

  private async verify(rows: readonly PredictionResult[], stagedCount: number): Promise<Verification> {
    if (rows.length !== stagedCount) {
      return {
        ok: false,
        expectedKeys: stagedCount,
        foundKeys: rows.length,
        reason: `Staging holds ${String(stagedCount)} valid rows but only ${String(rows.length)} distinct business keys`,
      };
    }
    const keys: BusinessKey[] = rows.map(toBusinessKey);
    const found = keys.length === 0 ? 0 : await this.ctx.ports.sharedStore.countResultKeys(keys);
    if (found !== keys.length) {
      return {
        ok: false,
        expectedKeys: keys.length,
        foundKeys: found,
        reason: `Shared store holds ${String(found)} of ${String(keys.length)} merged keys`,
      };
    }
    return { ok: true, expectedKeys: keys.length, foundKeys: found, reason: '' };
  }

  private async flagForReview(batch: WorkBatch, merged: MergeSet, verification: Verification): Promise<ConsolidationResult> {
    if (batch.status !== BatchStatus.NEEDS_REVIEW) {
      await this.ctx.transition(batch, BatchStatus.NEEDS_REVIEW, { statusReason: verification.reason });
    }
    this.ctx.eventBus.emit({
      type: 'consolidation:needs_review',
      batchId: batch.batchId,
      expectedKeys: verification.expectedKeys,
      foundKeys: verification.foundKeys,
      reason: verification.reason,
      timestamp: this.ctx.now(),
    });
    await this.ctx.alert('batch_needs_review', 'critical', `Batch ${batch.batchId} failed verification`, {
      batchId: batch.batchId,
      targetDate: batch.targetDate,
      expectedKeys: verification.expectedKeys,
      foundKeys: verification.foundKeys,
      reason: verification.reason,
    });
    return {
      batchId: batch.batchId,
      outcome: 'needs_review',
      rowsMerged: merged.rows.length,
      rejectedRows: merged.rejected,
      stagingAreasDeleted: 0,
      reason: verification.reason,
    };
  }

  private missingShardsReason(batch: WorkBatch): string {
    const missing = batch.shards.filter((s) => s.status !== ShardStatus.COMPLETED).map((s) => s.shardId);
    return `Missing shards: ${missing.join(', ')}`;
  }
}

interface MergeSet {
  readonly rows: readonly PredictionResult[];
  /** Valid staged rows before de-duplication by business key. */
  readonly stagedCount: number;
  readonly rejected: number;
  readonly shardIds: readonly string[];
}

interface Verification {
  readonly ok: boolean;
  readonly expectedKeys: number;
  readonly foundKeys: number;
  readonly reason: string;
}
