import type { BatchRepository, BatchTransitionPatch } from '../../domain/ports/BatchRepository.js';
import type { BatchStatus } from '../../domain/model/BatchStatus.js';
import { isActiveStatus } from '../../domain/model/BatchStatus.js';
import type { ShardStatus } from '../../domain/model/ShardStatus.js';
import type { ShardState, WorkBatch } from '../../domain/model/WorkBatch.js';
import { findShard, replaceShard } from '../../domain/model/WorkBatch.js';

/** Non-persistent batch repository with compare-and-set updates. */
export class InMemoryBatchRepository implements BatchRepository {
  private readonly batches = new Map<string, WorkBatch>();

  create(batch: WorkBatch): Promise<void> {
    if (this.batches.has(batch.batchId)) {
      return Promise.reject(new Error(`Batch ${batch.batchId} already exists`));
    }
    this.batches.set(batch.batchId, batch);
    return Promise.resolve();
  }

  get(batchId: string): Promise<WorkBatch | null> {
    return Promise.resolve(this.batches.get(batchId) ?? null);
  }

  findActiveByDate(targetDate: string): Promise<WorkBatch | null> {
    for (const batch of this.batches.values()) {
      if (batch.targetDate === targetDate && isActiveStatus(batch.status)) {
        return Promise.resolve(batch);
      }
    }
    return Promise.resolve(null);
  }

  findByStatus(statuses: readonly BatchStatus[]): Promise<readonly WorkBatch[]> {
    return Promise.resolve([...this.batches.values()].filter((b) => statuses.includes(b.status)));
  }

  transition(
    batchId: string,
    from: readonly BatchStatus[],
    to: BatchStatus,
    patch: BatchTransitionPatch = {},
  ): Promise<WorkBatch | null> {
    const current = this.batches.get(batchId);
    if (!current || !from.includes(current.status)) {
      return Promise.resolve(null);
    }
    const updated: WorkBatch = { ...current, ...patch, status: to };
    this.batches.set(batchId, updated);
    return Promise.resolve(updated);
  }

  saveShard(batchId: string, shard: ShardState, expected: readonly ShardStatus[]): Promise<WorkBatch | null> {
    const current = this.batches.get(batchId);
    const existing = current ? findShard(current, shard.shardId) : undefined;
    if (!current || !existing || !expected.includes(existing.status)) {
      return Promise.resolve(null);
    }
    const updated = replaceShard(current, shard);
    this.batches.set(batchId, updated);
    return Promise.resolve(updated);
  }
}
