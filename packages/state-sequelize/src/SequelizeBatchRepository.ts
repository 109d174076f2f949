import { Op } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { BatchRepository, BatchStatus, BatchTransitionPatch, ShardState, ShardStatus, WorkBatch } from '@predgrid/core';
import { ACTIVE_BATCH_STATUSES } from '@predgrid/core';
import type { BatchModel, BatchRow } from './models/BatchModel.js';
import type { ShardModel, ShardRow } from './models/ShardModel.js';
import { toBatchRow, toShardRow, toWorkBatch } from './mappers/BatchMapper.js';

/**
 * Batches and their shards in two tables. Status and shard updates are
 * conditional `UPDATE`s on the current status, so a lost race affects no row.
 */
export class SequelizeBatchRepository implements BatchRepository {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly Batch: BatchModel,
    private readonly Shard: ShardModel,
  ) {}

  async create(batch: WorkBatch): Promise<void> {
    await this.sequelize.transaction(async (transaction) => {
      await this.Batch.create(toBatchRow(batch), { transaction });
      await this.Shard.bulkCreate(
        batch.shards.map((s) => toShardRow(batch.batchId, s)),
        { transaction },
      );
    });
  }

  async get(batchId: string): Promise<WorkBatch | null> {
    const row = await this.Batch.findByPk(batchId);
    if (!row) return null;
    const shards = await this.Shard.findAll({ where: { batchId } });
    return toWorkBatch(
      row.get({ plain: true }),
      shards.map((s) => s.get({ plain: true })),
    );
  }

  async findActiveByDate(targetDate: string): Promise<WorkBatch | null> {
    const row = await this.Batch.findOne({
      where: { targetDate, status: { [Op.in]: [...ACTIVE_BATCH_STATUSES] } },
      order: [['createdAt', 'DESC']],
    });
    return row ? this.get(row.get({ plain: true }).batchId) : null;
  }

  async findByStatus(statuses: readonly BatchStatus[]): Promise<readonly WorkBatch[]> {
    const rows = await this.Batch.findAll({
      where: { status: { [Op.in]: [...statuses] } },
      order: [['createdAt', 'ASC']],
    });
    if (rows.length === 0) return [];

    const batchRows: BatchRow[] = rows.map((r) => r.get({ plain: true }));
    const shardRows = await this.Shard.findAll({ where: { batchId: { [Op.in]: batchRows.map((b) => b.batchId) } } });
    const byBatch = new Map<string, ShardRow[]>();
    for (const shard of shardRows) {
      const plain = shard.get({ plain: true });
      const list = byBatch.get(plain.batchId) ?? [];
      list.push(plain);
      byBatch.set(plain.batchId, list);
    }
    return batchRows.map((b) => toWorkBatch(b, byBatch.get(b.batchId) ?? []));
  }

  async transition(
    batchId: string,
    from: readonly BatchStatus[],
    to: BatchStatus,
    patch: BatchTransitionPatch = {},
  ): Promise<WorkBatch | null> {
    const values: Partial<BatchRow> = { status: to };
    if (patch.completedAt !== undefined) values.completedAt = patch.completedAt;
    if (patch.statusReason !== undefined) values.statusReason = patch.statusReason;

    const [affected] = await this.Batch.update(values, {
      where: { batchId, status: { [Op.in]: [...from] } },
    });
    return affected === 0 ? null : this.get(batchId);
  }

  async saveShard(batchId: string, shard: ShardState, expected: readonly ShardStatus[]): Promise<WorkBatch | null> {
    const { shardId: _shardId, batchId: _batchId, ...values } = toShardRow(batchId, shard);
    const [affected] = await this.Shard.update(values, {
      where: { shardId: shard.shardId, batchId, status: { [Op.in]: [...expected] } },
    });
    return affected === 0 ? null : this.get(batchId);
  }
}
