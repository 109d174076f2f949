import { Op } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { StagingArea, StagingAreaSummary, StagingStore } from '@predgrid/core';
import type { StagingAreaModel, StagingAreaRow, StagingRowModel } from './models/StagingModel.js';
import { toPredictionResult, toResultRow } from './mappers/ResultMapper.js';
import { toEpoch } from './utils/columns.js';

function toSummary(row: StagingAreaRow): StagingAreaSummary {
  return {
    batchId: row.batchId,
    shardId: row.shardId,
    writtenAt: toEpoch(row.writtenAt),
    rowCount: row.rowCount,
  };
}

/** Staging areas as a header table plus their rows; every write replaces an area in one transaction. */
export class SequelizeStagingStore implements StagingStore {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly Area: StagingAreaModel,
    private readonly Row: StagingRowModel,
  ) {}

  async writeArea(area: StagingArea): Promise<void> {
    const { batchId, shardId } = area;
    await this.sequelize.transaction(async (transaction) => {
      await this.Row.destroy({ where: { batchId, shardId }, transaction });
      await this.Area.destroy({ where: { batchId, shardId }, transaction });
      await this.Area.create({ batchId, shardId, writtenAt: area.writtenAt, rowCount: area.rows.length }, { transaction });
      if (area.rows.length > 0) {
        await this.Row.bulkCreate(
          area.rows.map((r) => ({ ...toResultRow(r), shardId })),
          { transaction },
        );
      }
    });
  }

  async listAreas(batchId: string): Promise<readonly StagingArea[]> {
    const areas = await this.Area.findAll({ where: { batchId }, order: [['shardId', 'ASC']] });
    const rows = await this.Row.findAll({ where: { batchId }, order: [['id', 'ASC']] });

    const byShard = new Map<string, StagingArea['rows'][number][]>();
    for (const row of rows) {
      const plain = row.get({ plain: true });
      const list = byShard.get(plain.shardId) ?? [];
      list.push(toPredictionResult(plain));
      byShard.set(plain.shardId, list);
    }

    return areas.map((a) => {
      const summary = toSummary(a.get({ plain: true }));
      return {
        batchId: summary.batchId,
        shardId: summary.shardId,
        writtenAt: summary.writtenAt,
        rows: byShard.get(summary.shardId) ?? [],
      };
    });
  }

  async deleteAreas(batchId: string, shardIds: readonly string[]): Promise<number> {
    if (shardIds.length === 0) return 0;
    return this.sequelize.transaction(async (transaction) => {
      const where = { batchId, shardId: { [Op.in]: [...shardIds] } };
      await this.Row.destroy({ where, transaction });
      return this.Area.destroy({ where, transaction });
    });
  }

  async listSummaries(): Promise<readonly StagingAreaSummary[]> {
    const areas = await this.Area.findAll({ order: [['writtenAt', 'ASC']] });
    return areas.map((a) => toSummary(a.get({ plain: true })));
  }
}
