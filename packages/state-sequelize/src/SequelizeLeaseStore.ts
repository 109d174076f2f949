import { Op } from 'sequelize';
import type { LeaseRecord, LeaseStore } from '@predgrid/core';
import type { LeaseModel, LeaseRow } from './models/LeaseModel.js';
import { toEpoch } from './utils/columns.js';

function toRecord(row: LeaseRow): LeaseRecord {
  return {
    resourceKey: row.resourceKey,
    holderId: row.holderId,
    acquiredAt: toEpoch(row.acquiredAt),
    expiresAt: toEpoch(row.expiresAt),
  };
}

/**
 * Lease store on a relational table keyed by resource key.
 *
 * Create-if-absent is an expired-row delete followed by an insert that
 * ignores duplicates; the caller won if the row now carries its holder.
 */
export class SequelizeLeaseStore implements LeaseStore {
  constructor(private readonly Lease: LeaseModel) {}

  async createIfAbsent(record: LeaseRecord, now: number): Promise<boolean> {
    await this.Lease.destroy({ where: { resourceKey: record.resourceKey, expiresAt: { [Op.lte]: now } } });
    await this.Lease.bulkCreate([{ ...record }], { ignoreDuplicates: true });

    const current = await this.Lease.findByPk(record.resourceKey);
    if (!current) return false;
    const stored = toRecord(current.get({ plain: true }));
    return stored.holderId === record.holderId && stored.acquiredAt === record.acquiredAt;
  }

  async read(resourceKey: string, now: number): Promise<LeaseRecord | null> {
    const row = await this.Lease.findByPk(resourceKey);
    if (!row) return null;
    const record = toRecord(row.get({ plain: true }));
    return record.expiresAt > now ? record : null;
  }

  async extend(resourceKey: string, holderId: string, expiresAt: number, now: number): Promise<boolean> {
    const [affected] = await this.Lease.update(
      { expiresAt },
      { where: { resourceKey, holderId, expiresAt: { [Op.gt]: now } } },
    );
    return affected > 0;
  }

  async delete(resourceKey: string, holderId: string): Promise<boolean> {
    const deleted = await this.Lease.destroy({ where: { resourceKey, holderId } });
    return deleted > 0;
  }
}
