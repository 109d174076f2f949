import { Op } from 'sequelize';
import type { IdempotencyRecord, IdempotencyStore } from '@predgrid/core';
import type { IdempotencyModel } from './models/OperationalModels.js';
import { toEpoch } from './utils/columns.js';

export class SequelizeIdempotencyStore implements IdempotencyStore {
  constructor(private readonly Idempotency: IdempotencyModel) {}

  async find(messageId: string, now: number): Promise<IdempotencyRecord | null> {
    const row = await this.Idempotency.findOne({ where: { messageId, expiresAt: { [Op.gt]: now } } });
    if (!row) return null;
    const plain = row.get({ plain: true });
    return {
      messageId: plain.messageId,
      processedAt: toEpoch(plain.processedAt),
      expiresAt: toEpoch(plain.expiresAt),
      outcome: plain.outcome,
    };
  }

  async save(record: IdempotencyRecord): Promise<void> {
    await this.Idempotency.upsert({ ...record });
  }

  async purgeExpired(now: number): Promise<number> {
    return this.Idempotency.destroy({ where: { expiresAt: { [Op.lte]: now } } });
  }
}
