import { Op } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { BusinessKey, GradeRecord, PredictionResult, ResultQuery, SharedStore } from '@predgrid/core';
import { businessKeyOf } from '@predgrid/core';
import { RESULT_VALUE_FIELDS } from './models/resultColumns.js';
import type { PredictionModel } from './models/PredictionModel.js';
import { GRADE_VALUE_FIELDS } from './models/GradeModel.js';
import type { GradeModel } from './models/GradeModel.js';
import type { KeyColumns } from './mappers/ResultMapper.js';
import { storedKeyOf, toGradeRecord, toGradeRow, toKeyColumns, toPredictionResult, toResultRow } from './mappers/ResultMapper.js';

/** Rows per INSERT statement, below the bind-parameter limit of every dialect. */
const WRITE_CHUNK = 500;
/** Entity ids per `IN (...)` lookup. */
const LOOKUP_CHUNK = 500;

const KEY_ATTRIBUTES = ['entityId', 'eventId', 'strategyId', 'lineKey'];

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

const entityIdsOf = (keys: readonly BusinessKey[]): string[] => [...new Set(keys.map((k) => k.entityId))];

/** Last write wins within one call, as in a sequence of single-row upserts. */
function lastByKey<T extends BusinessKey>(rows: readonly T[]): T[] {
  const byKey = new Map<string, T>();
  for (const row of rows) byKey.set(businessKeyOf(row), row);
  return [...byKey.values()];
}

/**
 * Shared results and grades tables, both keyed by the business key.
 *
 * Upserts are multi-row `INSERT ... ON CONFLICT DO UPDATE` statements run in
 * one transaction, so a call either lands completely or not at all.
 */
export class SequelizeSharedStore implements SharedStore {
  constructor(
    private readonly sequelize: Sequelize,
    private readonly Prediction: PredictionModel,
    private readonly Grade: GradeModel,
  ) {}

  async upsertResults(rows: readonly PredictionResult[]): Promise<number> {
    if (rows.length === 0) return 0;
    const unique = lastByKey(rows).map(toResultRow);
    await this.sequelize.transaction(async (transaction) => {
      for (const part of chunk(unique, WRITE_CHUNK)) {
        await this.Prediction.bulkCreate(part, { updateOnDuplicate: [...RESULT_VALUE_FIELDS], transaction });
      }
    });
    return rows.length;
  }

  async countResultKeys(keys: readonly BusinessKey[]): Promise<number> {
    const wanted = new Set(keys.map(businessKeyOf));
    const found = await this.storedKeys(entityIdsOf(keys), async (ids) => {
      const rows = await this.Prediction.findAll({ attributes: KEY_ATTRIBUTES, where: { entityId: { [Op.in]: ids } } });
      return rows.map((r) => r.get({ plain: true }));
    });
    return [...wanted].filter((k) => found.has(k)).length;
  }

  async findResults(query: ResultQuery): Promise<readonly PredictionResult[]> {
    const rows = await this.Prediction.findAll({
      where: {
        targetDate: query.targetDate,
        ...(query.strategyIds === undefined ? {} : { strategyId: { [Op.in]: [...query.strategyIds] } }),
        ...(query.includeVoided === true ? {} : { voided: false }),
      },
      order: [
        ['entityId', 'ASC'],
        ['strategyId', 'ASC'],
        ['lineKey', 'ASC'],
      ],
    });
    return rows.map((r) => toPredictionResult(r.get({ plain: true })));
  }

  async markVoided(keys: readonly BusinessKey[], reason: string): Promise<number> {
    const unique = lastByKey(keys);
    if (unique.length === 0) return 0;
    return this.sequelize.transaction(async (transaction) => {
      let marked = 0;
      for (const key of unique) {
        const [affected] = await this.Prediction.update(
          { voided: true, voidReason: reason },
          { where: { ...toKeyColumns(key), voided: false }, transaction },
        );
        marked += affected;
      }
      return marked;
    });
  }

  async upsertGrades(grades: readonly GradeRecord[]): Promise<number> {
    if (grades.length === 0) return 0;
    const unique = lastByKey(grades).map(toGradeRow);
    await this.sequelize.transaction(async (transaction) => {
      for (const part of chunk(unique, WRITE_CHUNK)) {
        await this.Grade.bulkCreate(part, { updateOnDuplicate: [...GRADE_VALUE_FIELDS], transaction });
      }
    });
    return grades.length;
  }

  async countGradeKeys(keys: readonly BusinessKey[]): Promise<number> {
    const wanted = new Set(keys.map(businessKeyOf));
    const found = await this.storedKeys(entityIdsOf(keys), async (ids) => {
      const rows = await this.Grade.findAll({ attributes: KEY_ATTRIBUTES, where: { entityId: { [Op.in]: ids } } });
      return rows.map((r) => r.get({ plain: true }));
    });
    return [...wanted].filter((k) => found.has(k)).length;
  }

  async findGradedKeys(targetDate: string): Promise<ReadonlySet<string>> {
    const rows = await this.Grade.findAll({ attributes: KEY_ATTRIBUTES, where: { targetDate } });
    return new Set(rows.map((r) => storedKeyOf(r.get({ plain: true }))));
  }

  async findGrades(targetDate: string): Promise<readonly GradeRecord[]> {
    const rows = await this.Grade.findAll({
      where: { targetDate },
      order: [
        ['entityId', 'ASC'],
        ['strategyId', 'ASC'],
        ['lineKey', 'ASC'],
      ],
    });
    return rows.map((r) => toGradeRecord(r.get({ plain: true })));
  }

  /** Serialized keys of every stored row whose entity is one of `entityIds`. */
  private async storedKeys(
    entityIds: readonly string[],
    lookup: (ids: string[]) => Promise<readonly KeyColumns[]>,
  ): Promise<Set<string>> {
    const found = new Set<string>();
    for (const ids of chunk(entityIds, LOOKUP_CHUNK)) {
      for (const row of await lookup(ids)) found.add(storedKeyOf(row));
    }
    return found;
  }
}
