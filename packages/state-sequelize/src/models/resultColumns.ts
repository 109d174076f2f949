import { DataTypes } from 'sequelize';

/** Columns of a stored prediction result, as written by the pipeline. */
export interface ResultRow {
  entityId: string;
  eventId: string;
  strategyId: string;
  /** `quotedLine` as text, `-1` when there is none, so the key never holds a NULL. */
  lineKey: string;
  quotedLine: number | null;
  targetDate: string;
  batchId: string;
  value: number;
  confidence: number;
  recommendation: string;
  lineSource: string | null;
  strategyVersion: string;
  computedAt: number | string;
  voided: boolean;
  voidReason: string | null;
}

/** Business key columns. Primary key of the results and grades tables. */
export const keyColumns = (primaryKey: boolean) => ({
  entityId: { type: DataTypes.STRING(64), allowNull: false, primaryKey },
  eventId: { type: DataTypes.STRING(64), allowNull: false, primaryKey },
  strategyId: { type: DataTypes.STRING(64), allowNull: false, primaryKey },
  lineKey: { type: DataTypes.STRING(32), allowNull: false, primaryKey },
  quotedLine: { type: DataTypes.DOUBLE, allowNull: true },
});

export const resultColumns = (primaryKey: boolean) => ({
  ...keyColumns(primaryKey),
  targetDate: { type: DataTypes.STRING(10), allowNull: false },
  batchId: { type: DataTypes.STRING(64), allowNull: false },
  value: { type: DataTypes.DOUBLE, allowNull: false },
  confidence: { type: DataTypes.DOUBLE, allowNull: false },
  recommendation: { type: DataTypes.STRING(10), allowNull: false },
  lineSource: { type: DataTypes.STRING(32), allowNull: true },
  strategyVersion: { type: DataTypes.STRING(32), allowNull: false },
  computedAt: { type: DataTypes.BIGINT, allowNull: false },
  voided: { type: DataTypes.BOOLEAN, allowNull: false, defaultValue: false },
  voidReason: { type: DataTypes.TEXT, allowNull: true },
});

/** Every result column except the business key, for `updateOnDuplicate`. */
export const RESULT_VALUE_FIELDS = [
  'quotedLine',
  'targetDate',
  'batchId',
  'value',
  'confidence',
  'recommendation',
  'lineSource',
  'strategyVersion',
  'computedAt',
  'voided',
  'voidReason',
] as const satisfies readonly (keyof ResultRow)[];
