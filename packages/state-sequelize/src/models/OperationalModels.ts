import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface IdempotencyRow {
  messageId: string;
  processedAt: number | string;
  expiresAt: number | string;
  outcome: string;
}

export interface CircuitRow {
  dependency: string;
  status: string;
  failureCount: number;
  successCount: number;
  openedAt: number | string | null;
  updatedAt: number | string;
}

export interface GradingStateRow {
  targetDate: string;
  status: string;
  reason: string | null;
  gradingRunId: string;
  updatedAt: number | string;
}

export type IdempotencyModel = ModelStatic<Model<IdempotencyRow, IdempotencyRow>>;
export type CircuitModel = ModelStatic<Model<CircuitRow, CircuitRow>>;
export type GradingStateModel = ModelStatic<Model<GradingStateRow, GradingStateRow>>;

export function defineIdempotencyModel(sequelize: Sequelize, tablePrefix: string): IdempotencyModel {
  return sequelize.define<Model<IdempotencyRow, IdempotencyRow>>(
    `${tablePrefix}Idempotency`,
    {
      messageId: { type: DataTypes.STRING(64), primaryKey: true, allowNull: false },
      processedAt: { type: DataTypes.BIGINT, allowNull: false },
      expiresAt: { type: DataTypes.BIGINT, allowNull: false },
      outcome: { type: DataTypes.STRING(20), allowNull: false },
    },
    {
      tableName: `${tablePrefix}idempotency`,
      timestamps: false,
      indexes: [{ fields: ['expiresAt'] }],
    },
  );
}

export function defineCircuitModel(sequelize: Sequelize, tablePrefix: string): CircuitModel {
  return sequelize.define<Model<CircuitRow, CircuitRow>>(
    `${tablePrefix}Circuit`,
    {
      dependency: { type: DataTypes.STRING(64), primaryKey: true, allowNull: false },
      status: { type: DataTypes.STRING(20), allowNull: false },
      failureCount: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      successCount: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      openedAt: { type: DataTypes.BIGINT, allowNull: true },
      updatedAt: { type: DataTypes.BIGINT, allowNull: false },
    },
    {
      tableName: `${tablePrefix}circuits`,
      timestamps: false,
    },
  );
}

export function defineGradingStateModel(sequelize: Sequelize, tablePrefix: string): GradingStateModel {
  return sequelize.define<Model<GradingStateRow, GradingStateRow>>(
    `${tablePrefix}GradingState`,
    {
      targetDate: { type: DataTypes.STRING(10), primaryKey: true, allowNull: false },
      status: { type: DataTypes.STRING(20), allowNull: false },
      reason: { type: DataTypes.TEXT, allowNull: true },
      gradingRunId: { type: DataTypes.STRING(64), allowNull: false },
      updatedAt: { type: DataTypes.BIGINT, allowNull: false },
    },
    {
      tableName: `${tablePrefix}grading_states`,
      timestamps: false,
    },
  );
}
