import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface BatchRow {
  batchId: string;
  targetDate: string;
  triggerSource: string;
  status: string;
  expectedShards: number;
  deadlineAt: number | string;
  createdAt: number | string;
  completedAt: number | string | null;
  statusReason: string | null;
}

export type BatchModel = ModelStatic<Model<BatchRow, BatchRow>>;

export function defineBatchModel(sequelize: Sequelize, tablePrefix: string): BatchModel {
  return sequelize.define<Model<BatchRow, BatchRow>>(
    `${tablePrefix}Batch`,
    {
      batchId: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
      },
      targetDate: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      triggerSource: {
        type: DataTypes.STRING(128),
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      expectedShards: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      deadlineAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      createdAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      statusReason: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}batches`,
      timestamps: false,
      indexes: [{ fields: ['targetDate', 'status'] }, { fields: ['status'] }],
    },
  );
}
