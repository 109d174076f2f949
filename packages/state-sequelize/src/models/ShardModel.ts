import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface ShardRow {
  shardId: string;
  batchId: string;
  shardIndex: number;
  entityCount: number;
  entities: unknown;
  status: string;
  attempts: number;
  messageId: string | null;
  resultCount: number;
  rejectedCount: number;
  omittedCount: number;
  reason: string | null;
  reportedAt: number | string | null;
}

export type ShardModel = ModelStatic<Model<ShardRow, ShardRow>>;

export function defineShardModel(sequelize: Sequelize, tablePrefix: string): ShardModel {
  return sequelize.define<Model<ShardRow, ShardRow>>(
    `${tablePrefix}Shard`,
    {
      shardId: {
        type: DataTypes.STRING(80),
        primaryKey: true,
        allowNull: false,
      },
      batchId: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
      shardIndex: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      entityCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      entities: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      attempts: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      messageId: {
        type: DataTypes.STRING(64),
        allowNull: true,
      },
      resultCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      rejectedCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      omittedCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      reason: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      reportedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}shards`,
      timestamps: false,
      indexes: [{ unique: true, fields: ['batchId', 'shardIndex'] }],
    },
  );
}
