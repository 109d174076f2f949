import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';
import { resultColumns } from './resultColumns.js';
import type { ResultRow } from './resultColumns.js';

export interface StagingAreaRow {
  batchId: string;
  shardId: string;
  writtenAt: number | string;
  rowCount: number;
}

export interface StagingRow extends ResultRow {
  id?: number;
  shardId: string;
}

export type StagingAreaModel = ModelStatic<Model<StagingAreaRow, StagingAreaRow>>;
export type StagingRowModel = ModelStatic<Model<StagingRow, StagingRow>>;

/** One row per staging area, so an area written with no rows still exists. */
export function defineStagingAreaModel(sequelize: Sequelize, tablePrefix: string): StagingAreaModel {
  return sequelize.define<Model<StagingAreaRow, StagingAreaRow>>(
    `${tablePrefix}StagingArea`,
    {
      batchId: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
      },
      shardId: {
        type: DataTypes.STRING(80),
        primaryKey: true,
        allowNull: false,
      },
      writtenAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      rowCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
    },
    {
      tableName: `${tablePrefix}staging_areas`,
      timestamps: false,
    },
  );
}

export function defineStagingRowModel(sequelize: Sequelize, tablePrefix: string): StagingRowModel {
  return sequelize.define<Model<StagingRow, StagingRow>>(
    `${tablePrefix}StagingRow`,
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      shardId: {
        type: DataTypes.STRING(80),
        allowNull: false,
      },
      ...resultColumns(false),
    },
    {
      tableName: `${tablePrefix}staging_rows`,
      timestamps: false,
      indexes: [{ fields: ['batchId', 'shardId'] }],
    },
  );
}
