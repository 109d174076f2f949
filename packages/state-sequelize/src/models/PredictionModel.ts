import type { Sequelize, ModelStatic, Model } from 'sequelize';
import { resultColumns } from './resultColumns.js';
import type { ResultRow } from './resultColumns.js';

export type PredictionModel = ModelStatic<Model<ResultRow, ResultRow>>;

export function definePredictionModel(sequelize: Sequelize, tablePrefix: string): PredictionModel {
  return sequelize.define<Model<ResultRow, ResultRow>>(`${tablePrefix}Prediction`, resultColumns(true), {
    tableName: `${tablePrefix}predictions`,
    timestamps: false,
    indexes: [{ fields: ['targetDate', 'strategyId'] }],
  });
}
