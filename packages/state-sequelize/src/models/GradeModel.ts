import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';
import { keyColumns } from './resultColumns.js';

export interface GradeRow {
  entityId: string;
  eventId: string;
  strategyId: string;
  lineKey: string;
  quotedLine: number | null;
  gradingRunId: string;
  targetDate: string;
  recommendation: string;
  predictedValue: number;
  actualValue: number;
  absoluteError: number;
  signedError: number;
  withinTolerance: unknown;
  predictedMargin: number | null;
  actualMargin: number | null;
  correct: boolean | null;
  confidenceDecile: number | null;
  gradedAt: number | string;
}

export type GradeModel = ModelStatic<Model<GradeRow, GradeRow>>;

export const GRADE_VALUE_FIELDS = [
  'quotedLine',
  'gradingRunId',
  'targetDate',
  'recommendation',
  'predictedValue',
  'actualValue',
  'absoluteError',
  'signedError',
  'withinTolerance',
  'predictedMargin',
  'actualMargin',
  'correct',
  'confidenceDecile',
  'gradedAt',
] as const satisfies readonly (keyof GradeRow)[];

export function defineGradeModel(sequelize: Sequelize, tablePrefix: string): GradeModel {
  return sequelize.define<Model<GradeRow, GradeRow>>(
    `${tablePrefix}Grade`,
    {
      ...keyColumns(true),
      gradingRunId: { type: DataTypes.STRING(64), allowNull: false },
      targetDate: { type: DataTypes.STRING(10), allowNull: false },
      recommendation: { type: DataTypes.STRING(10), allowNull: false },
      predictedValue: { type: DataTypes.DOUBLE, allowNull: false },
      actualValue: { type: DataTypes.DOUBLE, allowNull: false },
      absoluteError: { type: DataTypes.DOUBLE, allowNull: false },
      signedError: { type: DataTypes.DOUBLE, allowNull: false },
      withinTolerance: { type: DataTypes.JSON, allowNull: false },
      predictedMargin: { type: DataTypes.DOUBLE, allowNull: true },
      actualMargin: { type: DataTypes.DOUBLE, allowNull: true },
      correct: { type: DataTypes.BOOLEAN, allowNull: true },
      confidenceDecile: { type: DataTypes.INTEGER, allowNull: true },
      gradedAt: { type: DataTypes.BIGINT, allowNull: false },
    },
    {
      tableName: `${tablePrefix}grades`,
      timestamps: false,
      indexes: [{ fields: ['targetDate'] }],
    },
  );
}
