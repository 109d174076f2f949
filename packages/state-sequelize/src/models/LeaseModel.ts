import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface LeaseRow {
  resourceKey: string;
  holderId: string;
  acquiredAt: number | string;
  expiresAt: number | string;
}

export type LeaseModel = ModelStatic<Model<LeaseRow, LeaseRow>>;

export function defineLeaseModel(sequelize: Sequelize, tablePrefix: string): LeaseModel {
  return sequelize.define<Model<LeaseRow, LeaseRow>>(
    `${tablePrefix}Lease`,
    {
      resourceKey: {
        type: DataTypes.STRING(191),
        primaryKey: true,
        allowNull: false,
      },
      holderId: {
        type: DataTypes.STRING(128),
        allowNull: false,
      },
      acquiredAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      expiresAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName: `${tablePrefix}leases`,
      timestamps: false,
    },
  );
}
