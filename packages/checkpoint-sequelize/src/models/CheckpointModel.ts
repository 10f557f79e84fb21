import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface CheckpointRow {
  runId: string;
  source: string;
  offset: number;
  rowBudget: number;
  batchSize: number;
  batchesEmitted: number;
  status: string;
  updatedAt: number | string;
}

export type CheckpointModel = ModelStatic<Model>;

export function defineCheckpointModel(sequelize: Sequelize, tablePrefix: string): CheckpointModel {
  return sequelize.define(
    `${tablePrefix}Checkpoint`,
    {
      runId: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      source: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      offset: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      rowBudget: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      batchSize: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      batchesEmitted: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      updatedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName: `${tablePrefix}checkpoints`,
      timestamps: false,
    },
  );
}
