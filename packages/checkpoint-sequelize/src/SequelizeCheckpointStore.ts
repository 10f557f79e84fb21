import type { Sequelize } from 'sequelize';
import type { Checkpoint, CheckpointStore } from '@rowstream/core';
import { defineCheckpointModel } from './models/CheckpointModel.js';
import type { CheckpointModel, CheckpointRow } from './models/CheckpointModel.js';
import * as CheckpointMapper from './mappers/CheckpointMapper.js';

export interface SequelizeCheckpointStoreOptions {
  /** Prefix of the table (and model) name. Default: `'rowstream_'`, giving `rowstream_checkpoints`. */
  readonly tablePrefix?: string;
}

/**
 * Sequelize-based CheckpointStore adapter for `@rowstream/core`.
 *
 * Persists one row per loader run to a relational database using Sequelize v6.
 * Supports any dialect supported by Sequelize (PostgreSQL, MySQL, MariaDB,
 * SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create the table.
 *
 * @example
 * ```typescript
 * const store = new SequelizeCheckpointStore(new Sequelize(process.env.DATABASE_URL));
 * await store.initialize();
 * const loader = new DatasetLoader(source, { checkpointStore: store, runId: 'nightly-import' });
 * ```
 */
export class SequelizeCheckpointStore implements CheckpointStore {
  private readonly Checkpoint: CheckpointModel;

  constructor(sequelize: Sequelize, options?: SequelizeCheckpointStoreOptions) {
    this.Checkpoint = defineCheckpointModel(sequelize, options?.tablePrefix ?? 'rowstream_');
  }

  async initialize(): Promise<void> {
    await this.Checkpoint.sync();
  }

  async saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    await this.Checkpoint.upsert({ ...CheckpointMapper.toRow(checkpoint) });
  }

  async getCheckpoint(runId: string): Promise<Checkpoint | null> {
    const row = await this.Checkpoint.findByPk(runId);
    if (!row) return null;
    const plain: CheckpointRow = row.get({ plain: true });
    return CheckpointMapper.toDomain(plain);
  }

  async deleteCheckpoint(runId: string): Promise<void> {
    await this.Checkpoint.destroy({ where: { runId } });
  }
}
