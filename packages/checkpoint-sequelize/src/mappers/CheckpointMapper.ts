import type { Checkpoint } from '@rowstream/core';
import { isRunStatus } from '@rowstream/core';
import type { CheckpointRow } from '../models/CheckpointModel.js';

export function toRow(checkpoint: Checkpoint): CheckpointRow {
  return {
    runId: checkpoint.runId,
    source: checkpoint.source,
    offset: checkpoint.offset,
    rowBudget: checkpoint.rowBudget,
    batchSize: checkpoint.batchSize,
    batchesEmitted: checkpoint.batchesEmitted,
    status: checkpoint.status,
    updatedAt: checkpoint.updatedAt,
  };
}

/** BIGINT columns come back as strings on some dialects, hence the `Number()` conversions. */
export function toDomain(row: CheckpointRow): Checkpoint {
  if (!isRunStatus(row.status)) {
    throw new Error(`CheckpointMapper: unknown run status '${row.status}' for run '${row.runId}'`);
  }

  return {
    runId: row.runId,
    source: row.source,
    offset: Number(row.offset),
    rowBudget: Number(row.rowBudget),
    batchSize: Number(row.batchSize),
    batchesEmitted: Number(row.batchesEmitted),
    status: row.status,
    updatedAt: Number(row.updatedAt),
  };
}
