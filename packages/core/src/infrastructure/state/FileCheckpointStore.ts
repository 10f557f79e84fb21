import { writeFile, readFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { Checkpoint } from '../../domain/model/Checkpoint.js';
import { isRunStatus } from '../../domain/model/RunStatus.js';
import { isRecord } from '../utils/isRecord.js';

export interface FileCheckpointStoreOptions {
  /** Directory where checkpoint files are stored. Default: `'.rowstream'`. */
  readonly directory?: string;
}

/**
 * File-based checkpoint store that persists each run as `{runId}.checkpoint.json`.
 *
 * Node.js only.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;

  constructor(options?: FileCheckpointStoreOptions) {
    this.directory = options?.directory ?? '.rowstream';
  }

  async saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.filePath(checkpoint.runId), JSON.stringify(checkpoint, null, 2), 'utf-8');
  }

  async getCheckpoint(runId: string): Promise<Checkpoint | null> {
    let content: string;
    try {
      content = await readFile(this.filePath(runId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    const checkpoint: unknown = JSON.parse(content);
    if (!isCheckpoint(checkpoint)) {
      throw new Error(`FileCheckpointStore: malformed checkpoint file '${this.filePath(runId)}'`);
    }
    return checkpoint;
  }

  async deleteCheckpoint(runId: string): Promise<void> {
    await rm(this.filePath(runId), { force: true });
  }

  private filePath(runId: string): string {
    return join(this.directory, `${encodeURIComponent(runId)}.checkpoint.json`);
  }
}

const NUMERIC_FIELDS = ['offset', 'rowBudget', 'batchSize', 'batchesEmitted', 'updatedAt'] as const;

function isCheckpoint(value: unknown): value is Checkpoint {
  return (
    isRecord(value) &&
    typeof value['runId'] === 'string' &&
    typeof value['source'] === 'string' &&
    isRunStatus(value['status']) &&
    NUMERIC_FIELDS.every((field) => typeof value[field] === 'number')
  );
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
