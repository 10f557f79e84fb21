import type { Checkpoint } from '../model/Checkpoint.js';

/**
 * Port for persisting run checkpoints.
 *
 * Implement this interface to store checkpoints in a database, file system, or any
 * other storage backend. The default `InMemoryCheckpointStore` is non-persistent.
 */
export interface CheckpointStore {
  /** Persist the checkpoint, replacing any previous one for the same run. */
  saveCheckpoint(checkpoint: Checkpoint): Promise<void>;
  /** Retrieve the checkpoint of a run, or `null` if none was saved. */
  getCheckpoint(runId: string): Promise<Checkpoint | null>;
  /** Forget a run. */
  deleteCheckpoint(runId: string): Promise<void>;
}
