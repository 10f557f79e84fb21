import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { Checkpoint } from '../../domain/model/Checkpoint.js';

/** Non-persistent in-memory checkpoint store. Used as the default when no custom CheckpointStore is provided. */
export class InMemoryCheckpointStore implements CheckpointStore {
  private checkpoints = new Map<string, Checkpoint>();

  saveCheckpoint(checkpoint: Checkpoint): Promise<void> {
    this.checkpoints.set(checkpoint.runId, checkpoint);
    return Promise.resolve();
  }

  getCheckpoint(runId: string): Promise<Checkpoint | null> {
    return Promise.resolve(this.checkpoints.get(runId) ?? null);
  }

  deleteCheckpoint(runId: string): Promise<void> {
    this.checkpoints.delete(runId);
    return Promise.resolve();
  }
}
