import type { Checkpoint, RunSummary } from '../domain/model/Checkpoint.js';
import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { SourceAdapter } from '../domain/ports/SourceAdapter.js';
import { RunStatus, canTransition } from '../domain/model/RunStatus.js';
import { describeSource } from '../domain/model/SourceDescriptor.js';
import { InvalidConfigurationError } from '../domain/errors/RowstreamError.js';
import { EventBus } from './EventBus.js';

export interface RunContextOptions {
  readonly source: SourceAdapter;
  readonly batchSize: number;
  readonly checkpointStore: CheckpointStore;
  readonly logger: Logger;
  readonly runId: string;
}

/**
 * Mutable state shared by the use cases of one loader run.
 *
 * `offset` and `batchesEmitted` are cumulative across the calls that make up
 * the run: they start from the saved checkpoint, if any.
 */
export class RunContext {
  readonly source: SourceAdapter;
  readonly sourceDescription: string;
  readonly batchSize: number;
  readonly checkpointStore: CheckpointStore;
  readonly logger: Logger;
  readonly eventBus: EventBus;
  readonly runId: string;

  status: RunStatus = RunStatus.CREATED;
  offset = 0;
  rowBudget = 0;
  batchesEmitted = 0;

  /** Chunk processing limits (set by the ProcessChunk use case). */
  chunkLimits: { readonly maxBatches?: number; readonly maxDurationMs?: number } | null = null;
  /** Timestamp when the current chunk started processing. */
  chunkStartTime: number | null = null;
  /** Batches delivered in the current chunk. */
  chunkBatchCount = 0;

  constructor(options: RunContextOptions) {
    this.source = options.source;
    this.sourceDescription = describeSource(options.source.descriptor);
    this.batchSize = options.batchSize;
    this.checkpointStore = options.checkpointStore;
    this.logger = options.logger;
    this.eventBus = new EventBus(options.logger);
    this.runId = options.runId;
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid run state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  /**
   * Position the run at its saved checkpoint. A checkpoint left `RUNNING` belongs
   * to an interrupted process and resumes like a paused one.
   *
   * @throws InvalidConfigurationError if the checkpoint was saved for another source or batch size.
   */
  async restore(): Promise<Checkpoint | null> {
    const checkpoint = await this.checkpointStore.getCheckpoint(this.runId);
    if (!checkpoint) return null;

    if (checkpoint.source !== this.sourceDescription) {
      throw new InvalidConfigurationError(
        `Checkpoint of run '${this.runId}' was saved for ${checkpoint.source}, not ${this.sourceDescription}`,
        { runId: this.runId, source: this.sourceDescription, checkpointSource: checkpoint.source },
      );
    }
    if (checkpoint.batchSize !== this.batchSize) {
      throw new InvalidConfigurationError(
        `Checkpoint of run '${this.runId}' was saved with batch size ${String(checkpoint.batchSize)}, not ${String(this.batchSize)}`,
        { runId: this.runId, batchSize: this.batchSize, checkpointBatchSize: checkpoint.batchSize },
      );
    }

    this.offset = checkpoint.offset;
    this.rowBudget = checkpoint.rowBudget;
    this.batchesEmitted = checkpoint.batchesEmitted;
    this.status = checkpoint.status === RunStatus.RUNNING ? RunStatus.PAUSED : checkpoint.status;
    return checkpoint;
  }

  async saveCheckpoint(): Promise<void> {
    await this.checkpointStore.saveCheckpoint({
      runId: this.runId,
      source: this.sourceDescription,
      offset: this.offset,
      rowBudget: this.rowBudget,
      batchSize: this.batchSize,
      batchesEmitted: this.batchesEmitted,
      status: this.status,
      updatedAt: Date.now(),
    });
  }

  buildSummary(resumedFrom: number, rowsEmitted: number, batchesEmitted: number, startedAt: number): RunSummary {
    return {
      runId: this.runId,
      rowBudget: this.rowBudget,
      rowsEmitted,
      batchesEmitted,
      resumedFrom,
      elapsedMs: Date.now() - startedAt,
    };
  }

  /** Check whether the current chunk has reached its batch or time limit. */
  isChunkExhausted(): boolean {
    if (!this.chunkLimits) return false;

    if (this.chunkLimits.maxBatches !== undefined && this.chunkBatchCount >= this.chunkLimits.maxBatches) {
      return true;
    }

    if (
      this.chunkLimits.maxDurationMs !== undefined &&
      this.chunkStartTime !== null &&
      Date.now() - this.chunkStartTime >= this.chunkLimits.maxDurationMs
    ) {
      return true;
    }

    return false;
  }
}
