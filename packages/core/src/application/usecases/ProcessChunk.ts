import type { BatchConsumer } from '../../domain/ports/BatchConsumer.js';
import type { RunContext } from '../RunContext.js';
import { RunStatus } from '../../domain/model/RunStatus.js';
import { InvalidConfigurationError } from '../../domain/errors/RowstreamError.js';
import { StartRun } from './StartRun.js';

/** Options controlling how many batches or how long a chunk processes. */
export interface ChunkOptions {
  /** Stop after delivering this many batches in this chunk. */
  readonly maxBatches?: number;
  /** Stop after this many milliseconds have elapsed in this chunk. */
  readonly maxDurationMs?: number;
}

/** Result returned by `runChunk()`. */
export interface ChunkResult {
  /** `true` when every row of the budget has been delivered. */
  readonly done: boolean;
  /** Batches delivered in this chunk. */
  readonly batchesEmitted: number;
  /** Rows delivered in this chunk. */
  readonly rowsEmitted: number;
  /** Offset the next chunk resumes from. */
  readonly offset: number;
  /** The run identifier (needed to resume from another process). */
  readonly runId: string;
}

/**
 * Use case: deliver a limited chunk of batches, then pause and return control.
 *
 * Chunk boundaries are at the batch level: the current batch always completes
 * before the chunk stops. Control granularity with `batchSize`.
 */
export class ProcessChunk {
  constructor(private readonly ctx: RunContext) {}

  async execute(consumer: BatchConsumer, options: ChunkOptions = {}): Promise<ChunkResult> {
    if (options.maxBatches !== undefined && (!Number.isInteger(options.maxBatches) || options.maxBatches < 1)) {
      throw new InvalidConfigurationError('maxBatches must be a positive integer', { maxBatches: options.maxBatches });
    }

    this.ctx.chunkLimits = options;
    this.ctx.chunkStartTime = Date.now();
    this.ctx.chunkBatchCount = 0;

    try {
      const summary = await new StartRun(this.ctx).execute(consumer);
      const done = this.ctx.status === RunStatus.COMPLETED;

      this.ctx.eventBus.emit({
        type: 'chunk:completed',
        runId: this.ctx.runId,
        batchesEmitted: summary.batchesEmitted,
        rowsEmitted: summary.rowsEmitted,
        done,
        timestamp: Date.now(),
      });

      return {
        done,
        batchesEmitted: summary.batchesEmitted,
        rowsEmitted: summary.rowsEmitted,
        offset: this.ctx.offset,
        runId: this.ctx.runId,
      };
    } finally {
      this.ctx.chunkLimits = null;
      this.ctx.chunkStartTime = null;
    }
  }
}
