import type { RunStatus } from './RunStatus.js';

/** Serialisable progress of a run (for persistence via CheckpointStore). */
export interface Checkpoint {
  readonly runId: string;
  /** Description of the source the run reads, see `describeSource()`. */
  readonly source: string;
  /** Row offset to resume from: the rows already delivered to the consumer. */
  readonly offset: number;
  readonly rowBudget: number;
  readonly batchSize: number;
  readonly batchesEmitted: number;
  readonly status: RunStatus;
  readonly updatedAt: number;
}

/** Final summary emitted with the `run:completed` event. */
export interface RunSummary {
  readonly runId: string;
  readonly rowBudget: number;
  /** Rows delivered by this call, excluding rows skipped through the resume offset. */
  readonly rowsEmitted: number;
  readonly batchesEmitted: number;
  /** Offset the run resumed from. */
  readonly resumedFrom: number;
  readonly elapsedMs: number;
}
