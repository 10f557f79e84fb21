import type { Row } from '../model/Row.js';

/** Position of a delivered batch within its run. */
export interface BatchContext {
  readonly runId: string;
  /** Absolute index of the batch in the source. */
  readonly batchIndex: number;
  /** Absolute index of the batch's first row in the source. */
  readonly startRow: number;
  readonly rowBudget: number;
  readonly isLast: boolean;
}

/**
 * Callback receiving each batch of a run. A thrown error or rejected promise
 * fails the run; the checkpoint stays at the last batch that succeeded.
 */
export type BatchConsumer = (rows: readonly Row[], context: BatchContext) => Promise<void> | void;
