import type { ColumnarBatch } from '../model/Row.js';

/**
 * Port for the backing dataset handle an adapter owns.
 *
 * A handle is either materialized (its row count is known) or streaming
 * (rows are produced lazily and `numRows()` resolves to `undefined`).
 */
export interface DatasetHandle {
  /** `true` when rows are produced lazily and the total is unknown. */
  readonly streaming: boolean;
  /** Column names in schema order. */
  columns(): Promise<readonly string[]>;
  /** Exact row count, or `undefined` for streaming handles. */
  numRows(): Promise<number | undefined>;
  /** Read up to `count` rows starting at `startRow`. Returns fewer rows only at end of data. */
  read(startRow: number, count: number): Promise<ColumnarBatch>;
  /** Return a handle restricted to the first `count` rows. */
  select(count: number): DatasetHandle;
  /** Release resources held by the handle. */
  close?(): Promise<void>;
}
