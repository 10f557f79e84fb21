import type { ColumnarBatch } from '../model/Row.js';
import type { SourceDescriptor } from '../model/SourceDescriptor.js';

/**
 * Port every dataset source implements.
 *
 * The adapter exclusively owns one backing handle for its lifetime. The handle
 * is acquired once by `open()` and released by `close()` when the run ends.
 * Adapters are not reentrant: drive one `produce` at a time.
 */
export interface SourceAdapter {
  readonly descriptor: SourceDescriptor;
  /** Acquire the handle, resolve the row budget and the output columns. Calling it again is a no-op. */
  open(): Promise<void>;
  /** Total rows this source will deliver in one run. Available after `open()`. */
  rowCount(): number;
  /** Output columns, stable for the adapter's lifetime. Available after `open()`. */
  columns(): readonly string[];
  /** Read up to `batchSize` rows from `startRow`, in source order. */
  readColumnar(startRow: number, batchSize: number): Promise<ColumnarBatch>;
  /** Release the backing handle. */
  close(): Promise<void>;
}
