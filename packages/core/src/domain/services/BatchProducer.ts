import type { ProducedBatch } from '../model/Row.js';
import type { SourceAdapter } from '../ports/SourceAdapter.js';
import { describeSource } from '../model/SourceDescriptor.js';
import { InvalidConfigurationError } from '../errors/RowstreamError.js';
import { toRows } from './Transposer.js';

/**
 * Domain service that reads an opened source into fixed-size row batches.
 *
 * Every batch holds `batchSize` rows except possibly the last, which is marked
 * with `isLast`. The number of rows never exceeds the source's row budget, so
 * streaming sources that were not truncated at open time stop at the budget too.
 */
export class BatchProducer {
  constructor(
    private readonly source: SourceAdapter,
    readonly batchSize: number,
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new InvalidConfigurationError('Batch size must be an integer of at least 1', { batchSize });
    }
  }

  /**
   * Yield the batches of the source, in order.
   *
   * Batches that start before `offset` were delivered by an earlier run and are
   * not yielded again. Batch boundaries are always multiples of `batchSize`
   * counted from row 0, so resuming does not shift them; with an offset that is
   * not on a boundary the first yielded batch starts at the next boundary.
   *
   * The stream ends after the batch marked `isLast`, or on an empty read.
   *
   * @param offset - Rows already consumed by a previous run. Default: `0`.
   */
  async *produce(offset = 0): AsyncGenerator<ProducedBatch, void, undefined> {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidConfigurationError('Resume offset must be a non-negative integer', { offset });
    }

    const rowBudget = this.source.rowCount();
    const source = describeSource(this.source.descriptor);

    // Reads are addressed by row, so skipped batches are never fetched.
    let batchIndex = Math.ceil(offset / this.batchSize);
    let cursor = batchIndex * this.batchSize;

    while (cursor < rowBudget) {
      const requested = Math.min(this.batchSize, rowBudget - cursor);
      const rows = toRows(await this.source.readColumnar(cursor, requested), { source });
      if (rows.length === 0) return;

      const startRow = cursor;
      cursor += rows.length;
      // A short read means the source ran out before the budget.
      const isLast = cursor >= rowBudget || rows.length < requested;

      yield { rows, isLast, batchIndex, startRow };

      if (isLast) return;
      batchIndex++;
    }
  }
}
