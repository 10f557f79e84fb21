import type { ColumnarBatch, Row } from '../../domain/model/Row.js';
import type { DatasetHandle } from '../../domain/ports/DatasetHandle.js';
import { columnsOf, toColumnar } from '../../domain/services/Transposer.js';
import { SchemaViolationError } from '../../domain/errors/RowstreamError.js';

/** Factory for a fresh pass over the rows of a dataset. */
export type RowStreamFactory = () => AsyncIterable<Row>;

export interface IterableDatasetOptions {
  /** Column names. Default: the keys of the first row. A row with any other key fails the read. */
  readonly columns?: readonly string[];
  /** Stop after this many rows. Default: no limit. */
  readonly limit?: number;
}

/**
 * Streaming dataset over a lazily produced sequence of rows.
 *
 * Reads continue from the current position when they are sequential. A read
 * before the current position starts a new pass; rows before `startRow` are
 * read and dropped, since the underlying sequence cannot seek.
 */
export class IterableDataset implements DatasetHandle {
  readonly streaming = true;
  private readonly factory: RowStreamFactory;
  private readonly limit: number;
  private columnNames: readonly string[] | undefined;
  private iterator: AsyncIterator<Row> | null = null;
  private position = 0;

  constructor(factory: RowStreamFactory, options?: IterableDatasetOptions) {
    this.factory = factory;
    this.columnNames = options?.columns;
    this.limit = options?.limit ?? Number.POSITIVE_INFINITY;
  }

  async columns(): Promise<readonly string[]> {
    if (this.columnNames === undefined) {
      let first: Row | undefined;
      for await (const row of this.factory()) {
        first = row;
        break;
      }
      this.columnNames = first ? columnsOf([first]) : [];
    }
    return this.columnNames;
  }

  numRows(): Promise<undefined> {
    return Promise.resolve(undefined);
  }

  async read(startRow: number, count: number): Promise<ColumnarBatch> {
    const columns = await this.columns();
    const end = Math.min(startRow + count, this.limit);

    let iterator = this.iterator;
    if (!iterator || startRow < this.position) {
      await this.close();
      iterator = this.factory()[Symbol.asyncIterator]();
      this.iterator = iterator;
    }

    const rows: Row[] = [];
    while (this.position < end) {
      const next = await iterator.next();
      if (next.done) break;
      if (this.position >= startRow) {
        checkColumns(next.value, this.position, columns);
        rows.push(next.value);
      }
      this.position++;
    }
    return toColumnar(rows, columns);
  }

  select(count: number): IterableDataset {
    return new IterableDataset(this.factory, { columns: this.columnNames, limit: Math.min(count, this.limit) });
  }

  async close(): Promise<void> {
    const iterator = this.iterator;
    this.iterator = null;
    this.position = 0;
    if (iterator?.return) {
      await iterator.return();
    }
  }
}

function checkColumns(row: Row, index: number, columns: readonly string[]): void {
  const unknown = Object.keys(row).find((key) => !columns.includes(key));
  if (unknown !== undefined) {
    throw new SchemaViolationError(
      `IterableDataset: row ${String(index)} has column '${unknown}' outside [${columns.join(', ')}]`,
      { row: index, column: unknown, columns },
    );
  }
}
