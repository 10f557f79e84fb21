import type { ColumnarBatch, Row } from '../../domain/model/Row.js';
import type { DatasetHandle } from '../../domain/ports/DatasetHandle.js';
import { columnsOf, toColumnar } from '../../domain/services/Transposer.js';

/** Materialized dataset held in memory. Rows are stored as given; reads fill missing columns with `null`. */
export class InMemoryDataset implements DatasetHandle {
  readonly streaming = false;
  private readonly rows: readonly Row[];
  private readonly columnNames: readonly string[];

  /**
   * @param rows - Rows in source order.
   * @param columns - Column names. Default: the keys of `rows`, in order of first appearance.
   */
  constructor(rows: readonly Row[], columns?: readonly string[]) {
    this.rows = rows;
    this.columnNames = columns ?? columnsOf(rows);
  }

  columns(): Promise<readonly string[]> {
    return Promise.resolve(this.columnNames);
  }

  numRows(): Promise<number> {
    return Promise.resolve(this.rows.length);
  }

  read(startRow: number, count: number): Promise<ColumnarBatch> {
    return Promise.resolve(toColumnar(this.rows.slice(startRow, startRow + count), this.columnNames));
  }

  select(count: number): InMemoryDataset {
    return new InMemoryDataset(this.rows.slice(0, count), this.columnNames);
  }
}
