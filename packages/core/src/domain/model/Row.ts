/** One record: a mapping from column name to a scalar or nested value. */
export interface Row {
  readonly [column: string]: unknown;
}

/** Column-major data: one sequence of values per column, all of equal length. */
export interface ColumnarBatch {
  readonly [column: string]: readonly unknown[];
}

/** An element of the produced stream. */
export interface ProducedBatch {
  /** Rows in source order. Shorter than the batch size only for the final batch. */
  readonly rows: readonly Row[];
  /** `true` for the final batch of the stream. */
  readonly isLast: boolean;
  /** Zero-based batch index, counted from the first row of the source. */
  readonly batchIndex: number;
  /** Index of the first row of this batch within the source. */
  readonly startRow: number;
}

/** Number of rows in a columnar batch (the length of its first column). */
export function columnarLength(batch: ColumnarBatch): number {
  for (const values of Object.values(batch)) {
    return values.length;
  }
  return 0;
}

/** Check whether a row has all empty values. */
export function isEmptyRow(row: Row): boolean {
  return Object.values(row).every((v) => v === null || v === undefined || v === '');
}
