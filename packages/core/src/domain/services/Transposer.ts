import type { ColumnarBatch, Row } from '../model/Row.js';
import { columnarLength } from '../model/Row.js';
import type { ErrorDetails } from '../errors/RowstreamError.js';
import { SchemaViolationError } from '../errors/RowstreamError.js';

/**
 * Transpose column-major data into rows.
 *
 * Every column must hold the same number of values; a mismatch is a
 * `SchemaViolationError` naming the offending column. Row `i` holds the `i`-th
 * value of every column, keyed in column order.
 *
 * @param context - Extra details (typically the source description) for the error.
 */
export function toRows(batch: ColumnarBatch, context: ErrorDetails = {}): Row[] {
  const columns = Object.keys(batch);
  const first = columns[0];
  if (first === undefined) return [];

  const length = columnarLength(batch);
  for (const column of columns) {
    const actual = (batch[column] ?? []).length;
    if (actual !== length) {
      throw new SchemaViolationError(
        `Column '${column}' has ${String(actual)} values but '${first}' has ${String(length)}`,
        { ...context, column, expected: length, actual },
      );
    }
  }

  const rows: Row[] = [];
  for (let i = 0; i < length; i++) {
    const row: Record<string, unknown> = {};
    for (const column of columns) {
      row[column] = (batch[column] ?? [])[i];
    }
    rows.push(row);
  }
  return rows;
}

/** Transpose rows into column-major data. Keys missing from a row become `null`. */
export function toColumnar(rows: readonly Row[], columns: readonly string[]): ColumnarBatch {
  const batch: Record<string, unknown[]> = {};
  for (const column of columns) {
    batch[column] = rows.map((row) => (column in row ? row[column] : null));
  }
  return batch;
}

/** Column names of a set of rows, in order of first appearance. */
export function columnsOf(rows: Iterable<Row>): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}
