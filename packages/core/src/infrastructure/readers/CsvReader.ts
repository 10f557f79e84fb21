import Papa from 'papaparse';
import type { FileReader } from '../../domain/ports/FileReader.js';
import type { Row } from '../../domain/model/Row.js';
import { isEmptyRow } from '../../domain/model/Row.js';

export interface CsvReaderOptions {
  /** Field delimiter. Default: auto-detected by papaparse. */
  readonly delimiter?: string;
  /** Convert numeric and boolean fields to numbers and booleans. Default: `true`. */
  readonly dynamicTyping?: boolean;
}

/** Delimited-text reader built on papaparse. The first line holds the column names. */
export class CsvReader implements FileReader {
  private readonly delimiter: string | undefined;
  private readonly dynamicTyping: boolean;

  constructor(options?: CsvReaderOptions) {
    this.delimiter = options?.delimiter;
    this.dynamicTyping = options?.dynamicTyping ?? true;
  }

  *parse(content: string): Iterable<Row> {
    const result = Papa.parse<Record<string, unknown>>(content, {
      header: true,
      delimiter: this.delimiter,
      skipEmptyLines: true,
      dynamicTyping: this.dynamicTyping,
    });

    for (const row of result.data) {
      if (isEmptyRow(row)) continue;
      yield row;
    }
  }

  header(content: string): readonly string[] {
    const result = Papa.parse<Record<string, unknown>>(content, {
      header: true,
      delimiter: this.delimiter,
      skipEmptyLines: true,
      preview: 1,
    });
    return result.meta.fields ?? [];
  }
}
