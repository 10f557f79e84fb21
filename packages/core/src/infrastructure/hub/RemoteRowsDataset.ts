import type { ColumnarBatch, Row } from '../../domain/model/Row.js';
import type { DatasetHandle } from '../../domain/ports/DatasetHandle.js';
import { toColumnar } from '../../domain/services/Transposer.js';

/** One page of rows returned by the rows endpoint. */
export interface RowsPage {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
  /** Rows in the whole split. Unknown when the server leaves it out. */
  readonly numRowsTotal: number | undefined;
}

export type FetchRowsPage = (offset: number, length: number) => Promise<RowsPage>;

export interface RemoteRowsDatasetOptions {
  readonly fetchPage: FetchRowsPage;
  /** Maximum rows per request. */
  readonly pageSize: number;
  readonly streaming: boolean;
  /** First page, when already fetched. Supplies the columns and the total. */
  readonly firstPage?: RowsPage;
  /** Restrict the dataset to its first `limit` rows. */
  readonly limit?: number;
}

/**
 * Dataset whose rows live behind a paged HTTP endpoint.
 *
 * Reads are addressed by offset, so reading at any row costs the same as
 * reading sequentially. A read spanning several pages issues one request per page.
 */
export class RemoteRowsDataset implements DatasetHandle {
  readonly streaming: boolean;
  private readonly fetchPage: FetchRowsPage;
  private readonly pageSize: number;
  private readonly limit: number;
  private firstPage: RowsPage | undefined;

  constructor(options: RemoteRowsDatasetOptions) {
    this.fetchPage = options.fetchPage;
    this.pageSize = options.pageSize;
    this.streaming = options.streaming;
    this.firstPage = options.firstPage;
    this.limit = options.limit ?? Number.POSITIVE_INFINITY;
  }

  async columns(): Promise<readonly string[]> {
    return (await this.head()).columns;
  }

  async numRows(): Promise<number | undefined> {
    if (this.streaming) return undefined;
    const total = (await this.head()).numRowsTotal;
    return total === undefined ? undefined : Math.min(total, this.limit);
  }

  async read(startRow: number, count: number): Promise<ColumnarBatch> {
    const columns = await this.columns();
    const end = Math.min(startRow + count, this.limit);
    const rows: Row[] = [];

    let offset = startRow;
    while (offset < end) {
      const page = await this.fetchPage(offset, Math.min(this.pageSize, end - offset));
      if (page.rows.length === 0) break;
      rows.push(...page.rows);
      offset += page.rows.length;
    }
    return toColumnar(rows.slice(0, end - startRow), columns);
  }

  select(count: number): RemoteRowsDataset {
    return new RemoteRowsDataset({
      fetchPage: this.fetchPage,
      pageSize: this.pageSize,
      streaming: this.streaming,
      firstPage: this.firstPage,
      limit: Math.min(count, this.limit),
    });
  }

  private async head(): Promise<RowsPage> {
    if (!this.firstPage) {
      this.firstPage = await this.fetchPage(0, 1);
    }
    return this.firstPage;
  }
}
