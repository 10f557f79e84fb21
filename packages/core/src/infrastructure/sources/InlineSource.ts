import type { ColumnarBatch } from '../../domain/model/Row.js';
import type { InlineDescriptor } from '../../domain/model/SourceDescriptor.js';
import type { InlineSourceConfig } from '../../domain/model/SourceConfig.js';
import type { SourceAdapter } from '../../domain/ports/SourceAdapter.js';
import { describeSource } from '../../domain/model/SourceDescriptor.js';
import { validateSourceConfig } from '../../domain/model/SourceConfig.js';
import { columnsFromHandle } from '../../domain/services/SchemaResolver.js';
import { SourceNotOpenedError, UnsupportedModeError } from '../../domain/errors/RowstreamError.js';
import { InMemoryDataset } from '../datasets/InMemoryDataset.js';

export type InlineSourceOptions = Omit<InlineSourceConfig, 'kind'>;

interface OpenedRows {
  readonly handle: InMemoryDataset;
  readonly rowBudget: number;
  readonly columns: readonly string[];
}

/**
 * Source over rows already held in memory. Useful for tests and for seeding a
 * pipeline with a handful of hand-written rows.
 *
 * @example
 * ```typescript
 * const source = new InlineSource({ rows: [{ instruction: 'Say hi' }, { instruction: 'Say bye' }] });
 * ```
 */
export class InlineSource implements SourceAdapter {
  readonly descriptor: InlineDescriptor;
  private readonly dataset: InMemoryDataset;
  private readonly rowLimit: number | undefined;
  private readonly streaming: boolean;
  private opened: OpenedRows | null = null;

  constructor(options: InlineSourceOptions) {
    validateSourceConfig({ kind: 'inline', ...options });
    this.descriptor = { kind: 'inline', name: options.name ?? 'inline' };
    this.dataset = new InMemoryDataset(options.rows);
    this.rowLimit = options.rowLimit;
    this.streaming = options.streaming ?? false;
  }

  async open(): Promise<void> {
    if (this.opened) return;
    if (this.streaming) {
      const source = describeSource(this.descriptor);
      throw new UnsupportedModeError(`${source}: rows held in memory cannot be streamed`, { source });
    }

    const total = await this.dataset.numRows();
    const rowBudget = this.rowLimit !== undefined ? Math.min(this.rowLimit, total) : total;
    const handle = this.dataset.select(rowBudget);
    this.opened = { handle, rowBudget, columns: await columnsFromHandle(this.dataset, this.descriptor) };
  }

  rowCount(): number {
    return this.requireOpened().rowBudget;
  }

  columns(): readonly string[] {
    return this.requireOpened().columns;
  }

  readColumnar(startRow: number, batchSize: number): Promise<ColumnarBatch> {
    return this.requireOpened().handle.read(startRow, batchSize);
  }

  close(): Promise<void> {
    this.opened = null;
    return Promise.resolve();
  }

  private requireOpened(): OpenedRows {
    if (!this.opened) throw new SourceNotOpenedError(describeSource(this.descriptor));
    return this.opened;
  }
}
