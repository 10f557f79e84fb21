import type { ColumnarBatch } from '../../domain/model/Row.js';
import type { HubDescriptor } from '../../domain/model/SourceDescriptor.js';
import type { HubSourceConfig } from '../../domain/model/SourceConfig.js';
import type { DatasetHandle } from '../../domain/ports/DatasetHandle.js';
import type { DatasetInfos, HubClient } from '../../domain/ports/HubClient.js';
import type { Logger } from '../../domain/ports/Logger.js';
import type { SourceAdapter } from '../../domain/ports/SourceAdapter.js';
import { describeSource } from '../../domain/model/SourceDescriptor.js';
import { validateSourceConfig } from '../../domain/model/SourceConfig.js';
import { noopLogger } from '../../domain/ports/Logger.js';
import { columnsFromDatasetInfo, columnsFromHandle, datasetInfoFor } from '../../domain/services/SchemaResolver.js';
import {
  SourceNotOpenedError,
  SourceUnavailableError,
  asSourceUnavailable,
  errorMessage,
} from '../../domain/errors/RowstreamError.js';
import { DEFAULT_SPLIT } from '../../domain/services/PathClassifier.js';
import { HttpHubClient } from '../hub/HttpHubClient.js';

export interface HubSourceOptions extends Omit<HubSourceConfig, 'kind'> {
  /** Client for the dataset repository. Default: `HttpHubClient` with default options. */
  readonly client?: HubClient;
  readonly logger?: Logger;
}

interface OpenedHub {
  readonly handle: DatasetHandle;
  readonly rowBudget: number;
  readonly columns: readonly string[];
}

interface HubMetadata {
  readonly numExamples: number;
  readonly columns: readonly string[];
}

/**
 * Source reading one split of a dataset in a remote repository.
 *
 * The row count and columns come from the repository's metadata service. When
 * that query fails, the dataset itself is opened to read them, and a warning is
 * logged. In streaming mode the handle is never truncated; the batch producer
 * stops at the row budget.
 *
 * @example
 * ```typescript
 * const source = new HubSource({ repoId: 'org/instructions', split: 'test', rowLimit: 100 });
 * await source.open();
 * for await (const batch of new BatchProducer(source, 10).produce()) { ... }
 * ```
 */
export class HubSource implements SourceAdapter {
  readonly descriptor: HubDescriptor;
  private readonly streaming: boolean;
  private readonly rowLimit: number | undefined;
  private readonly client: HubClient;
  private readonly logger: Logger;
  private opened: OpenedHub | null = null;

  constructor(options: HubSourceOptions) {
    validateSourceConfig({ kind: 'hub', ...options });
    this.descriptor = {
      kind: 'hub',
      repoId: options.repoId,
      config: options.config,
      split: options.split ?? DEFAULT_SPLIT,
    };
    this.streaming = options.streaming ?? false;
    this.rowLimit = options.rowLimit;
    this.client = options.client ?? new HttpHubClient();
    this.logger = options.logger ?? noopLogger;
  }

  async open(): Promise<void> {
    if (this.opened) return;

    const handle = await this.load(this.streaming);
    const metadata = await this.resolveMetadata(handle);
    const rowBudget = this.rowLimit !== undefined ? Math.min(this.rowLimit, metadata.numExamples) : metadata.numExamples;

    this.opened = {
      handle: this.streaming ? handle : handle.select(rowBudget),
      rowBudget,
      columns: metadata.columns,
    };
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

  async close(): Promise<void> {
    const opened = this.opened;
    this.opened = null;
    await opened?.handle.close?.();
  }

  private async resolveMetadata(handle: DatasetHandle): Promise<HubMetadata> {
    let infos: DatasetInfos;
    try {
      infos = await this.client.getDatasetInfos(this.descriptor.repoId);
    } catch (error) {
      // The metadata query can fail on connection issues while the rows are still reachable.
      this.logger.warn('Failed to get dataset info from the hub, reading it from the dataset instead', {
        source: describeSource(this.descriptor),
        error: errorMessage(error),
      });
      return this.metadataFromDataset(handle, error);
    }

    return { numExamples: this.splitSize(infos), columns: columnsFromDatasetInfo(infos, this.descriptor) };
  }

  private async metadataFromDataset(handle: DatasetHandle, queryError: unknown): Promise<HubMetadata> {
    const source = describeSource(this.descriptor);
    let counted: DatasetHandle;
    try {
      counted = handle.streaming ? await this.load(false) : handle;
    } catch (error) {
      throw new SourceUnavailableError(
        `${source}: metadata query failed (${errorMessage(queryError)}) and the dataset could not be opened (${errorMessage(error)})`,
        { source },
        { cause: error },
      );
    }

    try {
      const numExamples = await counted.numRows();
      if (numExamples === undefined) {
        throw new SourceUnavailableError(`${source}: the dataset does not report its row count`, { source });
      }
      return { numExamples, columns: await columnsFromHandle(counted, this.descriptor) };
    } finally {
      if (counted !== handle) await counted.close?.();
    }
  }

  private splitSize(infos: DatasetInfos): number {
    const info = datasetInfoFor(infos, this.descriptor);
    const split = info.splits[this.descriptor.split];
    if (!split) {
      throw new SourceUnavailableError(
        `${describeSource(this.descriptor)}: split '${this.descriptor.split}' not found`,
        { source: describeSource(this.descriptor), split: this.descriptor.split, available: Object.keys(info.splits) },
      );
    }
    return split.numExamples;
  }

  private async load(streaming: boolean): Promise<DatasetHandle> {
    try {
      return await this.client.loadDataset({
        repoId: this.descriptor.repoId,
        config: this.descriptor.config,
        split: this.descriptor.split,
        streaming,
      });
    } catch (error) {
      throw asSourceUnavailable(error, `${describeSource(this.descriptor)}: cannot open dataset`, {
        source: describeSource(this.descriptor),
      });
    }
  }

  private requireOpened(): OpenedHub {
    if (!this.opened) throw new SourceNotOpenedError(describeSource(this.descriptor));
    return this.opened;
  }
}
