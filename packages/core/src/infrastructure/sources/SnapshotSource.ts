import type { ColumnarBatch } from '../../domain/model/Row.js';
import type { SnapshotDescriptor } from '../../domain/model/SourceDescriptor.js';
import type { SnapshotSourceConfig } from '../../domain/model/SourceConfig.js';
import type { DatasetHandle } from '../../domain/ports/DatasetHandle.js';
import type { StorageOptions } from '../../domain/ports/FileSystem.js';
import type { Logger } from '../../domain/ports/Logger.js';
import type { SnapshotLoader, SnapshotNode } from '../../domain/ports/SnapshotLoader.js';
import type { SourceAdapter } from '../../domain/ports/SourceAdapter.js';
import { describeSource } from '../../domain/model/SourceDescriptor.js';
import { validateSourceConfig } from '../../domain/model/SourceConfig.js';
import { noopLogger } from '../../domain/ports/Logger.js';
import { columnsFromHandle } from '../../domain/services/SchemaResolver.js';
import {
  SourceNotOpenedError,
  SourceUnavailableError,
  UnsupportedModeError,
  asSourceUnavailable,
} from '../../domain/errors/RowstreamError.js';
import { FileSystemRegistry } from '../filesystem/FileSystemRegistry.js';
import { DiskSnapshotLoader } from '../snapshot/DiskSnapshotLoader.js';

export interface SnapshotSourceOptions extends Omit<SnapshotSourceConfig, 'kind'> {
  /** Reader of the snapshot format. Default: `DiskSnapshotLoader`. */
  readonly loader?: SnapshotLoader;
  readonly fileSystems?: FileSystemRegistry;
  readonly logger?: Logger;
}

interface OpenedSnapshot {
  readonly handle: DatasetHandle;
  readonly rowBudget: number;
  readonly columns: readonly string[];
}

/**
 * Source reading a previously materialized snapshot, or one configuration of a distiset.
 *
 * The whole snapshot is loaded at open time, then indexed by `config` (distisets
 * only) and by `split`. Streaming is not supported.
 */
export class SnapshotSource implements SourceAdapter {
  readonly descriptor: SnapshotDescriptor;
  private readonly streaming: boolean;
  private readonly rowLimit: number | undefined;
  private readonly storageOptions: StorageOptions | undefined;
  private readonly loader: SnapshotLoader;
  private readonly fileSystems: FileSystemRegistry;
  private readonly logger: Logger;
  private opened: OpenedSnapshot | null = null;

  constructor(options: SnapshotSourceOptions) {
    validateSourceConfig({ kind: 'snapshot', ...options });
    this.descriptor = {
      kind: 'snapshot',
      snapshotPath: options.snapshotPath,
      config: options.config,
      split: options.split,
      isDistiset: options.isDistiset ?? false,
    };
    this.streaming = options.streaming ?? false;
    this.rowLimit = options.rowLimit;
    this.storageOptions = options.storageOptions;
    this.loader = options.loader ?? new DiskSnapshotLoader();
    this.fileSystems = options.fileSystems ?? new FileSystemRegistry();
    this.logger = options.logger ?? noopLogger;
  }

  async open(): Promise<void> {
    if (this.opened) return;

    const source = describeSource(this.descriptor);
    if (this.streaming) {
      throw new UnsupportedModeError(`${source}: streaming is not supported for snapshots`, { source });
    }

    const dataset = this.select(await this.load());
    const total = await dataset.numRows();
    if (total === undefined) {
      throw new SourceUnavailableError(`${source}: the snapshot does not report its row count`, { source });
    }

    const rowBudget = this.rowLimit !== undefined ? Math.min(this.rowLimit, total) : total;
    const handle = dataset.select(rowBudget);
    this.opened = { handle, rowBudget, columns: await columnsFromHandle(handle, this.descriptor) };
    this.logger.debug('Snapshot loaded', { source, rows: total, rowBudget });
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

  private async load(): Promise<SnapshotNode> {
    const { snapshotPath, isDistiset } = this.descriptor;
    const fileSystem = this.fileSystems.resolve(snapshotPath, this.storageOptions);
    try {
      return isDistiset
        ? await this.loader.loadDistiset(snapshotPath, fileSystem)
        : await this.loader.load(snapshotPath, fileSystem);
    } catch (error) {
      const source = describeSource(this.descriptor);
      throw asSourceUnavailable(error, `${source}: cannot load snapshot`, { source, path: snapshotPath });
    }
  }

  /** Index the loaded snapshot by config, then by split, down to a single dataset. */
  private select(root: SnapshotNode): DatasetHandle {
    let node = root;
    if (this.descriptor.isDistiset && this.descriptor.config !== undefined) {
      node = this.entry(node, this.descriptor.config, 'config');
    }
    if (this.descriptor.split !== undefined) {
      node = this.entry(node, this.descriptor.split, 'split');
    }

    if (node.kind === 'collection') {
      const source = describeSource(this.descriptor);
      const available = [...node.entries.keys()];
      throw new SourceUnavailableError(
        `${source}: the snapshot holds several datasets (${available.join(', ')}), select one with 'config' or 'split'`,
        { source, available },
      );
    }
    return node.dataset;
  }

  private entry(node: SnapshotNode, key: string, level: 'config' | 'split'): SnapshotNode {
    const source = describeSource(this.descriptor);
    if (node.kind === 'dataset') {
      throw new SourceUnavailableError(`${source}: cannot select ${level} '${key}' of a single dataset`, {
        source,
        [level]: key,
      });
    }

    const child = node.entries.get(key);
    if (!child) {
      const available = [...node.entries.keys()];
      throw new SourceUnavailableError(`${source}: ${level} '${key}' not found. Available: ${available.join(', ')}`, {
        source,
        [level]: key,
        available,
      });
    }
    return child;
  }

  private requireOpened(): OpenedSnapshot {
    if (!this.opened) throw new SourceNotOpenedError(describeSource(this.descriptor));
    return this.opened;
  }
}
