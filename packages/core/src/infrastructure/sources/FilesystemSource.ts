import type { ColumnarBatch, Row } from '../../domain/model/Row.js';
import type { FilesystemDescriptor } from '../../domain/model/SourceDescriptor.js';
import type { FilesystemSourceConfig } from '../../domain/model/SourceConfig.js';
import type { DatasetHandle } from '../../domain/ports/DatasetHandle.js';
import type { FileReader } from '../../domain/ports/FileReader.js';
import type { FileSystem, StorageOptions } from '../../domain/ports/FileSystem.js';
import type { Logger } from '../../domain/ports/Logger.js';
import type { SourceAdapter } from '../../domain/ports/SourceAdapter.js';
import { describeSource } from '../../domain/model/SourceDescriptor.js';
import { validateSourceConfig } from '../../domain/model/SourceConfig.js';
import { noopLogger } from '../../domain/ports/Logger.js';
import type { Classification } from '../../domain/services/PathClassifier.js';
import { DEFAULT_SPLIT, classifyPath, filesForSplit } from '../../domain/services/PathClassifier.js';
import { columnsFromHandle } from '../../domain/services/SchemaResolver.js';
import {
  SchemaViolationError,
  SourceNotOpenedError,
  UnresolvableFiletypeError,
  asSourceUnavailable,
  errorMessage,
} from '../../domain/errors/RowstreamError.js';
import { InMemoryDataset } from '../datasets/InMemoryDataset.js';
import { IterableDataset } from '../datasets/IterableDataset.js';
import { FileSystemRegistry } from '../filesystem/FileSystemRegistry.js';
import { FileReaderRegistry } from '../readers/FileReaderRegistry.js';

export interface FilesystemSourceOptions extends Omit<FilesystemSourceConfig, 'kind'> {
  /** Filesystems by path protocol. Default: a registry with the local filesystem only. */
  readonly fileSystems?: FileSystemRegistry;
  /** Readers by filetype. Default: `csv`, `tsv`, `json` and `text`. */
  readonly readers?: FileReaderRegistry;
  readonly logger?: Logger;
}

interface OpenedFiles {
  readonly handle: DatasetHandle;
  readonly rowBudget: number;
  readonly columns: readonly string[];
}

/** The files of one split and how to read them. */
interface SplitFiles {
  readonly fileSystem: FileSystem;
  readonly files: readonly string[];
  readonly reader: FileReader;
}

/**
 * Source reading a data file, or a directory of data files, from a local or remote filesystem.
 *
 * The path is classified by `classifyPath()`: a single file, a flat directory of
 * files, or a directory of per-split sub-directories. An explicit `filetype`
 * overrides the one inferred from the first file's extension.
 *
 * @example
 * ```typescript
 * const source = new FilesystemSource({ path: 'data/prompts.jsonl' });
 * const csv = new FilesystemSource({ path: 'data/export.txt', filetype: 'csv' });
 * ```
 */
export class FilesystemSource implements SourceAdapter {
  readonly descriptor: FilesystemDescriptor;
  private readonly streaming: boolean;
  private readonly rowLimit: number | undefined;
  private readonly storageOptions: StorageOptions | undefined;
  private readonly fileSystems: FileSystemRegistry;
  private readonly readers: FileReaderRegistry;
  private readonly logger: Logger;
  private opened: OpenedFiles | null = null;

  constructor(options: FilesystemSourceOptions) {
    validateSourceConfig({ kind: 'filesystem', ...options });
    this.descriptor = {
      kind: 'filesystem',
      path: options.path,
      filetype: options.filetype,
      split: options.split ?? DEFAULT_SPLIT,
    };
    this.streaming = options.streaming ?? false;
    this.rowLimit = options.rowLimit;
    this.storageOptions = options.storageOptions;
    this.fileSystems = options.fileSystems ?? new FileSystemRegistry();
    this.readers = options.readers ?? new FileReaderRegistry();
    this.logger = options.logger ?? noopLogger;
  }

  async open(): Promise<void> {
    if (this.opened) return;

    const splitFiles = await this.resolveFiles();
    const { handle, rowBudget } = this.streaming
      ? await this.openStreaming(splitFiles)
      : await this.openMaterialized(splitFiles);

    this.opened = { handle, rowBudget, columns: await columnsFromHandle(handle, this.descriptor) };
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

  private async resolveFiles(): Promise<SplitFiles> {
    const { path } = this.descriptor;
    const source = describeSource(this.descriptor);
    const fileSystem = this.fileSystems.resolve(path, this.storageOptions);

    let classification: Classification;
    try {
      classification = await classifyPath(path, fileSystem);
    } catch (error) {
      throw asSourceUnavailable(error, `${source}: cannot list '${path}'`, { source, path });
    }

    const filetype = this.descriptor.filetype ?? classification.filetype;
    if (filetype === '') {
      throw new UnresolvableFiletypeError(`${source}: cannot infer a filetype for '${path}', pass 'filetype'`, {
        source,
        path,
      });
    }

    const files = filesForSplit(classification.dataFiles, this.descriptor.split, { source });
    this.logger.debug('Resolved data files', { source, filetype, files: files.length });

    return { fileSystem, files, reader: this.readers.get(filetype) };
  }

  private async openMaterialized(splitFiles: SplitFiles): Promise<{ handle: InMemoryDataset; rowBudget: number }> {
    const rows: Row[] = [];
    const columns = new Set<string>();
    for await (const row of this.readRows(splitFiles, columns)) {
      rows.push(row);
    }

    const dataset = new InMemoryDataset(rows, [...columns]);
    if (this.rowLimit === undefined) {
      return { handle: dataset, rowBudget: rows.length };
    }
    const rowBudget = Math.min(this.rowLimit, rows.length);
    return { handle: dataset.select(rowBudget), rowBudget };
  }

  private async openStreaming(splitFiles: SplitFiles): Promise<{ handle: IterableDataset; rowBudget: number }> {
    const factory = (): AsyncGenerator<Row, void, undefined> => this.readRows(splitFiles);
    if (this.rowLimit !== undefined) {
      // Columns come from the first row; reads reject rows that add columns.
      return { handle: new IterableDataset(factory), rowBudget: this.rowLimit };
    }

    // A stream cannot report its length: count the rows and collect the columns with a second, full pass.
    let rowBudget = 0;
    const columns = new Set<string>();
    const rows = this.readRows(splitFiles, columns);
    while (!(await rows.next()).done) rowBudget++;
    return { handle: new IterableDataset(factory, { columns: [...columns] }), rowBudget };
  }

  /** Reads the rows of every file in order, adding header columns and row keys to `columns` when given. */
  private async *readRows(splitFiles: SplitFiles, columns?: Set<string>): AsyncGenerator<Row, void, undefined> {
    const source = describeSource(this.descriptor);

    for (const file of splitFiles.files) {
      let content: string;
      try {
        content = await splitFiles.fileSystem.readText(file);
      } catch (error) {
        throw asSourceUnavailable(error, `${source}: cannot read '${file}'`, { source, path: file });
      }

      try {
        for (const name of splitFiles.reader.header?.(content) ?? []) columns?.add(name);
        for (const row of splitFiles.reader.parse(content)) {
          for (const key of Object.keys(row)) columns?.add(key);
          yield row;
        }
      } catch (error) {
        throw new SchemaViolationError(
          `${source}: malformed data in '${file}': ${errorMessage(error)}`,
          { source, path: file },
          { cause: error },
        );
      }
    }
  }

  private requireOpened(): OpenedFiles {
    if (!this.opened) throw new SourceNotOpenedError(describeSource(this.descriptor));
    return this.opened;
  }
}
