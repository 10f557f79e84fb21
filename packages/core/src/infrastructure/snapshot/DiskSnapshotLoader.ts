import { posix } from 'node:path';
import type { Row } from '../../domain/model/Row.js';
import type { FileSystem } from '../../domain/ports/FileSystem.js';
import type { SnapshotLoader, SnapshotNode } from '../../domain/ports/SnapshotLoader.js';
import { SourceUnavailableError, errorMessage } from '../../domain/errors/RowstreamError.js';
import { InMemoryDataset } from '../datasets/InMemoryDataset.js';
import { JsonReader } from '../readers/JsonReader.js';
import { joinPath } from '../filesystem/FileSystemRegistry.js';
import { isRecord } from '../utils/isRecord.js';

const DATASET_DICT_FILE = 'dataset_dict.json';
const STATE_FILE = 'state.json';
const INFO_FILE = 'dataset_info.json';

/**
 * Reads snapshots laid out as directories of JSON metadata and JSON Lines data:
 *
 * ```text
 * snapshot/                    distiset/
 *   dataset_dict.json            config_a/
 *   train/                         dataset_dict.json
 *     state.json                   train/ ...
 *     dataset_info.json          config_b/ ...
 *     data-00000-of-00001.jsonl
 * ```
 *
 * - `dataset_dict.json` — `{ "splits": ["train", ...] }`, one sub-directory per split.
 * - `state.json` — `{ "_data_files": [{ "filename": "..." }] }`, the data files in row order.
 * - `dataset_info.json` — optional, `{ "features": { "<column>": ... } }` fixes the column order.
 *
 * Every dataset is loaded into memory.
 */
export class DiskSnapshotLoader implements SnapshotLoader {
  private readonly reader = new JsonReader({ format: 'lines' });

  async load(path: string, fileSystem: FileSystem): Promise<SnapshotNode> {
    const node = await this.loadNode(path, fileSystem);
    if (!node) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: no dataset or dataset dict found at '${path}'`, { path });
    }
    return node;
  }

  async loadDistiset(path: string, fileSystem: FileSystem): Promise<SnapshotNode> {
    if (!(await fileSystem.isDirectory(path))) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: '${path}' is not a directory`, { path });
    }

    const entries = new Map<string, SnapshotNode>();
    for (const child of [...(await fileSystem.list(path))].sort()) {
      if (!(await fileSystem.isDirectory(child))) continue;
      const node = await this.loadNode(child, fileSystem);
      if (node) entries.set(posix.basename(child), node);
    }

    if (entries.size === 0) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: no configurations found in distiset '${path}'`, { path });
    }
    return { kind: 'collection', entries };
  }

  private async loadNode(path: string, fileSystem: FileSystem): Promise<SnapshotNode | null> {
    if (await fileSystem.isFile(joinPath(path, DATASET_DICT_FILE))) {
      return this.loadDatasetDict(path, fileSystem);
    }
    if (await fileSystem.isFile(joinPath(path, STATE_FILE))) {
      return { kind: 'dataset', dataset: await this.loadDataset(path, fileSystem) };
    }
    return null;
  }

  private async loadDatasetDict(path: string, fileSystem: FileSystem): Promise<SnapshotNode> {
    const dict = await this.readJson(joinPath(path, DATASET_DICT_FILE), fileSystem);
    const splits = dict['splits'];
    if (!Array.isArray(splits) || !splits.every((split): split is string => typeof split === 'string')) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: '${DATASET_DICT_FILE}' must list its splits`, { path });
    }

    const entries = new Map<string, SnapshotNode>();
    for (const split of splits) {
      entries.set(split, { kind: 'dataset', dataset: await this.loadDataset(joinPath(path, split), fileSystem) });
    }
    return { kind: 'collection', entries };
  }

  private async loadDataset(path: string, fileSystem: FileSystem): Promise<InMemoryDataset> {
    const state = await this.readJson(joinPath(path, STATE_FILE), fileSystem);
    const dataFiles = state['_data_files'];
    if (!Array.isArray(dataFiles)) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: '${STATE_FILE}' must list '_data_files'`, { path });
    }

    const rows: Row[] = [];
    for (const entry of dataFiles) {
      const filename: unknown = isRecord(entry) ? entry['filename'] : undefined;
      if (typeof filename !== 'string') {
        throw new SourceUnavailableError(`DiskSnapshotLoader: data file entry without a filename`, { path });
      }
      const content = await this.readText(joinPath(path, filename), fileSystem);
      rows.push(...this.reader.parse(content));
    }

    return new InMemoryDataset(rows, await this.readColumns(path, fileSystem));
  }

  private async readColumns(path: string, fileSystem: FileSystem): Promise<readonly string[] | undefined> {
    const infoPath = joinPath(path, INFO_FILE);
    if (!(await fileSystem.isFile(infoPath))) return undefined;
    const features = (await this.readJson(infoPath, fileSystem))['features'];
    return isRecord(features) ? Object.keys(features) : undefined;
  }

  private async readJson(path: string, fileSystem: FileSystem): Promise<Record<string, unknown>> {
    const content = await this.readText(path, fileSystem);
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: '${path}' is not valid JSON`, { path }, { cause: error });
    }
    if (!isRecord(parsed)) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: '${path}' must hold a JSON object`, { path });
    }
    return parsed;
  }

  private async readText(path: string, fileSystem: FileSystem): Promise<string> {
    try {
      return await fileSystem.readText(path);
    } catch (error) {
      throw new SourceUnavailableError(`DiskSnapshotLoader: cannot read '${path}': ${errorMessage(error)}`, { path }, {
        cause: error,
      });
    }
  }
}
