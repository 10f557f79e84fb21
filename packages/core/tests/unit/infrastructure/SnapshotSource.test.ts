import { describe, it, expect } from 'vitest';
import { SnapshotSource } from '../../../src/infrastructure/sources/SnapshotSource.js';
import { DiskSnapshotLoader } from '../../../src/infrastructure/snapshot/DiskSnapshotLoader.js';
import { InMemoryFileSystem } from '../../../src/infrastructure/filesystem/InMemoryFileSystem.js';
import { FileSystemRegistry } from '../../../src/infrastructure/filesystem/FileSystemRegistry.js';
import { InMemoryDataset } from '../../../src/infrastructure/datasets/InMemoryDataset.js';
import { SourceUnavailableError, UnsupportedModeError } from '../../../src/domain/errors/RowstreamError.js';
import type { SnapshotLoader, SnapshotNode } from '../../../src/domain/ports/SnapshotLoader.js';

const FILES: Readonly<Record<string, string>> = {
  // A dataset dict with two splits.
  'memory://snap/dataset_dict.json': '{"splits":["train","test"]}',
  'memory://snap/train/state.json':
    '{"_data_files":[{"filename":"data-00000-of-00002.jsonl"},{"filename":"data-00001-of-00002.jsonl"}]}',
  'memory://snap/train/dataset_info.json': '{"features":{"prompt":{"dtype":"string"},"completion":{"dtype":"string"}}}',
  'memory://snap/train/data-00000-of-00002.jsonl':
    '{"completion":"c1","prompt":"p1"}\n{"completion":"c2","prompt":"p2"}\n',
  'memory://snap/train/data-00001-of-00002.jsonl': '{"completion":"c3","prompt":"p3"}\n',
  'memory://snap/test/state.json': '{"_data_files":[{"filename":"data.jsonl"}]}',
  'memory://snap/test/data.jsonl': '{"prompt":"q1"}\n',

  // A single dataset.
  'memory://single/state.json': '{"_data_files":[{"filename":"data.jsonl"}]}',
  'memory://single/data.jsonl': '{"text":"only"}\n',

  // A distiset: one dataset dict and one dataset, plus entries that are not datasets.
  'memory://distiset/README.md': '# results',
  'memory://distiset/generate/dataset_dict.json': '{"splits":["train"]}',
  'memory://distiset/generate/train/state.json': '{"_data_files":[{"filename":"data.jsonl"}]}',
  'memory://distiset/generate/train/data.jsonl': '{"generation":"g1"}\n{"generation":"g2"}\n',
  'memory://distiset/judge/state.json': '{"_data_files":[{"filename":"data.jsonl"}]}',
  'memory://distiset/judge/data.jsonl': '{"rating":5}\n',
  'memory://distiset/figures/plot.txt': 'not a dataset',

  // Broken snapshots.
  'memory://broken-json/state.json': '{',
  'memory://no-files/state.json': '{"version":1}',
  'memory://missing-data/state.json': '{"_data_files":[{"filename":"data.jsonl"}]}',
};

function memory(): FileSystemRegistry {
  const fileSystem = new InMemoryFileSystem(FILES);
  return new FileSystemRegistry().register('memory', () => fileSystem);
}

describe('SnapshotSource', () => {
  it('should read one split of a dataset dict in feature order', async () => {
    const source = new SnapshotSource({ snapshotPath: 'memory://snap', split: 'train', fileSystems: memory() });
    await source.open();

    expect(source.rowCount()).toBe(3);
    expect(source.columns()).toEqual(['prompt', 'completion']);
    expect(await source.readColumnar(0, 10)).toEqual({ prompt: ['p1', 'p2', 'p3'], completion: ['c1', 'c2', 'c3'] });
  });

  it('should take the columns from the rows without dataset info', async () => {
    const source = new SnapshotSource({ snapshotPath: 'memory://snap', split: 'test', fileSystems: memory() });
    await source.open();

    expect(source.columns()).toEqual(['prompt']);
  });

  it('should truncate to the row limit', async () => {
    const source = new SnapshotSource({
      snapshotPath: 'memory://snap',
      split: 'train',
      rowLimit: 2,
      fileSystems: memory(),
    });
    await source.open();

    expect(source.rowCount()).toBe(2);
    expect(await source.readColumnar(1, 10)).toEqual({ prompt: ['p2'], completion: ['c2'] });
  });

  it('should read a single dataset without a split', async () => {
    const source = new SnapshotSource({ snapshotPath: 'memory://single', fileSystems: memory() });
    await source.open();

    expect(await source.readColumnar(0, 10)).toEqual({ text: ['only'] });
  });

  it('should ignore the config of a snapshot that is not a distiset', async () => {
    const source = new SnapshotSource({
      snapshotPath: 'memory://snap',
      config: 'anything',
      split: 'test',
      fileSystems: memory(),
    });
    await source.open();

    expect(source.rowCount()).toBe(1);
  });

  it('should fail when a dataset dict is not indexed by split', async () => {
    const source = new SnapshotSource({ snapshotPath: 'memory://snap', fileSystems: memory() });

    await expect(source.open()).rejects.toThrow(
      "snapshot:memory://snap: the snapshot holds several datasets (train, test), select one with 'config' or 'split'",
    );
  });

  it('should fail for an unknown split', async () => {
    const source = new SnapshotSource({ snapshotPath: 'memory://snap', split: 'validation', fileSystems: memory() });

    await expect(source.open()).rejects.toThrow(
      "snapshot:memory://snap[validation]: split 'validation' not found. Available: train, test",
    );
  });

  it('should fail for a split of a single dataset', async () => {
    const source = new SnapshotSource({ snapshotPath: 'memory://single', split: 'train', fileSystems: memory() });

    await expect(source.open()).rejects.toThrow(
      "snapshot:memory://single[train]: cannot select split 'train' of a single dataset",
    );
  });

  it('should not stream', async () => {
    const source = new SnapshotSource({
      snapshotPath: 'memory://snap',
      split: 'train',
      streaming: true,
      fileSystems: memory(),
    });

    const error: unknown = await source.open().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsupportedModeError);
    expect(error).toMatchObject({ message: 'snapshot:memory://snap[train]: streaming is not supported for snapshots' });
  });

  describe('distisets', () => {
    it('should index by config, then by split', async () => {
      const source = new SnapshotSource({
        snapshotPath: 'memory://distiset',
        isDistiset: true,
        config: 'generate',
        split: 'train',
        fileSystems: memory(),
      });
      await source.open();

      expect(await source.readColumnar(0, 10)).toEqual({ generation: ['g1', 'g2'] });
    });

    it('should read a config that holds a single dataset', async () => {
      const source = new SnapshotSource({
        snapshotPath: 'memory://distiset',
        isDistiset: true,
        config: 'judge',
        fileSystems: memory(),
      });
      await source.open();

      expect(source.rowCount()).toBe(1);
      expect(source.columns()).toEqual(['rating']);
    });

    it('should fail for an unknown config', async () => {
      const source = new SnapshotSource({
        snapshotPath: 'memory://distiset',
        isDistiset: true,
        config: 'missing',
        fileSystems: memory(),
      });

      await expect(source.open()).rejects.toThrow(
        "snapshot:memory://distiset[missing]: config 'missing' not found. Available: generate, judge",
      );
    });

    it('should fail when no config is selected', async () => {
      const source = new SnapshotSource({ snapshotPath: 'memory://distiset', isDistiset: true, fileSystems: memory() });

      await expect(source.open()).rejects.toThrow(
        "snapshot:memory://distiset: the snapshot holds several datasets (generate, judge), select one with 'config' or 'split'",
      );
    });
  });

  it('should wrap loader failures', async () => {
    const loader: SnapshotLoader = {
      load: () => Promise.reject(new Error('disk full')),
      loadDistiset: () => Promise.reject(new Error('disk full')),
    };
    const source = new SnapshotSource({ snapshotPath: 'memory://snap', split: 'train', loader, fileSystems: memory() });

    const error: unknown = await source.open().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ message: 'snapshot:memory://snap[train]: cannot load snapshot: disk full' });
  });

  it('should use a custom loader', async () => {
    const node: SnapshotNode = {
      kind: 'collection',
      entries: new Map<string, SnapshotNode>([['train', { kind: 'dataset', dataset: new InMemoryDataset([{ id: 1 }, { id: 2 }]) }]]),
    };
    const loader: SnapshotLoader = {
      load: () => Promise.resolve(node),
      loadDistiset: () => Promise.reject(new Error('not a distiset')),
    };
    const source = new SnapshotSource({ snapshotPath: '/snapshots/ids', split: 'train', loader });
    await source.open();

    expect(await source.readColumnar(0, 10)).toEqual({ id: [1, 2] });
  });
});

describe('DiskSnapshotLoader', () => {
  const loader = new DiskSnapshotLoader();
  const fileSystem = new InMemoryFileSystem(FILES);

  it('should load a dataset dict as a collection of splits', async () => {
    const node = await loader.load('memory://snap', fileSystem);

    expect(node.kind).toBe('collection');
    expect(node.kind === 'collection' ? [...node.entries.keys()] : []).toEqual(['train', 'test']);
  });

  it('should fail where there is no snapshot', async () => {
    await expect(loader.load('memory://nowhere', fileSystem)).rejects.toThrow(
      "DiskSnapshotLoader: no dataset or dataset dict found at 'memory://nowhere'",
    );
  });

  it('should fail on invalid JSON', async () => {
    await expect(loader.load('memory://broken-json', fileSystem)).rejects.toThrow(
      "DiskSnapshotLoader: 'memory://broken-json/state.json' is not valid JSON",
    );
  });

  it('should fail on a state without data files', async () => {
    await expect(loader.load('memory://no-files', fileSystem)).rejects.toThrow(
      "DiskSnapshotLoader: 'state.json' must list '_data_files'",
    );
  });

  it('should fail on a missing data file', async () => {
    await expect(loader.load('memory://missing-data', fileSystem)).rejects.toThrow(
      "DiskSnapshotLoader: cannot read 'memory://missing-data/data.jsonl': " +
        "InMemoryFileSystem: no such file 'memory://missing-data/data.jsonl'",
    );
  });

  it('should require a directory for a distiset', async () => {
    await expect(loader.loadDistiset('memory://snap/dataset_dict.json', fileSystem)).rejects.toThrow(
      "DiskSnapshotLoader: 'memory://snap/dataset_dict.json' is not a directory",
    );
  });

  it('should fail on a distiset without configurations', async () => {
    await expect(loader.loadDistiset('memory://snap/train', fileSystem)).rejects.toThrow(
      "DiskSnapshotLoader: no configurations found in distiset 'memory://snap/train'",
    );
  });
});
