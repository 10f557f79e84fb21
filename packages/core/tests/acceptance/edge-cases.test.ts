import { describe, it, expect } from 'vitest';
import { DatasetLoader } from '../../src/DatasetLoader.js';
import { InlineSource } from '../../src/infrastructure/sources/InlineSource.js';
import { SnapshotSource } from '../../src/infrastructure/sources/SnapshotSource.js';
import { InMemoryDataset } from '../../src/infrastructure/datasets/InMemoryDataset.js';
import { InMemoryFileSystem } from '../../src/infrastructure/filesystem/InMemoryFileSystem.js';
import { FileSystemRegistry } from '../../src/infrastructure/filesystem/FileSystemRegistry.js';
import { EmptySourceError } from '../../src/domain/errors/RowstreamError.js';
import { RunStatus } from '../../src/domain/model/RunStatus.js';
import type { BatchContext } from '../../src/domain/ports/BatchConsumer.js';
import type { SnapshotLoader } from '../../src/domain/ports/SnapshotLoader.js';

function jsonl(count: number): string {
  return Array.from({ length: count }, (_, id) => JSON.stringify({ id })).join('\n');
}

function memory(files: Readonly<Record<string, string>>): FileSystemRegistry {
  const fileSystem = new InMemoryFileSystem(files);
  return new FileSystemRegistry().register('memory', () => fileSystem);
}

describe('Edge case: nothing to deliver', () => {
  it('should complete without batches for an empty dataset with a schema', async () => {
    const loader: SnapshotLoader = {
      load: () => Promise.resolve({ kind: 'dataset', dataset: new InMemoryDataset([], ['prompt']) }),
      loadDistiset: () => Promise.reject(new Error('not a distiset')),
    };
    const dataset = new DatasetLoader(new SnapshotSource({ snapshotPath: '/snapshots/empty', loader }));
    const batches: BatchContext[] = [];

    const summary = await dataset.run((_rows, context) => {
      batches.push(context);
    });

    expect(batches).toEqual([]);
    expect(summary).toMatchObject({ rowBudget: 0, rowsEmitted: 0, batchesEmitted: 0 });
    expect(dataset.status).toBe(RunStatus.COMPLETED);
  });

  it('should complete without batches for a row limit of zero', async () => {
    const loader = new DatasetLoader(new InlineSource({ rows: [{ id: 1 }], rowLimit: 0 }));
    let calls = 0;

    await loader.run(() => {
      calls++;
    });

    expect(calls).toBe(0);
    expect(loader.status).toBe(RunStatus.COMPLETED);
  });

  it('should complete without batches for a CSV holding only its header', async () => {
    const loader = DatasetLoader.fromConfig(
      { kind: 'filesystem', path: 'memory://header.csv' },
      { fileSystems: memory({ 'memory://header.csv': 'prompt,completion\n' }) },
    );
    let calls = 0;

    const summary = await loader.run(() => {
      calls++;
    });

    expect(calls).toBe(0);
    expect(summary).toMatchObject({ rowBudget: 0, rowsEmitted: 0, batchesEmitted: 0 });
    expect(loader.status).toBe(RunStatus.COMPLETED);
  });

  it('should fail for a source without columns', async () => {
    const loader = DatasetLoader.fromConfig(
      { kind: 'filesystem', path: 'memory://empty.csv' },
      { fileSystems: memory({ 'memory://empty.csv': '' }) },
    );

    await expect(loader.run(() => undefined)).rejects.toThrow(EmptySourceError);
  });
});

describe('Edge case: batch size and budget', () => {
  it('should deliver a single final batch when the batch size exceeds the budget', async () => {
    const loader = new DatasetLoader(new InlineSource({ rows: [{ id: 0 }, { id: 1 }, { id: 2 }] }));
    const contexts: BatchContext[] = [];

    await loader.run((_rows, context) => {
      contexts.push(context);
    });

    expect(contexts).toEqual([expect.objectContaining({ batchIndex: 0, startRow: 0, isLast: true, rowBudget: 3 })]);
  });

  it('should end on a short read when a stream holds fewer rows than its limit', async () => {
    const loader = DatasetLoader.fromConfig(
      { kind: 'filesystem', path: 'memory://rows.jsonl', streaming: true, rowLimit: 10 },
      { batchSize: 4, fileSystems: memory({ 'memory://rows.jsonl': jsonl(6) }) },
    );
    const contexts: BatchContext[] = [];
    const sizes: number[] = [];

    const summary = await loader.run((rows, context) => {
      sizes.push(rows.length);
      contexts.push(context);
    });

    expect(sizes).toEqual([4, 2]);
    expect(contexts.map((c) => c.isLast)).toEqual([false, true]);
    expect(summary).toMatchObject({ rowBudget: 10, rowsEmitted: 6 });
    expect(loader.status).toBe(RunStatus.COMPLETED);
  });

  it('should count a stream without limit before the first batch', async () => {
    const loader = DatasetLoader.fromConfig(
      { kind: 'filesystem', path: 'memory://rows.jsonl', streaming: true },
      { batchSize: 4, fileSystems: memory({ 'memory://rows.jsonl': jsonl(6) }) },
    );
    const contexts: BatchContext[] = [];

    await loader.run((_rows, context) => {
      contexts.push(context);
    });

    expect(contexts.map((c) => [c.startRow, c.rowBudget, c.isLast])).toEqual([
      [0, 6, false],
      [4, 6, true],
    ]);
  });
});
