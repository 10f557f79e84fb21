import { describe, it, expect, vi } from 'vitest';
import { InMemoryDataset } from '../../../src/infrastructure/datasets/InMemoryDataset.js';
import { IterableDataset } from '../../../src/infrastructure/datasets/IterableDataset.js';
import { RemoteRowsDataset } from '../../../src/infrastructure/hub/RemoteRowsDataset.js';
import type { RowsPage } from '../../../src/infrastructure/hub/RemoteRowsDataset.js';
import type { Row } from '../../../src/domain/model/Row.js';
import { SchemaViolationError } from '../../../src/domain/errors/RowstreamError.js';

function generateRows(count: number): Row[] {
  return Array.from({ length: count }, (_, id) => ({ id }));
}

describe('InMemoryDataset', () => {
  it('should read a window of rows as columns', async () => {
    const dataset = new InMemoryDataset([{ a: 1, b: 'x' }, { a: 2 }, { a: 3, b: 'z' }]);

    expect(await dataset.read(1, 5)).toEqual({ a: [2, 3], b: [null, 'z'] });
  });

  it('should restrict the rows with select()', async () => {
    const dataset = new InMemoryDataset(generateRows(10)).select(4);

    expect(await dataset.numRows()).toBe(4);
    expect(await dataset.read(2, 10)).toEqual({ id: [2, 3] });
  });

  it('should keep explicit columns', async () => {
    expect(await new InMemoryDataset([], ['a', 'b']).columns()).toEqual(['a', 'b']);
  });
});

describe('IterableDataset', () => {
  function counting(rows: readonly Row[]): { factory: () => AsyncGenerator<Row>; passes: () => number } {
    let passes = 0;
    return {
      factory: async function* () {
        passes++;
        await Promise.resolve();
        yield* rows;
      },
      passes: () => passes,
    };
  }

  it('should not know its row count', async () => {
    expect(await new IterableDataset(counting(generateRows(3)).factory).numRows()).toBeUndefined();
  });

  it('should take its columns from the first row', async () => {
    const dataset = new IterableDataset(counting([{ b: 1, a: 2 }]).factory);

    expect(await dataset.columns()).toEqual(['b', 'a']);
  });

  it('should continue sequential reads within one pass', async () => {
    const stream = counting(generateRows(5));
    const dataset = new IterableDataset(stream.factory, { columns: ['id'] });

    expect(await dataset.read(0, 2)).toEqual({ id: [0, 1] });
    expect(await dataset.read(2, 2)).toEqual({ id: [2, 3] });
    expect(await dataset.read(4, 2)).toEqual({ id: [4] });
    expect(stream.passes()).toBe(1);
  });

  it('should skip rows before a forward read', async () => {
    const dataset = new IterableDataset(counting(generateRows(10)).factory, { columns: ['id'] });

    expect(await dataset.read(6, 2)).toEqual({ id: [6, 7] });
  });

  it('should start a new pass for a read before the current position', async () => {
    const stream = counting(generateRows(5));
    const dataset = new IterableDataset(stream.factory, { columns: ['id'] });

    await dataset.read(0, 4);
    expect(await dataset.read(1, 2)).toEqual({ id: [1, 2] });
    expect(stream.passes()).toBe(2);
  });

  it('should stop at the limit set by select()', async () => {
    const dataset = new IterableDataset(counting(generateRows(10)).factory, { columns: ['id'] }).select(3);

    expect(await dataset.read(0, 10)).toEqual({ id: [0, 1, 2] });
  });

  it('should reject a row with a column it does not declare', async () => {
    const dataset = new IterableDataset(counting([{ id: 0 }, { id: 1, note: 'late' }]).factory);

    const error: unknown = await dataset.read(0, 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({
      message: "IterableDataset: row 1 has column 'note' outside [id]",
      details: { row: 1, column: 'note', columns: ['id'] },
    });
  });

  it('should fill declared columns missing from a row with null', async () => {
    const dataset = new IterableDataset(counting([{ id: 0 }, { id: 1, note: 'late' }]).factory, {
      columns: ['id', 'note'],
    });

    expect(await dataset.read(0, 2)).toEqual({ id: [0, 1], note: [null, 'late'] });
  });
});

describe('RemoteRowsDataset', () => {
  const total = 250;
  const rows = generateRows(total);

  function pages(): { fetchPage: (offset: number, length: number) => Promise<RowsPage>; calls: Array<[number, number]> } {
    const calls: Array<[number, number]> = [];
    return {
      calls,
      fetchPage: (offset, length) => {
        calls.push([offset, length]);
        return Promise.resolve({ columns: ['id'], rows: rows.slice(offset, offset + length), numRowsTotal: total });
      },
    };
  }

  it('should read across pages with one request per page', async () => {
    const remote = pages();
    const dataset = new RemoteRowsDataset({ fetchPage: remote.fetchPage, pageSize: 100, streaming: false });

    const batch = await dataset.read(50, 120);

    expect(batch['id']).toEqual(Array.from({ length: 120 }, (_, i) => 50 + i));
    expect(remote.calls).toEqual([
      [0, 1],
      [50, 100],
      [150, 20],
    ]);
  });

  it('should report the total unless streaming', async () => {
    const remote = pages();

    expect(await new RemoteRowsDataset({ ...remote, pageSize: 100, streaming: false }).numRows()).toBe(250);
    expect(await new RemoteRowsDataset({ ...remote, pageSize: 100, streaming: true }).numRows()).toBeUndefined();
  });

  it('should reuse a prefetched first page', async () => {
    const remote = pages();
    const firstPage: RowsPage = { columns: ['id'], rows: rows.slice(0, 100), numRowsTotal: total };
    const fetchPage = vi.fn(remote.fetchPage);
    const dataset = new RemoteRowsDataset({ fetchPage, pageSize: 100, streaming: false, firstPage });

    expect(await dataset.columns()).toEqual(['id']);
    expect(await dataset.numRows()).toBe(250);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('should truncate with select()', async () => {
    const remote = pages();
    const dataset = new RemoteRowsDataset({ fetchPage: remote.fetchPage, pageSize: 100, streaming: false }).select(5);

    expect(await dataset.numRows()).toBe(5);
    expect((await dataset.read(3, 10))['id']).toEqual([3, 4]);
  });
});
