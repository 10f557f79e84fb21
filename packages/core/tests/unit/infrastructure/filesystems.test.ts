import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InMemoryFileSystem } from '../../../src/infrastructure/filesystem/InMemoryFileSystem.js';
import { NodeFileSystem } from '../../../src/infrastructure/filesystem/NodeFileSystem.js';
import { FileSystemRegistry, joinPath, protocolOf } from '../../../src/infrastructure/filesystem/FileSystemRegistry.js';
import { SourceUnavailableError } from '../../../src/domain/errors/RowstreamError.js';

describe('InMemoryFileSystem', () => {
  const fs = new InMemoryFileSystem({ 'data/a.csv': 'a', 'data/sub/b.csv': 'b' });

  it('should imply directories from file paths', async () => {
    expect(await fs.isDirectory('data')).toBe(true);
    expect(await fs.isDirectory('data/sub/')).toBe(true);
    expect(await fs.isFile('data')).toBe(false);
    expect(await fs.exists('data/sub/b.csv')).toBe(true);
    expect(await fs.exists('nothing')).toBe(false);
  });

  it('should list immediate children', async () => {
    expect(await fs.list('data')).toEqual(['data/a.csv', 'data/sub']);
  });

  it('should read and write contents', async () => {
    const local = new InMemoryFileSystem();
    local.writeText('notes.txt', 'hello');

    expect(await local.readText('notes.txt')).toBe('hello');
  });

  it('should reject reads of missing files', async () => {
    await expect(fs.readText('data/missing.csv')).rejects.toThrow("InMemoryFileSystem: no such file 'data/missing.csv'");
  });
});

describe('NodeFileSystem', () => {
  let root: string;

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'rowstream-nodefs-'));
    mkdirSync(join(root, 'dir'));
    writeFileSync(join(root, 'dir', 'rows.txt'), 'line\n');
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should tell files from directories', async () => {
    const fs = new NodeFileSystem();

    expect(await fs.isFile(join(root, 'dir', 'rows.txt'))).toBe(true);
    expect(await fs.isDirectory(join(root, 'dir'))).toBe(true);
    expect(await fs.exists(join(root, 'missing'))).toBe(false);
    expect(await fs.isFile(join(root, 'dir', 'rows.txt', 'below-a-file'))).toBe(false);
  });

  it('should read text', async () => {
    expect(await new NodeFileSystem().readText(join(root, 'dir', 'rows.txt'))).toBe('line\n');
  });

  it('should keep the file:// prefix when listing', async () => {
    expect(await new NodeFileSystem().list(`file://${join(root, 'dir')}`)).toEqual([
      `file://${join(root, 'dir', 'rows.txt')}`,
    ]);
  });
});

describe('FileSystemRegistry', () => {
  it('should read the protocol of a path', () => {
    expect(protocolOf('gcs://bucket/data')).toBe('gcs');
    expect(protocolOf('S3://bucket')).toBe('s3');
    expect(protocolOf('/tmp/data')).toBe('file');
    expect(protocolOf('data/train.csv')).toBe('file');
  });

  it('should resolve local paths to the node filesystem', () => {
    expect(new FileSystemRegistry().resolve('/tmp/data')).toBeInstanceOf(NodeFileSystem);
  });

  it('should pass storage options to the factory', () => {
    const received: unknown[] = [];
    const memory = new InMemoryFileSystem();
    const registry = new FileSystemRegistry().register('memory', (options) => {
      received.push(options);
      return memory;
    });

    expect(registry.resolve('memory://bucket', { token: 'test-token' })).toBe(memory);
    expect(received).toEqual([{ token: 'test-token' }]);
  });

  it('should fail for an unregistered protocol', () => {
    expect(() => new FileSystemRegistry().resolve('gcs://bucket/data')).toThrow(SourceUnavailableError);
    expect(() => new FileSystemRegistry().resolve('gcs://bucket/data')).toThrow(
      "No filesystem registered for protocol 'gcs'",
    );
  });

  it('should join paths without collapsing the protocol', () => {
    expect(joinPath('memory://bucket', 'a.json')).toBe('memory://bucket/a.json');
    expect(joinPath('data/', 'a.json')).toBe('data/a.json');
  });
});
