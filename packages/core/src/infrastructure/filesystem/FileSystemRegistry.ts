import type { FileSystem, FileSystemFactory, StorageOptions } from '../../domain/ports/FileSystem.js';
import { SourceUnavailableError } from '../../domain/errors/RowstreamError.js';
import { NodeFileSystem } from './NodeFileSystem.js';

/** Protocol of a path such as `gcs://bucket/data`. Plain paths use `file`. */
export function protocolOf(path: string): string {
  const match = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//.exec(path);
  return match?.[1]?.toLowerCase() ?? 'file';
}

/**
 * Maps path protocols to filesystem factories.
 *
 * The `file` protocol is registered by default. Register object-storage backends
 * (`s3`, `gcs`, ...) with a factory that builds a client from the storage options.
 *
 * @example
 * ```typescript
 * const fileSystems = new FileSystemRegistry().register('gcs', (options) => new MyGcsFileSystem(options));
 * const source = new FilesystemSource({ path: 'gcs://bucket/data', storageOptions: { project: 'p' }, fileSystems });
 * ```
 */
export class FileSystemRegistry {
  private readonly factories = new Map<string, FileSystemFactory>();

  constructor() {
    this.register('file', () => new NodeFileSystem());
  }

  register(protocol: string, factory: FileSystemFactory): this {
    this.factories.set(protocol.toLowerCase(), factory);
    return this;
  }

  /** @throws SourceUnavailableError if no filesystem is registered for the path's protocol. */
  resolve(path: string, storageOptions?: StorageOptions): FileSystem {
    const protocol = protocolOf(path);
    const factory = this.factories.get(protocol);
    if (!factory) {
      throw new SourceUnavailableError(`No filesystem registered for protocol '${protocol}'`, { path, protocol });
    }
    return factory(storageOptions);
  }
}

/** Join a child name onto a path without collapsing a `protocol://` prefix. */
export function joinPath(base: string, name: string): string {
  return base.endsWith('/') ? `${base}${name}` : `${base}/${name}`;
}
