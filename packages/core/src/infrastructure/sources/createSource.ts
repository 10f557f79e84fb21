import type { SourceConfig } from '../../domain/model/SourceConfig.js';
import type { HubClient } from '../../domain/ports/HubClient.js';
import type { Logger } from '../../domain/ports/Logger.js';
import type { SnapshotLoader } from '../../domain/ports/SnapshotLoader.js';
import type { SourceAdapter } from '../../domain/ports/SourceAdapter.js';
import type { FileSystemRegistry } from '../filesystem/FileSystemRegistry.js';
import type { FileReaderRegistry } from '../readers/FileReaderRegistry.js';
import { FilesystemSource } from './FilesystemSource.js';
import { HubSource } from './HubSource.js';
import { InlineSource } from './InlineSource.js';
import { SnapshotSource } from './SnapshotSource.js';

/** Collaborators shared by the sources a factory builds. Each falls back to the source's own default. */
export interface SourceDependencies {
  readonly hubClient?: HubClient;
  readonly fileSystems?: FileSystemRegistry;
  readonly readers?: FileReaderRegistry;
  readonly snapshotLoader?: SnapshotLoader;
  readonly logger?: Logger;
}

/** Build the source adapter for a configuration. */
export function createSource(config: SourceConfig, dependencies: SourceDependencies = {}): SourceAdapter {
  const { hubClient, fileSystems, readers, snapshotLoader, logger } = dependencies;

  switch (config.kind) {
    case 'hub':
      return new HubSource({ ...config, client: hubClient, logger });
    case 'filesystem':
      return new FilesystemSource({ ...config, fileSystems, readers, logger });
    case 'snapshot':
      return new SnapshotSource({ ...config, loader: snapshotLoader, fileSystems, logger });
    case 'inline':
      return new InlineSource(config);
  }
}
