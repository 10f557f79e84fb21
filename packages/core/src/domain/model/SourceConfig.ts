import type { Row } from './Row.js';
import type { StorageOptions } from '../ports/FileSystem.js';
import { InvalidConfigurationError } from '../errors/RowstreamError.js';

/** Options shared by every source kind. */
interface CommonSourceConfig {
  /** Read rows lazily instead of materializing the dataset at open time. Default: `false`. */
  readonly streaming?: boolean;
  /** Maximum number of rows to deliver. Default: every row of the source. */
  readonly rowLimit?: number;
}

export interface HubSourceConfig extends CommonSourceConfig {
  readonly kind: 'hub';
  /** Repository identifier of the dataset, e.g. `'org/dataset'`. */
  readonly repoId: string;
  /** Dataset configuration. Only needed when the dataset has several. */
  readonly config?: string;
  /** Split to load. Default: `'train'`. */
  readonly split?: string;
}

export interface FilesystemSourceConfig extends CommonSourceConfig {
  readonly kind: 'filesystem';
  /** A data file, or a directory of data files. May carry a protocol, e.g. `gcs://bucket/data`. */
  readonly path: string;
  /** Filetype of the data files. Default: inferred from the extension of the first file. */
  readonly filetype?: string;
  /** Split to load. Default: `'train'`. */
  readonly split?: string;
  /** Passed to the filesystem factory of the path's protocol. */
  readonly storageOptions?: StorageOptions;
}

export interface SnapshotSourceConfig extends CommonSourceConfig {
  readonly kind: 'snapshot';
  /** Directory of the snapshot. */
  readonly snapshotPath: string;
  /** Configuration to select. Only used for distisets. */
  readonly config?: string;
  /** Split to select. Default: none, the snapshot must then be a single dataset. */
  readonly split?: string;
  /** The snapshot is a distiset: one dataset or dataset dict per configuration. Default: `false`. */
  readonly isDistiset?: boolean;
  /** Passed to the filesystem factory of the path's protocol. */
  readonly storageOptions?: StorageOptions;
}

export interface InlineSourceConfig extends CommonSourceConfig {
  readonly kind: 'inline';
  readonly rows: readonly Row[];
  /** Name used in logs and errors. Default: `'inline'`. */
  readonly name?: string;
}

/** Configuration surface of a source, tagged by kind. */
export type SourceConfig = HubSourceConfig | FilesystemSourceConfig | SnapshotSourceConfig | InlineSourceConfig;

/**
 * Validate a source configuration.
 *
 * @throws InvalidConfigurationError on an empty repository id or path, or a row limit that is not a non-negative integer.
 */
export function validateSourceConfig(config: SourceConfig): void {
  switch (config.kind) {
    case 'hub':
      requireNonEmpty('repoId', config.repoId);
      break;
    case 'filesystem':
      requireNonEmpty('path', config.path);
      break;
    case 'snapshot':
      requireNonEmpty('snapshotPath', config.snapshotPath);
      break;
    case 'inline':
      break;
  }

  if (config.rowLimit !== undefined && (!Number.isInteger(config.rowLimit) || config.rowLimit < 0)) {
    throw new InvalidConfigurationError('rowLimit must be a non-negative integer', {
      kind: config.kind,
      rowLimit: config.rowLimit,
    });
  }
}

function requireNonEmpty(field: string, value: string): void {
  if (value.trim() === '') {
    throw new InvalidConfigurationError(`${field} must not be empty`, { field });
  }
}
