import type { DatasetHandle } from './DatasetHandle.js';
import type { FileSystem } from './FileSystem.js';

/** A loaded snapshot: either one dataset or a collection keyed by config or split name. */
export type SnapshotNode =
  | { readonly kind: 'dataset'; readonly dataset: DatasetHandle }
  | { readonly kind: 'collection'; readonly entries: ReadonlyMap<string, SnapshotNode> };

/** Port for reading a previously materialized snapshot. The on-disk format is opaque to the sources. */
export interface SnapshotLoader {
  /** Load a dataset or a dataset dict (keyed by split). */
  load(path: string, fileSystem: FileSystem): Promise<SnapshotNode>;
  /** Load a distiset: a collection keyed by config, each entry a dataset or a dataset dict. */
  loadDistiset(path: string, fileSystem: FileSystem): Promise<SnapshotNode>;
}
