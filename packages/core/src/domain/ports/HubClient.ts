import type { DatasetHandle } from './DatasetHandle.js';

/** Row count of one split, as reported by the metadata service. */
export interface SplitInfo {
  readonly name: string;
  readonly numExamples: number;
}

/** Metadata of one dataset configuration. */
export interface DatasetInfo {
  /** Feature description keyed by column name, in schema order. */
  readonly features: Readonly<Record<string, unknown>>;
  readonly splits: Readonly<Record<string, SplitInfo>>;
}

/** Dataset infos keyed by configuration name. Unnamed configurations use `'default'`. */
export type DatasetInfos = Readonly<Record<string, DatasetInfo>>;

export interface HubLoadRequest {
  readonly repoId: string;
  readonly config?: string;
  readonly split: string;
  readonly streaming: boolean;
}

/**
 * Port for a remote dataset repository.
 *
 * `getDatasetInfos()` is a lightweight metadata query (no row transfer).
 * `loadDataset()` opens a handle over the rows of one split.
 */
export interface HubClient {
  getDatasetInfos(repoId: string): Promise<DatasetInfos>;
  loadDataset(request: HubLoadRequest): Promise<DatasetHandle>;
}
