import type { DatasetHandle } from '../ports/DatasetHandle.js';
import type { DatasetInfo, DatasetInfos } from '../ports/HubClient.js';
import type { HubDescriptor, SourceDescriptor } from '../model/SourceDescriptor.js';
import { describeSource } from '../model/SourceDescriptor.js';
import { EmptySourceError, SourceUnavailableError } from '../errors/RowstreamError.js';

/** Configuration name used by the metadata service when a dataset has a single unnamed one. */
export const DEFAULT_CONFIG = 'default';

/**
 * Metadata of the configuration a hub descriptor points at.
 *
 * @throws SourceUnavailableError if the configuration is not listed.
 */
export function datasetInfoFor(infos: DatasetInfos, descriptor: HubDescriptor): DatasetInfo {
  const config = descriptor.config ?? DEFAULT_CONFIG;
  const info = infos[config];
  if (!info) {
    throw new SourceUnavailableError(`${describeSource(descriptor)}: config '${config}' not found`, {
      source: describeSource(descriptor),
      config,
      available: Object.keys(infos),
    });
  }
  return info;
}

/** Output columns of a hub source: the feature keys of its configuration. */
export function columnsFromDatasetInfo(infos: DatasetInfos, descriptor: HubDescriptor): readonly string[] {
  return requireColumns(Object.keys(datasetInfoFor(infos, descriptor).features), descriptor);
}

/** Output columns of a local source, read off its opened handle. */
export async function columnsFromHandle(handle: DatasetHandle, descriptor: SourceDescriptor): Promise<readonly string[]> {
  return requireColumns(await handle.columns(), descriptor);
}

function requireColumns(columns: readonly string[], descriptor: SourceDescriptor): readonly string[] {
  if (columns.length === 0) {
    throw new EmptySourceError(`${describeSource(descriptor)}: no columns could be resolved`, {
      source: describeSource(descriptor),
    });
  }
  return [...columns];
}
