// Main entry point
export { DatasetLoader } from './DatasetLoader.js';
export type { DatasetLoaderConfig } from './DatasetLoader.js';

// Domain model
export type { Row, ColumnarBatch, ProducedBatch } from './domain/model/Row.js';
export { columnarLength, isEmptyRow } from './domain/model/Row.js';
export type {
  SourceDescriptor,
  SourceKind,
  HubDescriptor,
  FilesystemDescriptor,
  SnapshotDescriptor,
  InlineDescriptor,
} from './domain/model/SourceDescriptor.js';
export { describeSource } from './domain/model/SourceDescriptor.js';
export type {
  SourceConfig,
  HubSourceConfig,
  FilesystemSourceConfig,
  SnapshotSourceConfig,
  InlineSourceConfig,
} from './domain/model/SourceConfig.js';
export { validateSourceConfig } from './domain/model/SourceConfig.js';
export type { Checkpoint, RunSummary } from './domain/model/Checkpoint.js';
export { RunStatus, canTransition, isRunStatus } from './domain/model/RunStatus.js';

// Errors
export {
  ErrorCode,
  RowstreamError,
  SourceUnavailableError,
  EmptySourceError,
  UnresolvableFiletypeError,
  UnsupportedModeError,
  SchemaViolationError,
  InvalidConfigurationError,
  SourceNotOpenedError,
  isRowstreamError,
  errorMessage,
} from './domain/errors/RowstreamError.js';
export type { ErrorDetails } from './domain/errors/RowstreamError.js';

// Use case result types
export type { ChunkOptions, ChunkResult } from './application/usecases/ProcessChunk.js';

// Domain services (the batch protocol)
export { BatchProducer } from './domain/services/BatchProducer.js';
export { toRows, toColumnar, columnsOf } from './domain/services/Transposer.js';
export { classifyPath, inferFiletype, filesForSplit, DEFAULT_SPLIT } from './domain/services/PathClassifier.js';
export type { DataFiles, Classification } from './domain/services/PathClassifier.js';
export {
  columnsFromDatasetInfo,
  columnsFromHandle,
  datasetInfoFor,
  DEFAULT_CONFIG,
} from './domain/services/SchemaResolver.js';

// Application internals (for extension packages)
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { SourceAdapter } from './domain/ports/SourceAdapter.js';
export type { DatasetHandle } from './domain/ports/DatasetHandle.js';
export type { BatchConsumer, BatchContext } from './domain/ports/BatchConsumer.js';
export type { CheckpointStore } from './domain/ports/CheckpointStore.js';
export type { HubClient, HubLoadRequest, DatasetInfo, DatasetInfos, SplitInfo } from './domain/ports/HubClient.js';
export type { FileSystem, FileSystemFactory, StorageOptions } from './domain/ports/FileSystem.js';
export type { FileReader } from './domain/ports/FileReader.js';
export type { SnapshotLoader, SnapshotNode } from './domain/ports/SnapshotLoader.js';
export type { Logger, LogLevel, LogContext } from './domain/ports/Logger.js';
export { noopLogger } from './domain/ports/Logger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SourceOpenedEvent,
  BatchProducedEvent,
  RunCompletedEvent,
  RunFailedEvent,
  ChunkCompletedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources)
export { HubSource } from './infrastructure/sources/HubSource.js';
export type { HubSourceOptions } from './infrastructure/sources/HubSource.js';
export { FilesystemSource } from './infrastructure/sources/FilesystemSource.js';
export type { FilesystemSourceOptions } from './infrastructure/sources/FilesystemSource.js';
export { SnapshotSource } from './infrastructure/sources/SnapshotSource.js';
export type { SnapshotSourceOptions } from './infrastructure/sources/SnapshotSource.js';
export { InlineSource } from './infrastructure/sources/InlineSource.js';
export type { InlineSourceOptions } from './infrastructure/sources/InlineSource.js';
export { createSource } from './infrastructure/sources/createSource.js';
export type { SourceDependencies } from './infrastructure/sources/createSource.js';

// Infrastructure adapters (datasets, filesystems, readers, hub, snapshots)
export { InMemoryDataset } from './infrastructure/datasets/InMemoryDataset.js';
export { IterableDataset } from './infrastructure/datasets/IterableDataset.js';
export type { IterableDatasetOptions, RowStreamFactory } from './infrastructure/datasets/IterableDataset.js';
export { FileSystemRegistry, protocolOf, joinPath } from './infrastructure/filesystem/FileSystemRegistry.js';
export { NodeFileSystem } from './infrastructure/filesystem/NodeFileSystem.js';
export { InMemoryFileSystem } from './infrastructure/filesystem/InMemoryFileSystem.js';
export { FileReaderRegistry } from './infrastructure/readers/FileReaderRegistry.js';
export { CsvReader } from './infrastructure/readers/CsvReader.js';
export type { CsvReaderOptions } from './infrastructure/readers/CsvReader.js';
export { JsonReader } from './infrastructure/readers/JsonReader.js';
export type { JsonReaderOptions } from './infrastructure/readers/JsonReader.js';
export { TextReader } from './infrastructure/readers/TextReader.js';
export { HttpHubClient } from './infrastructure/hub/HttpHubClient.js';
export type { HttpHubClientOptions } from './infrastructure/hub/HttpHubClient.js';
export { RemoteRowsDataset } from './infrastructure/hub/RemoteRowsDataset.js';
export type { RowsPage, FetchRowsPage, RemoteRowsDatasetOptions } from './infrastructure/hub/RemoteRowsDataset.js';
export { DiskSnapshotLoader } from './infrastructure/snapshot/DiskSnapshotLoader.js';

// Infrastructure adapters (checkpoint stores, logging)
export { InMemoryCheckpointStore } from './infrastructure/state/InMemoryCheckpointStore.js';
export { FileCheckpointStore } from './infrastructure/state/FileCheckpointStore.js';
export type { FileCheckpointStoreOptions } from './infrastructure/state/FileCheckpointStore.js';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger.js';
export type { ConsoleLoggerOptions } from './infrastructure/logging/ConsoleLogger.js';
