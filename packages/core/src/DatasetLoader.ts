import { randomUUID } from 'node:crypto';
import type { ProducedBatch } from './domain/model/Row.js';
import type { RunSummary } from './domain/model/Checkpoint.js';
import type { RunStatus } from './domain/model/RunStatus.js';
import type { SourceConfig } from './domain/model/SourceConfig.js';
import type { BatchConsumer } from './domain/ports/BatchConsumer.js';
import type { CheckpointStore } from './domain/ports/CheckpointStore.js';
import type { Logger } from './domain/ports/Logger.js';
import type { SourceAdapter } from './domain/ports/SourceAdapter.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ChunkOptions, ChunkResult } from './application/usecases/ProcessChunk.js';
import type { SourceDependencies } from './infrastructure/sources/createSource.js';
import { noopLogger } from './domain/ports/Logger.js';
import { BatchProducer } from './domain/services/BatchProducer.js';
import { RunContext } from './application/RunContext.js';
import { StartRun } from './application/usecases/StartRun.js';
import { ProcessChunk } from './application/usecases/ProcessChunk.js';
import { InMemoryCheckpointStore } from './infrastructure/state/InMemoryCheckpointStore.js';
import { createSource } from './infrastructure/sources/createSource.js';

/** Configuration for a loader run. */
export interface DatasetLoaderConfig {
  /** Number of rows per batch. Default: `50`. */
  readonly batchSize?: number;
  /** Persistence adapter for run checkpoints. Default: `InMemoryCheckpointStore`. */
  readonly checkpointStore?: CheckpointStore;
  /** Identifier of the run. Reuse it to resume from its checkpoint. Default: a random UUID. */
  readonly runId?: string;
  readonly logger?: Logger;
}

/**
 * Facade that drives one source through the batch protocol: open → produce → consume → checkpoint.
 *
 * Delegates each operation to a dedicated use case in `application/usecases/`.
 * Holds the shared `RunContext` that all use cases operate on.
 *
 * @example
 * ```typescript
 * const loader = DatasetLoader.fromConfig(
 *   { kind: 'filesystem', path: 'data/', split: 'test' },
 *   { batchSize: 100, checkpointStore: new FileCheckpointStore(), runId: 'nightly' },
 * );
 * await loader.run(async (rows) => { await pipeline.push(rows); });
 * ```
 */
export class DatasetLoader {
  private readonly ctx: RunContext;

  constructor(source: SourceAdapter, config: DatasetLoaderConfig = {}) {
    const producer = new BatchProducer(source, config.batchSize ?? 50);
    this.ctx = new RunContext({
      source,
      batchSize: producer.batchSize,
      checkpointStore: config.checkpointStore ?? new InMemoryCheckpointStore(),
      logger: config.logger ?? noopLogger,
      runId: config.runId ?? randomUUID(),
    });
  }

  /** Build the source for a configuration, then the loader around it. */
  static fromConfig(source: SourceConfig, config: DatasetLoaderConfig & SourceDependencies = {}): DatasetLoader {
    return new DatasetLoader(createSource(source, config), config);
  }

  get runId(): string {
    return this.ctx.runId;
  }

  get status(): RunStatus {
    return this.ctx.status;
  }

  get source(): SourceAdapter {
    return this.ctx.source;
  }

  /** Open the source. `run()` does it for you. */
  async open(): Promise<void> {
    await this.ctx.source.open();
  }

  /** Release the source's handle. Call it once the run is over. */
  async close(): Promise<void> {
    await this.ctx.source.close();
  }

  /**
   * Produce batches from `offset` without consumer, events or checkpoints.
   *
   * @throws SourceNotOpenedError before `open()`.
   */
  produce(offset = 0): AsyncGenerator<ProducedBatch, void, undefined> {
    return new BatchProducer(this.ctx.source, this.ctx.batchSize).produce(offset);
  }

  /**
   * Deliver every remaining row of the source to `consumer`.
   *
   * Resumes from the run's checkpoint and saves one after each batch. A consumer
   * error marks the run `FAILED` and is rethrown; calling `run()` again retries
   * from the last batch that succeeded.
   */
  async run(consumer: BatchConsumer): Promise<RunSummary> {
    return new StartRun(this.ctx).execute(consumer);
  }

  /**
   * Deliver a limited chunk of batches, then pause and return control.
   *
   * Call again (or from another process, with the same `runId` and a shared
   * checkpoint store) until `done` is `true`.
   */
  async runChunk(consumer: BatchConsumer, options?: ChunkOptions): Promise<ChunkResult> {
    return new ProcessChunk(this.ctx).execute(consumer, options);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe from a lifecycle event. Returns `this` for chaining. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every lifecycle event. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler. Returns `this` for chaining. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}
