import type { RunSummary } from '../model/Checkpoint.js';
import type { ErrorCode } from '../errors/RowstreamError.js';

/** Emitted once the source is open and its row budget and columns are known. */
export interface SourceOpenedEvent {
  readonly type: 'source:opened';
  readonly runId: string;
  readonly source: string;
  readonly rowBudget: number;
  readonly columns: readonly string[];
  /** Row offset the run resumes from. `0` for a fresh run. */
  readonly offset: number;
  readonly timestamp: number;
}

/** Emitted after a batch has been handed to the consumer and checkpointed. */
export interface BatchProducedEvent {
  readonly type: 'batch:produced';
  readonly runId: string;
  readonly batchIndex: number;
  readonly startRow: number;
  readonly rowCount: number;
  readonly isLast: boolean;
  readonly timestamp: number;
}

/** Emitted when every row of the budget has been delivered. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Emitted when opening or reading the source, or the consumer, fails. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly error: string;
  /** Set when the failure is a `RowstreamError`. */
  readonly code?: ErrorCode;
  /** Offset of the last checkpoint, where a retry resumes. */
  readonly offset: number;
  readonly timestamp: number;
}

/** Emitted when a chunk stops, either because a limit was reached or because the run completed. */
export interface ChunkCompletedEvent {
  readonly type: 'chunk:completed';
  readonly runId: string;
  readonly batchesEmitted: number;
  readonly rowsEmitted: number;
  /** `true` when the run is complete. */
  readonly done: boolean;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | SourceOpenedEvent
  | BatchProducedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | ChunkCompletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
