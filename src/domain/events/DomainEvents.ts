import type { UnsupportedOperation, WorkloadStorageErrorCode } from '../model/WorkloadStorageError.js';

/** Emitted once a storage has been bound to a generator table. */
export interface StorageOpenedEvent {
  readonly type: 'storage:opened';
  readonly generator: string;
  readonly version: string;
  readonly table: string;
  readonly timestamp: number;
}

/** Emitted when a read stream produces its first chunk request. */
export interface ReadStartedEvent {
  readonly type: 'read:started';
  readonly generator: string;
  readonly table: string;
  readonly rowStart: number;
  /** Exclusive end of the rows that will be produced, `undefined` when unbounded. */
  readonly rowEnd: number | undefined;
  readonly timestamp: number;
}

/** Emitted after the last row of a read has been produced. */
export interface ReadCompletedEvent {
  readonly type: 'read:completed';
  readonly generator: string;
  readonly table: string;
  readonly rowCount: number;
  readonly byteCount: number;
  readonly timestamp: number;
}

/** Emitted when the consumer stops pulling before the range was exhausted. */
export interface ReadAbortedEvent {
  readonly type: 'read:aborted';
  readonly generator: string;
  readonly table: string;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted for every call the storage refuses. */
export interface OperationRejectedEvent {
  readonly type: 'operation:rejected';
  readonly operation: UnsupportedOperation | 'read' | 'readAt';
  readonly code: WorkloadStorageErrorCode;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | StorageOpenedEvent
  | ReadStartedEvent
  | ReadCompletedEvent
  | ReadAbortedEvent
  | OperationRejectedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
