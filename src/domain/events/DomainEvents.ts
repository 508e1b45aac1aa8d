import type { ParseMode } from '../model/ParseMode.js';
import type { ReadSummary } from '../model/ReadSummary.js';
import type { MalformedReason } from '../model/Verdict.js';

/** Emitted when a read begins. */
export interface ReadStartedEvent {
  readonly type: 'read:started';
  readonly readId: string;
  readonly mode: ParseMode;
  readonly fieldCount: number;
  readonly timestamp: number;
}

/** Emitted for every malformed verdict, whatever the mode does with it. */
export interface RecordMalformedEvent {
  readonly type: 'record:malformed';
  readonly readId: string;
  readonly lineNumber: number;
  readonly reason: MalformedReason;
  readonly rawText: string;
  /** Partition index for partitioned reads. */
  readonly partition?: number;
  readonly timestamp: number;
}

/** Emitted when `dropmalformed` suppresses a record. */
export interface RecordDroppedEvent {
  readonly type: 'record:dropped';
  readonly readId: string;
  readonly lineNumber: number;
  readonly partition?: number;
  readonly timestamp: number;
}

/** Emitted once when `failfast` aborts the read. */
export interface ReadAbortedEvent {
  readonly type: 'read:aborted';
  readonly readId: string;
  readonly lineNumber: number;
  readonly rawText: string;
  readonly reason: MalformedReason;
  readonly partition?: number;
  readonly summary: ReadSummary;
  readonly timestamp: number;
}

/** Emitted when every record has been read without an abort. */
export interface ReadCompletedEvent {
  readonly type: 'read:completed';
  readonly readId: string;
  readonly summary: ReadSummary;
  readonly timestamp: number;
}

/** Emitted when the source or tokenizer throws during a read. */
export interface ReadFailedEvent {
  readonly type: 'read:failed';
  readonly readId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ReadStartedEvent
  | RecordMalformedEvent
  | RecordDroppedEvent
  | ReadAbortedEvent
  | ReadCompletedEvent
  | ReadFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
