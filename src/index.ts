// Main entry point
export { RecordReader } from './RecordReader.js';
export type { RecordReaderConfig } from './RecordReader.js';

// Domain model
export { Schema, CORRUPT_RECORD_FIELD } from './domain/model/Schema.js';
export type { SchemaDefinition } from './domain/model/Schema.js';
export { FIELD_TYPES, isFieldType } from './domain/model/FieldDeclaration.js';
export type { FieldDeclaration, FieldType } from './domain/model/FieldDeclaration.js';
export { createRawRecord } from './domain/model/RawRecord.js';
export type { RawRecord } from './domain/model/RawRecord.js';
export { coerced, coercionFailed } from './domain/model/CoercionOutcome.js';
export type {
  TypedValue,
  CoercionOutcome,
  CoercionSuccess,
  CoercionFailure,
  CoercionFailureReason,
} from './domain/model/CoercionOutcome.js';
export { cleanVerdict, malformedVerdict, isMalformed, describeReason } from './domain/model/Verdict.js';
export type {
  Verdict,
  CleanVerdict,
  MalformedVerdict,
  MalformedReason,
  FieldCountMismatch,
  FieldCoercionFailure,
} from './domain/model/Verdict.js';
export { rowToObject } from './domain/model/OutputRow.js';
export type { OutputRow } from './domain/model/OutputRow.js';
export { ParseMode, parseMode } from './domain/model/ParseMode.js';
export { ReadStatus, canTransition } from './domain/model/ReadStatus.js';
export type { ReadSummary } from './domain/model/ReadSummary.js';

// Errors
export { ReadError, SchemaError, AbortedReadError, ReadConfigError } from './domain/errors/ReadErrors.js';
export type { ReadErrorCode } from './domain/errors/ReadErrors.js';

// Domain services (for building custom pipelines)
export { FieldCoercer } from './domain/services/FieldCoercer.js';
export { RecordClassifier, ClassificationPolicy } from './domain/services/RecordClassifier.js';
export type { ExcessTokenPolicy } from './domain/services/RecordClassifier.js';
export {
  PolicyState,
  PermissivePolicy,
  DropMalformedPolicy,
  FailFastPolicy,
  createModePolicy,
} from './domain/services/ModePolicy.js';
export type {
  ModePolicy,
  PolicyDecision,
  EmitDecision,
  SuppressDecision,
  AbortDecision,
} from './domain/services/ModePolicy.js';
export { RowMaterializer } from './domain/services/RowMaterializer.js';

// Use case types
export type { RecordStream } from './application/usecases/ReadRecords.js';
export type { PartitionRowHandler } from './application/usecases/ReadPartitions.js';
export type { PreviewResult, PreviewEntry } from './application/usecases/PreviewRecords.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RecordTokenizer, TokenizerOptions } from './domain/ports/RecordTokenizer.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ReadStartedEvent,
  RecordMalformedEvent,
  RecordDroppedEvent,
  ReadAbortedEvent,
  ReadCompletedEvent,
  ReadFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { CsvTokenizer } from './infrastructure/tokenizers/CsvTokenizer.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
