import type { SchemaDefinition } from './domain/model/Schema.js';
import { Schema } from './domain/model/Schema.js';
import type { OutputRow } from './domain/model/OutputRow.js';
import type { ReadSummary } from './domain/model/ReadSummary.js';
import type { ReadStatus } from './domain/model/ReadStatus.js';
import { ParseMode, parseMode } from './domain/model/ParseMode.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RecordTokenizer } from './domain/ports/RecordTokenizer.js';
import type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
import { ReadConfigError } from './domain/errors/ReadErrors.js';
import { ReadContext } from './application/ReadContext.js';
import { ReadRecords } from './application/usecases/ReadRecords.js';
import type { RecordStream } from './application/usecases/ReadRecords.js';
import { ReadPartitions } from './application/usecases/ReadPartitions.js';
import type { PartitionRowHandler } from './application/usecases/ReadPartitions.js';
import { PreviewRecords } from './application/usecases/PreviewRecords.js';
import type { PreviewResult } from './application/usecases/PreviewRecords.js';

/** Configuration for a read operation. */
export interface RecordReaderConfig {
  /** Declared record layout. Validated when the reader is constructed. */
  readonly schema: SchemaDefinition;
  /**
   * What to do with malformed records: `permissive`, `dropmalformed` or
   * `failfast` (case-insensitive). Default: `permissive`.
   */
  readonly mode?: ParseMode | string;
}

/**
 * Facade for one read operation: tokenize → classify → apply mode → materialize.
 *
 * A reader is single-use; create a new one per read. Construction throws
 * `SchemaError` for an invalid schema and `ReadConfigError` for an unknown mode.
 *
 * @example
 * ```typescript
 * const reader = new RecordReader({
 *   schema: { fields: [{ name: 'city', type: 'string', nullable: true }], captureCorruptRecord: true },
 *   mode: 'dropmalformed',
 * });
 * reader.from(new FilePathSource('cities.csv'), new CsvTokenizer({ hasHeader: true }));
 * for await (const row of reader.read()) {
 *   console.log(row.values);
 * }
 * ```
 */
export class RecordReader {
  private readonly ctx: ReadContext;
  private source: DataSource | null = null;
  private tokenizer: RecordTokenizer | null = null;

  constructor(config: RecordReaderConfig) {
    const schema = Schema.from(config.schema);
    this.ctx = new ReadContext(schema, parseMode(config.mode ?? ParseMode.PERMISSIVE));
  }

  /** Set the data source and tokenizer. Returns `this` for chaining. */
  from(source: DataSource, tokenizer: RecordTokenizer): this {
    this.source = source;
    this.tokenizer = tokenizer;
    return this;
  }

  /** Subscribe to a read event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Stream rows from the configured source.
   *
   * Under `failfast` the iterable throws `AbortedReadError` at the first
   * malformed record; rows already yielded are not retracted.
   *
   * @throws ReadConfigError if no source is configured or the reader was already used.
   */
  read(): AsyncIterable<OutputRow> {
    const { source, tokenizer } = this.requireSource();
    return this.readRecords(tokenizer.tokenize(source.read()));
  }

  /** Stream rows from records the caller has already tokenized. */
  readRecords(records: RecordStream): AsyncIterable<OutputRow> {
    this.assertUnused();
    return new ReadRecords(this.ctx).execute(records);
  }

  /** Collect every row of the configured source into an array. Rejects with `AbortedReadError` under `failfast`. */
  async readAll(): Promise<OutputRow[]> {
    const rows: OutputRow[] = [];
    for await (const row of this.read()) {
      rows.push(row);
    }
    return rows;
  }

  /**
   * Read several partitions concurrently, one mode policy per partition.
   *
   * Resolves with one row array per partition, in partition order. Under
   * `failfast` the first malformed record in any partition stops all of them
   * and the promise rejects; pass `onRow` to observe rows as they are produced.
   */
  async readPartitions(partitions: readonly RecordStream[], onRow?: PartitionRowHandler): Promise<OutputRow[][]> {
    this.assertUnused();
    return new ReadPartitions(this.ctx).execute(partitions, onRow);
  }

  /** Classify the first `maxRecords` records of the configured source without applying the mode. */
  async preview(maxRecords = 10): Promise<PreviewResult> {
    const { source, tokenizer } = this.requireSource();
    return new PreviewRecords(this.ctx.schema, this.ctx.classifier).execute(
      tokenizer.tokenize(source.read()),
      maxRecords,
    );
  }

  /** Current counters and status of the read. */
  getSummary(): ReadSummary {
    return this.ctx.buildSummary();
  }

  getStatus(): ReadStatus {
    return this.ctx.status;
  }

  getMode(): ParseMode {
    return this.ctx.mode;
  }

  getSchema(): Schema {
    return this.ctx.schema;
  }

  /** Unique identifier (UUID) of this read, carried on every event. */
  getReadId(): string {
    return this.ctx.readId;
  }

  private requireSource(): { source: DataSource; tokenizer: RecordTokenizer } {
    if (!this.source || !this.tokenizer) {
      throw new ReadConfigError('Source and tokenizer must be configured. Call .from(source, tokenizer) first.');
    }
    return { source: this.source, tokenizer: this.tokenizer };
  }

  private assertUnused(): void {
    if (this.ctx.status !== 'CREATED') {
      throw new ReadConfigError(`Reader already used (status '${this.ctx.status}'). Create a new reader per read.`);
    }
  }
}
