import type { RawRecord } from '../../domain/model/RawRecord.js';
import type { OutputRow } from '../../domain/model/OutputRow.js';
import type { ModePolicy } from '../../domain/services/ModePolicy.js';
import { createModePolicy } from '../../domain/services/ModePolicy.js';
import { ReadError } from '../../domain/errors/ReadErrors.js';
import type { ReadContext } from '../ReadContext.js';
import { ProcessRecord } from './ProcessRecord.js';

/** Records as produced by a tokenizer, or supplied directly by a caller. */
export type RecordStream = AsyncIterable<RawRecord> | Iterable<RawRecord>;

/**
 * Use case: read every record of one stream, strictly in order, with a single mode policy.
 *
 * The read moves to `READING` as soon as `execute()` is called; rows are
 * produced lazily as the returned iterable is consumed.
 */
export class ReadRecords {
  private readonly step: ProcessRecord;

  constructor(private readonly ctx: ReadContext) {
    this.step = new ProcessRecord(ctx);
  }

  execute(records: RecordStream): AsyncIterable<OutputRow> {
    this.ctx.transitionTo('READING');
    this.ctx.eventBus.emit({
      type: 'read:started',
      readId: this.ctx.readId,
      mode: this.ctx.mode,
      fieldCount: this.ctx.schema.fieldCount(),
      timestamp: Date.now(),
    });

    return this.iterate(records, createModePolicy(this.ctx.mode, this.ctx.schema.fieldCount()));
  }

  // A consumer that stops early still completes the read, with the rows counted so far.
  private async *iterate(records: RecordStream, policy: ModePolicy): AsyncIterable<OutputRow> {
    let failed = false;
    try {
      for await (const raw of records) {
        const row = this.step.execute(raw, policy);
        if (row) yield row;
      }
    } catch (error) {
      failed = true;
      if (!(error instanceof ReadError)) {
        this.fail(error);
      }
      throw error;
    } finally {
      if (!failed) this.complete();
    }
  }

  private complete(): void {
    this.ctx.transitionTo('COMPLETED');
    this.ctx.eventBus.emit({
      type: 'read:completed',
      readId: this.ctx.readId,
      summary: this.ctx.buildSummary(),
      timestamp: Date.now(),
    });
  }

  private fail(error: unknown): void {
    this.ctx.transitionTo('FAILED');
    this.ctx.eventBus.emit({
      type: 'read:failed',
      readId: this.ctx.readId,
      error: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
  }
}
