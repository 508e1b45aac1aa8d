import type { OutputRow } from '../../domain/model/OutputRow.js';
import { createModePolicy } from '../../domain/services/ModePolicy.js';
import { ReadError } from '../../domain/errors/ReadErrors.js';
import type { ReadContext } from '../ReadContext.js';
import { ProcessRecord } from './ProcessRecord.js';
import type { RecordStream } from './ReadRecords.js';

/** Called for every row as soon as a partition produces it. */
export type PartitionRowHandler = (row: OutputRow, partition: number) => void;

/**
 * Use case: read several partitions of one logical input concurrently.
 *
 * Each partition runs its own mode policy. All partitions share one
 * `AbortController`: the first `failfast` abort (or source error) signals it
 * and every other partition stops before producing its next row. Rows
 * delivered through `onRow` before the abort stay delivered.
 */
export class ReadPartitions {
  private readonly step: ProcessRecord;

  constructor(private readonly ctx: ReadContext) {
    this.step = new ProcessRecord(ctx);
  }

  async execute(partitions: readonly RecordStream[], onRow?: PartitionRowHandler): Promise<OutputRow[][]> {
    this.ctx.transitionTo('READING');
    this.ctx.eventBus.emit({
      type: 'read:started',
      readId: this.ctx.readId,
      mode: this.ctx.mode,
      fieldCount: this.ctx.schema.fieldCount(),
      timestamp: Date.now(),
    });

    const controller = new AbortController();
    const results = await Promise.allSettled(
      partitions.map((records, index) => this.readPartition(records, index, controller, onRow)),
    );

    const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (rejected) {
      // The first failure is the one that signalled; later partitions stopped on the signal.
      const cause: unknown = controller.signal.reason ?? rejected.reason;
      if (!(cause instanceof ReadError)) {
        this.ctx.transitionTo('FAILED');
        this.ctx.eventBus.emit({
          type: 'read:failed',
          readId: this.ctx.readId,
          error: cause instanceof Error ? cause.message : String(cause),
          timestamp: Date.now(),
        });
      }
      throw cause;
    }

    this.ctx.transitionTo('COMPLETED');
    this.ctx.eventBus.emit({
      type: 'read:completed',
      readId: this.ctx.readId,
      summary: this.ctx.buildSummary(),
      timestamp: Date.now(),
    });

    return results.map((r) => (r.status === 'fulfilled' ? r.value : []));
  }

  private async readPartition(
    records: RecordStream,
    partition: number,
    controller: AbortController,
    onRow?: PartitionRowHandler,
  ): Promise<OutputRow[]> {
    const policy = createModePolicy(this.ctx.mode, this.ctx.schema.fieldCount());
    const rows: OutputRow[] = [];

    try {
      for await (const raw of records) {
        if (controller.signal.aborted) break;
        const row = this.step.execute(raw, policy, partition);
        if (row) {
          rows.push(row);
          onRow?.(row, partition);
        }
      }
    } catch (error) {
      if (!controller.signal.aborted) controller.abort(error);
      throw error;
    }

    return rows;
  }
}
