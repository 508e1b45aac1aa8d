import { randomUUID } from 'node:crypto';
import type { Schema } from '../domain/model/Schema.js';
import type { ParseMode } from '../domain/model/ParseMode.js';
import type { ReadSummary } from '../domain/model/ReadSummary.js';
import type { ReadStatus } from '../domain/model/ReadStatus.js';
import { canTransition } from '../domain/model/ReadStatus.js';
import { RecordClassifier } from '../domain/services/RecordClassifier.js';
import { RowMaterializer } from '../domain/services/RowMaterializer.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state holder shared by the use cases of a single read operation.
 *
 * Internal: not exported from the public API. The schema, classifier and
 * materializer are read-only and may be shared by concurrent partitions;
 * counters are only touched from the event loop.
 */
export class ReadContext {
  readonly readId: string = randomUUID();
  readonly eventBus = new EventBus();
  readonly classifier: RecordClassifier;
  readonly materializer: RowMaterializer;

  status: ReadStatus = 'CREATED';
  totalRecords = 0;
  cleanRecords = 0;
  malformedRecords = 0;
  emittedRows = 0;
  droppedRecords = 0;
  startedAt: number | null = null;
  finishedAt: number | null = null;

  constructor(
    readonly schema: Schema,
    readonly mode: ParseMode,
  ) {
    this.classifier = new RecordClassifier(schema);
    this.materializer = new RowMaterializer(schema);
  }

  transitionTo(newStatus: ReadStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
    if (newStatus === 'READING') {
      this.startedAt = Date.now();
    } else {
      this.finishedAt = Date.now();
    }
  }

  buildSummary(): ReadSummary {
    const end = this.finishedAt ?? Date.now();
    return {
      status: this.status,
      mode: this.mode,
      totalRecords: this.totalRecords,
      cleanRecords: this.cleanRecords,
      malformedRecords: this.malformedRecords,
      emittedRows: this.emittedRows,
      droppedRecords: this.droppedRecords,
      elapsedMs: this.startedAt === null ? 0 : end - this.startedAt,
    };
  }
}
