import type { RawRecord } from '../../domain/model/RawRecord.js';
import type { OutputRow } from '../../domain/model/OutputRow.js';
import type { ModePolicy } from '../../domain/services/ModePolicy.js';
import type { ReadContext } from '../ReadContext.js';

/**
 * Use case: classify one raw record, let the mode policy decide, and materialize the row.
 *
 * Returns `null` when the record is suppressed. Throws the policy's
 * `AbortedReadError` after moving the read to `ABORTED`.
 */
export class ProcessRecord {
  constructor(private readonly ctx: ReadContext) {}

  execute(raw: RawRecord, policy: ModePolicy, partition?: number): OutputRow | null {
    const { ctx } = this;
    const verdict = ctx.classifier.classify(raw);
    ctx.totalRecords++;

    if (verdict.kind === 'clean') {
      ctx.cleanRecords++;
    } else {
      ctx.malformedRecords++;
      ctx.eventBus.emit({
        type: 'record:malformed',
        readId: ctx.readId,
        lineNumber: raw.lineNumber,
        reason: verdict.reason,
        rawText: verdict.rawText,
        partition,
        timestamp: Date.now(),
      });
    }

    const decision = policy.apply(verdict, raw.lineNumber);

    switch (decision.action) {
      case 'emit': {
        ctx.emittedRows++;
        return ctx.materializer.materialize(decision, raw.lineNumber);
      }
      case 'suppress': {
        ctx.droppedRecords++;
        ctx.eventBus.emit({
          type: 'record:dropped',
          readId: ctx.readId,
          lineNumber: raw.lineNumber,
          partition,
          timestamp: Date.now(),
        });
        return null;
      }
      case 'abort': {
        ctx.transitionTo('ABORTED');
        ctx.eventBus.emit({
          type: 'read:aborted',
          readId: ctx.readId,
          lineNumber: decision.error.lineNumber,
          rawText: decision.error.rawText,
          reason: decision.error.reason,
          partition,
          summary: ctx.buildSummary(),
          timestamp: Date.now(),
        });
        throw decision.error;
      }
    }
  }
}
