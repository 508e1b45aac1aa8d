import type { ParseMode } from './ParseMode.js';
import type { ReadStatus } from './ReadStatus.js';

/** Counters for one read operation. */
export interface ReadSummary {
  readonly status: ReadStatus;
  readonly mode: ParseMode;
  /** Records classified so far. */
  readonly totalRecords: number;
  readonly cleanRecords: number;
  readonly malformedRecords: number;
  /** Rows handed to the consumer. */
  readonly emittedRows: number;
  /** Malformed records suppressed by `dropmalformed`. */
  readonly droppedRecords: number;
  /** Milliseconds since the read started (`0` before it starts). */
  readonly elapsedMs: number;
}
