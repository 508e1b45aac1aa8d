import type { RawRecord } from '../../domain/model/RawRecord.js';
import type { CleanVerdict, MalformedVerdict } from '../../domain/model/Verdict.js';
import type { RecordClassifier } from '../../domain/services/RecordClassifier.js';
import type { Schema } from '../../domain/model/Schema.js';
import type { RecordStream } from './ReadRecords.js';

/** A sampled record together with its verdict. */
export interface PreviewEntry<V> {
  readonly record: RawRecord;
  readonly verdict: V;
}

/** Result of classifying a sample of records. No mode policy is applied. */
export interface PreviewResult {
  readonly cleanRecords: readonly PreviewEntry<CleanVerdict>[];
  readonly malformedRecords: readonly PreviewEntry<MalformedVerdict>[];
  readonly totalSampled: number;
  /** Output column names, including `_corrupt_record` when captured. */
  readonly columns: readonly string[];
}

/** Use case: classify the first records of a source without reading it. */
export class PreviewRecords {
  constructor(
    private readonly schema: Schema,
    private readonly classifier: RecordClassifier,
  ) {}

  async execute(records: RecordStream, maxRecords = 10): Promise<PreviewResult> {
    const cleanRecords: PreviewEntry<CleanVerdict>[] = [];
    const malformedRecords: PreviewEntry<MalformedVerdict>[] = [];
    let totalSampled = 0;

    for await (const record of records) {
      if (totalSampled >= maxRecords) break;
      totalSampled++;

      const verdict = this.classifier.classify(record);
      if (verdict.kind === 'clean') {
        cleanRecords.push({ record, verdict });
      } else {
        malformedRecords.push({ record, verdict });
      }
    }

    return {
      cleanRecords,
      malformedRecords,
      totalSampled,
      columns: this.schema.outputFieldNames(),
    };
  }
}
