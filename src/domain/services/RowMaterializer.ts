import type { Schema } from '../model/Schema.js';
import type { OutputRow } from '../model/OutputRow.js';
import type { TypedValue } from '../model/CoercionOutcome.js';
import type { EmitDecision } from './ModePolicy.js';

/** Builds frozen output rows from emit decisions, adding the corrupt-record slot when the schema captures it. */
export class RowMaterializer {
  constructor(private readonly schema: Schema) {}

  materialize(decision: EmitDecision, lineNumber: number): OutputRow {
    if (decision.values.length !== this.schema.fieldCount()) {
      throw new RangeError(
        `Row has ${String(decision.values.length)} values but schema declares ${String(this.schema.fieldCount())} fields`,
      );
    }

    const values: TypedValue[] = [...decision.values];
    if (this.schema.capturesCorruptRecord()) {
      values.push(decision.corruptRecord);
    }

    return Object.freeze({ lineNumber, values: Object.freeze(values) });
  }
}
