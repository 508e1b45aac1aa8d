import type { RawRecord } from '../model/RawRecord.js';
import type { Schema } from '../model/Schema.js';
import type { TypedValue } from '../model/CoercionOutcome.js';
import type { MalformedReason, Verdict } from '../model/Verdict.js';
import { cleanVerdict, malformedVerdict } from '../model/Verdict.js';
import { FieldCoercer } from './FieldCoercer.js';

/**
 * Shape rules applied by the classifier.
 *
 * - `FAILURE_SELECTION`: when several fields fail, the leftmost one is reported.
 * - `EXCESS_TOKENS`: tokens past the last declared field are dropped without
 *   penalty. A `strict` schema overrides this with `'reject'`.
 */
export const ClassificationPolicy = {
  FAILURE_SELECTION: 'first-failing-field',
  EXCESS_TOKENS: 'ignore',
} as const;

export type ExcessTokenPolicy = 'ignore' | 'reject';

/**
 * Domain service that reconciles a raw record with the schema and produces a verdict.
 *
 * Alignment is strictly positional. A token inserted mid-record shifts every
 * later value one column right; the shift is only noticed if a shifted value
 * fails to coerce to its new column's type.
 */
export class RecordClassifier {
  private readonly excessTokens: ExcessTokenPolicy;

  constructor(
    private readonly schema: Schema,
    private readonly coercer: FieldCoercer = new FieldCoercer(),
  ) {
    this.excessTokens = schema.isStrict() ? 'reject' : ClassificationPolicy.EXCESS_TOKENS;
  }

  classify(raw: RawRecord): Verdict {
    const actual = raw.tokens.length;
    const expected = this.schema.fieldCount();
    const values: TypedValue[] = [];

    for (let i = 0; i < expected; i++) {
      const field = this.schema.fieldAt(i);
      // Positions at or past `actual` are padding: the token is absent.
      const token = i < actual ? raw.tokens[i] : undefined;
      const outcome = this.coercer.coerce(token, field);

      if (!outcome.ok) {
        const reason: MalformedReason =
          token === undefined
            ? { code: 'FIELD_COUNT_MISMATCH', actual, expected }
            : { code: 'FIELD_COERCION_FAILURE', field: field.name, rawToken: token, failure: outcome.reason };
        return malformedVerdict(reason, raw.line);
      }

      values.push(outcome.value);
    }

    if (actual > expected && this.excessTokens === 'reject') {
      return malformedVerdict({ code: 'FIELD_COUNT_MISMATCH', actual, expected }, raw.line);
    }

    return cleanVerdict(values);
  }
}
