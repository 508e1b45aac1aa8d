import type { FieldDeclaration } from '../model/FieldDeclaration.js';
import type { CoercionOutcome } from '../model/CoercionOutcome.js';
import { coerced, coercionFailed } from '../model/CoercionOutcome.js';

const INTEGRAL_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_DOUBLES: ReadonlyMap<string, number> = new Map([
  ['NaN', Number.NaN],
  ['Infinity', Number.POSITIVE_INFINITY],
  ['+Infinity', Number.POSITIVE_INFINITY],
  ['-Infinity', Number.NEGATIVE_INFINITY],
]);
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Domain service that converts one raw token into a typed value.
 *
 * Stateless: the same token and declaration always produce the same outcome.
 * Numeric parsing is locale-invariant (`.` decimal separator, no grouping).
 */
export class FieldCoercer {
  /** `undefined` means the record ran out of tokens before this field. */
  coerce(rawToken: string | undefined, decl: FieldDeclaration): CoercionOutcome {
    if (rawToken === undefined || rawToken === '') {
      return decl.nullable ? coerced(null) : coercionFailed('EMPTY_REQUIRED');
    }

    switch (decl.type) {
      case 'string':
        return coerced(rawToken);
      case 'integer':
        return this.coerceInteger(rawToken.trim());
      case 'long':
        return this.coerceLong(rawToken.trim());
      case 'double':
        return this.coerceDouble(rawToken.trim());
      case 'boolean':
        return this.coerceBoolean(rawToken.trim());
      case 'date':
        return this.coerceDate(rawToken.trim());
    }
  }

  private coerceInteger(text: string): CoercionOutcome {
    if (!INTEGRAL_PATTERN.test(text)) return coercionFailed('TYPE_MISMATCH');
    const value = Number(text);
    if (value < INT32_MIN || value > INT32_MAX) return coercionFailed('TYPE_MISMATCH');
    return coerced(value);
  }

  private coerceLong(text: string): CoercionOutcome {
    if (!INTEGRAL_PATTERN.test(text)) return coercionFailed('TYPE_MISMATCH');
    const value = BigInt(text);
    if (value < INT64_MIN || value > INT64_MAX) return coercionFailed('TYPE_MISMATCH');
    return coerced(value);
  }

  private coerceDouble(text: string): CoercionOutcome {
    const special = SPECIAL_DOUBLES.get(text);
    if (special !== undefined) return coerced(special);
    if (!DECIMAL_PATTERN.test(text)) return coercionFailed('TYPE_MISMATCH');
    return coerced(Number(text));
  }

  private coerceBoolean(text: string): CoercionOutcome {
    const lower = text.toLowerCase();
    if (lower === 'true') return coerced(true);
    if (lower === 'false') return coerced(false);
    return coercionFailed('TYPE_MISMATCH');
  }

  // Rejects dates that would silently roll over, e.g. 2023-02-30.
  private coerceDate(text: string): CoercionOutcome {
    const match = DATE_PATTERN.exec(text);
    if (!match) return coercionFailed('TYPE_MISMATCH');

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    // setUTCFullYear keeps years 0-99 as written; Date.UTC maps them to 19xx.
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);

    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return coercionFailed('TYPE_MISMATCH');
    }
    return coerced(date);
  }
}
