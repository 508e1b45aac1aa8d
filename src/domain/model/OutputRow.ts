import type { TypedValue } from './CoercionOutcome.js';
import type { Schema } from './Schema.js';

/** A materialized row. Immutable once built. */
export interface OutputRow {
  /** Line the row was read from. */
  readonly lineNumber: number;
  /** Values in schema order, followed by the corrupt-record slot when the schema captures it. */
  readonly values: readonly TypedValue[];
}

/** Keyed view of a row, using the schema's output column names. */
export function rowToObject(row: OutputRow, schema: Schema): Record<string, TypedValue> {
  const names = schema.outputFieldNames();
  const result: Record<string, TypedValue> = {};
  names.forEach((name, index) => {
    result[name] = row.values[index] ?? null;
  });
  return result;
}
