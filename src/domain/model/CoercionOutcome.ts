/** A value produced by coercing one token. `long` fields produce `bigint`. */
export type TypedValue = string | number | bigint | boolean | Date | null;

export type CoercionFailureReason = 'TYPE_MISMATCH' | 'EMPTY_REQUIRED';

export interface CoercionSuccess {
  readonly ok: true;
  readonly value: TypedValue;
}

export interface CoercionFailure {
  readonly ok: false;
  readonly reason: CoercionFailureReason;
}

/** Result of coercing a single token against its field declaration. */
export type CoercionOutcome = CoercionSuccess | CoercionFailure;

export function coerced(value: TypedValue): CoercionSuccess {
  return { ok: true, value };
}

export function coercionFailed(reason: CoercionFailureReason): CoercionFailure {
  return { ok: false, reason };
}
