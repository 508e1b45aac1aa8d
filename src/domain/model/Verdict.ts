import type { CoercionFailureReason, TypedValue } from './CoercionOutcome.js';

/** The record had too few tokens to fill a required field, or too many under a strict schema. */
export interface FieldCountMismatch {
  readonly code: 'FIELD_COUNT_MISMATCH';
  readonly actual: number;
  readonly expected: number;
}

/** A token present in the record could not be coerced to its field's type. */
export interface FieldCoercionFailure {
  readonly code: 'FIELD_COERCION_FAILURE';
  readonly field: string;
  /** The offending token as it appeared in the record (`''` when empty). */
  readonly rawToken: string;
  readonly failure: CoercionFailureReason;
}

export type MalformedReason = FieldCountMismatch | FieldCoercionFailure;

export interface CleanVerdict {
  readonly kind: 'clean';
  /** One value per declared field, in schema order. */
  readonly values: readonly TypedValue[];
}

export interface MalformedVerdict {
  readonly kind: 'malformed';
  readonly reason: MalformedReason;
  /** Verbatim source line of the record. */
  readonly rawText: string;
}

/** Classification result for one record. */
export type Verdict = CleanVerdict | MalformedVerdict;

export function cleanVerdict(values: readonly TypedValue[]): CleanVerdict {
  return { kind: 'clean', values: Object.freeze([...values]) };
}

export function malformedVerdict(reason: MalformedReason, rawText: string): MalformedVerdict {
  return { kind: 'malformed', reason, rawText };
}

export function isMalformed(verdict: Verdict): verdict is MalformedVerdict {
  return verdict.kind === 'malformed';
}

/** Human-readable description of a malformed reason, used in error messages and events. */
export function describeReason(reason: MalformedReason): string {
  switch (reason.code) {
    case 'FIELD_COUNT_MISMATCH':
      return `expected ${String(reason.expected)} fields but found ${String(reason.actual)}`;
    case 'FIELD_COERCION_FAILURE':
      return reason.failure === 'EMPTY_REQUIRED'
        ? `field '${reason.field}' is required but empty`
        : `field '${reason.field}' cannot be coerced from '${reason.rawToken}'`;
  }
}
