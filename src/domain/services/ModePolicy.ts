import type { TypedValue } from '../model/CoercionOutcome.js';
import type { MalformedVerdict, Verdict } from '../model/Verdict.js';
import { ParseMode } from '../model/ParseMode.js';
import { AbortedReadError } from '../errors/ReadErrors.js';

export const PolicyState = {
  RUNNING: 'RUNNING',
  ABORTED: 'ABORTED',
} as const;

export type PolicyState = (typeof PolicyState)[keyof typeof PolicyState];

/** Emit a row built from these declared-field values and corrupt-record text. */
export interface EmitDecision {
  readonly action: 'emit';
  readonly values: readonly TypedValue[];
  /** Raw text for the corrupt-record slot; `null` for clean records. */
  readonly corruptRecord: string | null;
}

export interface SuppressDecision {
  readonly action: 'suppress';
}

export interface AbortDecision {
  readonly action: 'abort';
  readonly error: AbortedReadError;
}

export type PolicyDecision = EmitDecision | SuppressDecision | AbortDecision;

/**
 * Strategy deciding what a verdict does to the output stream.
 *
 * One instance per read operation (or per partition). Once `ABORTED`, the
 * policy refuses further verdicts.
 */
export interface ModePolicy {
  readonly mode: ParseMode;
  readonly state: PolicyState;
  /** `lineNumber` is carried into the abort error. */
  apply(verdict: Verdict, lineNumber: number): PolicyDecision;
}

abstract class BaseModePolicy implements ModePolicy {
  abstract readonly mode: ParseMode;
  private currentState: PolicyState = PolicyState.RUNNING;

  constructor(protected readonly fieldCount: number) {}

  get state(): PolicyState {
    return this.currentState;
  }

  apply(verdict: Verdict, lineNumber: number): PolicyDecision {
    if (this.currentState === PolicyState.ABORTED) {
      throw new Error(`${this.mode} policy has aborted; no further records can be applied`);
    }
    if (verdict.kind === 'clean') {
      return { action: 'emit', values: verdict.values, corruptRecord: null };
    }
    const decision = this.onMalformed(verdict, lineNumber);
    if (decision.action === 'abort') {
      this.currentState = PolicyState.ABORTED;
    }
    return decision;
  }

  protected abstract onMalformed(verdict: MalformedVerdict, lineNumber: number): PolicyDecision;
}

/** Malformed records become rows with every declared field `null`. */
export class PermissivePolicy extends BaseModePolicy {
  readonly mode = ParseMode.PERMISSIVE;

  protected onMalformed(verdict: MalformedVerdict): PolicyDecision {
    return { action: 'emit', values: new Array<TypedValue>(this.fieldCount).fill(null), corruptRecord: verdict.rawText };
  }
}

/** Malformed records are suppressed; the read continues. */
export class DropMalformedPolicy extends BaseModePolicy {
  readonly mode = ParseMode.DROP_MALFORMED;

  protected onMalformed(): PolicyDecision {
    return { action: 'suppress' };
  }
}

/** The first malformed record aborts the read. */
export class FailFastPolicy extends BaseModePolicy {
  readonly mode = ParseMode.FAIL_FAST;

  protected onMalformed(verdict: MalformedVerdict, lineNumber: number): PolicyDecision {
    return { action: 'abort', error: new AbortedReadError(verdict.rawText, lineNumber, verdict.reason) };
  }
}

/** Create a fresh policy for one read (or one partition of a read). */
export function createModePolicy(mode: ParseMode, fieldCount: number): ModePolicy {
  switch (mode) {
    case ParseMode.PERMISSIVE:
      return new PermissivePolicy(fieldCount);
    case ParseMode.DROP_MALFORMED:
      return new DropMalformedPolicy(fieldCount);
    case ParseMode.FAIL_FAST:
      return new FailFastPolicy(fieldCount);
  }
}
