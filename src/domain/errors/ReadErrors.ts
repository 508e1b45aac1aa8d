import type { MalformedReason } from '../model/Verdict.js';
import { describeReason } from '../model/Verdict.js';

export type ReadErrorCode = 'SCHEMA_ERROR' | 'ABORTED_READ' | 'READ_CONFIG_ERROR';

/** Base class for every error thrown by the reader. `code` is stable across releases. */
export abstract class ReadError extends Error {
  abstract readonly code: ReadErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The schema declaration is unusable. Raised before any record is read. */
export class SchemaError extends ReadError {
  readonly code = 'SCHEMA_ERROR';

  /** Every problem found in the declaration, in field order. */
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid schema: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

/** Terminal error of a `failfast` read: the first malformed record stops everything. */
export class AbortedReadError extends ReadError {
  readonly code = 'ABORTED_READ';

  readonly rawText: string;
  readonly lineNumber: number;
  readonly reason: MalformedReason;

  constructor(rawText: string, lineNumber: number, reason: MalformedReason) {
    super(`Malformed record at line ${String(lineNumber)} (${describeReason(reason)}): ${rawText}`);
    this.rawText = rawText;
    this.lineNumber = lineNumber;
    this.reason = reason;
  }
}

/** Reader misconfiguration or misuse (unknown mode, missing source, repeated read). */
export class ReadConfigError extends ReadError {
  readonly code = 'READ_CONFIG_ERROR';
}
