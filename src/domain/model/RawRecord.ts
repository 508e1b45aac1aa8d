/** One logical input record as delivered by a tokenizer. */
export interface RawRecord {
  /** Tokens in source order, untyped. */
  readonly tokens: readonly string[];
  /** The original line text, verbatim (delimiters and spacing preserved). */
  readonly line: string;
  /** One-based line number in the source. */
  readonly lineNumber: number;
}

/** Build a raw record. Tokens are copied and frozen so later mutation of the input array has no effect. */
export function createRawRecord(tokens: readonly string[], line: string, lineNumber: number): RawRecord {
  return Object.freeze({ tokens: Object.freeze([...tokens]), line, lineNumber });
}
