import type { RawRecord } from '../model/RawRecord.js';

/** Configured or auto-detected tokenizer options. */
export interface TokenizerOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). Default: `','`. */
  readonly delimiter?: string;
  /** Character encoding used for Buffer chunks. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Whether the first non-blank line is a header to skip. Default: `false`. */
  readonly hasHeader?: boolean;
  /** Strip leading and trailing whitespace from every token. Default: `false`. */
  readonly trimWhitespace?: boolean;
}

/**
 * Port for splitting source text into raw records.
 *
 * Implementations own line reassembly across chunk boundaries, header
 * skipping and quoting rules. Each record keeps its verbatim line.
 */
export interface RecordTokenizer {
  tokenize(chunks: AsyncIterable<string | Buffer>): AsyncIterable<RawRecord>;
  /** Auto-detect options from a small sample of data. */
  detect?(sample: string | Buffer): TokenizerOptions;
}
