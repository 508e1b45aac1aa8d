/** Metadata about the data source (optional, for events and diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading raw text from any origin (file, buffer, stream).
 *
 * Chunks carry no record boundaries; a `RecordTokenizer` reassembles lines.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source. */
  metadata(): SourceMetadata;
}
