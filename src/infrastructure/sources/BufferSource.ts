import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** In-memory data source. Useful for tests and for content already held as a string or Buffer. */
export class BufferSource implements DataSource {
  private readonly content: string | Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = data;
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data, 'utf-8') : data.length,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
