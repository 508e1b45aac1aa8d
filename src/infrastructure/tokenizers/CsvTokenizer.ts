import Papa from 'papaparse';
import { StringDecoder } from 'node:string_decoder';
import type { RecordTokenizer, TokenizerOptions } from '../../domain/ports/RecordTokenizer.js';
import type { RawRecord } from '../../domain/model/RawRecord.js';
import { createRawRecord } from '../../domain/model/RawRecord.js';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];
const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Line-oriented CSV tokenizer using PapaParse for field splitting and quoting.
 *
 * Each physical line is one record, so the verbatim line text is always
 * available for corrupt-record capture. Quoted fields spanning several lines
 * are not supported.
 */
export class CsvTokenizer implements RecordTokenizer {
  private readonly options: Required<TokenizerOptions>;

  constructor(options?: TokenizerOptions) {
    this.options = {
      delimiter: options?.delimiter ?? ',',
      encoding: options?.encoding ?? 'utf-8',
      hasHeader: options?.hasHeader ?? false,
      trimWhitespace: options?.trimWhitespace ?? false,
    };
  }

  async *tokenize(chunks: AsyncIterable<string | Buffer>): AsyncIterable<RawRecord> {
    const decoder = new StringDecoder(this.options.encoding);
    let pending = '';
    let lineNumber = 0;
    let headerSkipped = !this.options.hasHeader;

    const emit = (line: string): RawRecord | null => {
      lineNumber++;
      if (line.trim() === '') return null;
      if (!headerSkipped) {
        headerSkipped = true;
        return null;
      }
      return this.tokenizeLine(line, lineNumber);
    };

    for await (const chunk of chunks) {
      pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
      pending = yield* this.drainLines(pending, emit, false);
    }

    pending += decoder.end();
    pending = yield* this.drainLines(pending, emit, true);
    if (pending !== '') {
      const record = emit(pending);
      if (record) yield record;
    }
  }

  /**
   * Yield every complete line of `text` and return the unterminated rest.
   * A trailing `\r` is held back until the next chunk shows whether it opens a `\r\n`.
   */
  private *drainLines(
    text: string,
    emit: (line: string) => RawRecord | null,
    final: boolean,
  ): Generator<RawRecord, string> {
    let rest = text;
    let match = LINE_BREAK.exec(rest);
    while (match) {
      if (!final && match[0] === '\r' && match.index === rest.length - 1) break;
      const record = emit(rest.slice(0, match.index));
      if (record) yield record;
      rest = rest.slice(match.index + match[0].length);
      match = LINE_BREAK.exec(rest);
    }
    return rest;
  }

  /** Split one line into tokens. The line is kept verbatim on the record. */
  tokenizeLine(line: string, lineNumber: number): RawRecord {
    const result = Papa.parse<string[]>(line, {
      delimiter: this.options.delimiter,
      newline: '\n',
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
      transform: this.options.trimWhitespace ? (value: string) => value.trim() : undefined,
    });

    return createRawRecord(result.data[0] ?? [], line, lineNumber);
  }

  detect(sample: string | Buffer): TokenizerOptions {
    const content = typeof sample === 'string' ? sample : sample.toString(this.options.encoding);
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of CANDIDATE_DELIMITERS) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return {
      delimiter: bestDelimiter,
      encoding: this.options.encoding,
      hasHeader: this.options.hasHeader,
      trimWhitespace: this.options.trimWhitespace,
    };
  }
}
