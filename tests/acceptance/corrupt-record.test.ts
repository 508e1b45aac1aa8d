import { describe, it, expect } from 'vitest';
import { RecordReader } from '../../src/RecordReader.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { CsvTokenizer } from '../../src/infrastructure/tokenizers/CsvTokenizer.js';
import { rowToObject } from '../../src/domain/model/OutputRow.js';
import { citySchema } from '../helpers/records.js';

const schema = { ...citySchema, captureCorruptRecord: true };

describe('Corrupt record capture', () => {
  it('should keep the verbatim line of a malformed record in permissive mode', async () => {
    // Spacing around delimiters must survive; a re-join of tokens would lose the tab.
    const line = 'Mumbai,India, India,\t72.880838,21043000';
    const rows = await new RecordReader({ schema })
      .from(new BufferSource(`Tokyo,Japan,35.6895,139.69171,38001000\n${line}\n`), new CsvTokenizer())
      .readAll();

    expect(rows[0]!.values).toEqual(['Tokyo', 'Japan', 35.6895, 139.69171, 38001000n, null]);
    expect(rows[1]!.values).toEqual([null, null, null, null, null, line]);
  });

  it('should keep quotes of the original line', async () => {
    const line = '"Mumbai","India","far north",72.88,21043000';
    const rows = await new RecordReader({ schema }).from(new BufferSource(line), new CsvTokenizer()).readAll();

    expect(rows[0]!.values[5]).toBe(line);
  });

  it('should expose the column under its fixed name', async () => {
    const target = new RecordReader({ schema }).from(new BufferSource('Oslo,Norway,north\n'), new CsvTokenizer());
    const rows = await target.readAll();

    expect(rowToObject(rows[0]!, target.getSchema())).toEqual({
      city: null,
      country: null,
      latitude: null,
      longitude: null,
      population: null,
      _corrupt_record: 'Oslo,Norway,north',
    });
  });

  it('should add a null slot to every row under dropmalformed', async () => {
    const rows = await new RecordReader({ schema, mode: 'dropmalformed' })
      .from(new BufferSource('Oslo,Norway,north\nLima,Peru,-12.04,-77.04,9751000\n'), new CsvTokenizer())
      .readAll();

    expect(rows).toHaveLength(1);
    expect(rows[0]!.values).toEqual(['Lima', 'Peru', -12.04, -77.04, 9751000n, null]);
  });
});
