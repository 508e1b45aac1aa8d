import { describe, it, expect } from 'vitest';
import { RowMaterializer } from '../../../src/domain/services/RowMaterializer.js';
import { Schema } from '../../../src/domain/model/Schema.js';
import { rowToObject } from '../../../src/domain/model/OutputRow.js';
import { citySchema } from '../../helpers/records.js';

describe('RowMaterializer', () => {
  const values = ['Tokyo', 'Japan', 35.6895, 139.69171, 38001000n];

  it('should build a row aligned to the schema', () => {
    const materializer = new RowMaterializer(Schema.from(citySchema));

    expect(materializer.materialize({ action: 'emit', values, corruptRecord: null }, 2)).toEqual({
      lineNumber: 2,
      values,
    });
  });

  it('should append a null corrupt-record slot for clean rows when captured', () => {
    const materializer = new RowMaterializer(Schema.from({ ...citySchema, captureCorruptRecord: true }));

    const row = materializer.materialize({ action: 'emit', values, corruptRecord: null }, 2);

    expect(row.values).toEqual([...values, null]);
  });

  it('should carry the raw text into the corrupt-record slot', () => {
    const materializer = new RowMaterializer(Schema.from({ ...citySchema, captureCorruptRecord: true }));

    const row = materializer.materialize(
      { action: 'emit', values: [null, null, null, null, null], corruptRecord: 'bad,line' },
      3,
    );

    expect(row.values).toEqual([null, null, null, null, null, 'bad,line']);
  });

  it('should omit the slot when not captured, even if raw text is present', () => {
    const materializer = new RowMaterializer(Schema.from(citySchema));

    const row = materializer.materialize(
      { action: 'emit', values: [null, null, null, null, null], corruptRecord: 'bad,line' },
      3,
    );

    expect(row.values).toHaveLength(5);
  });

  it('should freeze the row', () => {
    const row = new RowMaterializer(Schema.from(citySchema)).materialize(
      { action: 'emit', values, corruptRecord: null },
      1,
    );

    expect(Object.isFrozen(row)).toBe(true);
    expect(Object.isFrozen(row.values)).toBe(true);
  });

  it('should reject values that do not match the declared field count', () => {
    const materializer = new RowMaterializer(Schema.from(citySchema));

    expect(() => materializer.materialize({ action: 'emit', values: ['Tokyo'], corruptRecord: null }, 1)).toThrow(
      'Row has 1 values but schema declares 5 fields',
    );
  });

  it('should expose a keyed view through rowToObject()', () => {
    const schema = Schema.from({ ...citySchema, captureCorruptRecord: true });
    const row = new RowMaterializer(schema).materialize({ action: 'emit', values, corruptRecord: null }, 1);

    expect(rowToObject(row, schema)).toEqual({
      city: 'Tokyo',
      country: 'Japan',
      latitude: 35.6895,
      longitude: 139.69171,
      population: 38001000n,
      _corrupt_record: null,
    });
  });
});
