import { describe, it, expect } from 'vitest';
import { Schema, CORRUPT_RECORD_FIELD } from '../../../src/domain/model/Schema.js';
import type { SchemaDefinition } from '../../../src/domain/model/Schema.js';
import type { FieldDeclaration } from '../../../src/domain/model/FieldDeclaration.js';
import { SchemaError } from '../../../src/domain/errors/ReadErrors.js';

const cities: SchemaDefinition = {
  fields: [
    { name: 'city', type: 'string', nullable: true },
    { name: 'country', type: 'string', nullable: true },
    { name: 'latitude', type: 'double', nullable: true },
    { name: 'longitude', type: 'double', nullable: true },
    { name: 'population', type: 'long', nullable: true },
  ],
};

describe('Schema', () => {
  describe('accessors', () => {
    const schema = Schema.from(cities);

    it('should count declared fields', () => {
      expect(schema.fieldCount()).toBe(5);
    });

    it('should return fields by position', () => {
      expect(schema.fieldAt(2)).toEqual({ name: 'latitude', type: 'double', nullable: true });
    });

    it('should throw RangeError outside the declared positions', () => {
      expect(() => schema.fieldAt(5)).toThrow(RangeError);
    });

    it('should not capture corrupt records by default', () => {
      expect(schema.capturesCorruptRecord()).toBe(false);
      expect(schema.outputFieldNames()).toEqual(['city', 'country', 'latitude', 'longitude', 'population']);
    });

    it('should append the corrupt-record column without counting it', () => {
      const capturing = Schema.from({ ...cities, captureCorruptRecord: true });
      expect(capturing.fieldCount()).toBe(5);
      expect(capturing.outputFieldNames()).toEqual([
        'city',
        'country',
        'latitude',
        'longitude',
        'population',
        CORRUPT_RECORD_FIELD,
      ]);
    });

    it('should not be affected by later mutation of the definition', () => {
      const fields: FieldDeclaration[] = [{ name: 'a', type: 'string', nullable: true }];
      const copy = new Schema({ fields });
      fields.push({ name: 'b', type: 'string', nullable: true });
      expect(copy.fieldCount()).toBe(1);
    });
  });

  describe('validate()', () => {
    it('should accept a well-formed schema', () => {
      expect(() => Schema.from(cities)).not.toThrow();
    });

    it('should reject duplicate field names', () => {
      const schema = new Schema({
        fields: [
          { name: 'id', type: 'long', nullable: false },
          { name: 'id', type: 'string', nullable: true },
        ],
      });

      expect(() => schema.validate()).toThrow(SchemaError);
      try {
        schema.validate();
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaError);
        expect((error as SchemaError).problems).toEqual(["duplicate field name 'id'"]);
        expect((error as SchemaError).code).toBe('SCHEMA_ERROR');
      }
    });

    it('should reject unknown field types coming from untyped config', () => {
      const parsed: unknown = JSON.parse('{"name":"when","type":"timestamp","nullable":true}');
      const schema = new Schema({ fields: [parsed as FieldDeclaration] });

      expect(() => schema.validate()).toThrow("field 'when' has unknown type 'timestamp'");
    });

    it('should reject empty names', () => {
      expect(() => Schema.from({ fields: [{ name: ' ', type: 'string', nullable: true }] })).toThrow(
        'field at position 0 has an empty name',
      );
    });

    it('should reject a declared field named like the corrupt-record column when capturing', () => {
      const fields: FieldDeclaration[] = [{ name: CORRUPT_RECORD_FIELD, type: 'string', nullable: true }];

      expect(() => Schema.from({ fields })).not.toThrow();
      expect(() => Schema.from({ fields, captureCorruptRecord: true })).toThrow(SchemaError);
    });

    it('should list every problem in one error', () => {
      const parsed: unknown = JSON.parse('{"name":"b","type":"decimal","nullable":true}');
      const schema = new Schema({
        fields: [{ name: 'a', type: 'string', nullable: true }, { name: 'a', type: 'long', nullable: true }, parsed as FieldDeclaration],
      });

      expect(() => schema.validate()).toThrow("Invalid schema: duplicate field name 'a'; field 'b' has unknown type 'decimal'");
    });
  });
});
