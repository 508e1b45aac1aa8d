import { describe, it, expect } from 'vitest';
import { FieldCoercer } from '../../../src/domain/services/FieldCoercer.js';
import type { FieldDeclaration, FieldType } from '../../../src/domain/model/FieldDeclaration.js';

const coercer = new FieldCoercer();

function field(type: FieldType, nullable = true): FieldDeclaration {
  return { name: 'value', type, nullable };
}

describe('FieldCoercer', () => {
  describe('empty and absent tokens', () => {
    it('should produce null for a nullable field with an empty token', () => {
      expect(coercer.coerce('', field('double'))).toEqual({ ok: true, value: null });
    });

    it('should produce null for a nullable field with an absent token', () => {
      expect(coercer.coerce(undefined, field('long'))).toEqual({ ok: true, value: null });
    });

    it('should fail with EMPTY_REQUIRED for a required field', () => {
      expect(coercer.coerce('', field('string', false))).toEqual({ ok: false, reason: 'EMPTY_REQUIRED' });
      expect(coercer.coerce(undefined, field('double', false))).toEqual({ ok: false, reason: 'EMPTY_REQUIRED' });
    });
  });

  describe('string', () => {
    it('should keep the token verbatim, including surrounding spaces', () => {
      expect(coercer.coerce(' India', field('string'))).toEqual({ ok: true, value: ' India' });
    });

    it('should accept numeric-looking text', () => {
      expect(coercer.coerce('12345', field('string'))).toEqual({ ok: true, value: '12345' });
    });
  });

  describe('double', () => {
    it('should parse decimals and negative values', () => {
      expect(coercer.coerce('35.6895', field('double'))).toEqual({ ok: true, value: 35.6895 });
      expect(coercer.coerce('-23.55', field('double'))).toEqual({ ok: true, value: -23.55 });
    });

    it('should parse exponent notation and integral text', () => {
      expect(coercer.coerce('1.5e3', field('double'))).toEqual({ ok: true, value: 1500 });
      expect(coercer.coerce('42', field('double'))).toEqual({ ok: true, value: 42 });
      expect(coercer.coerce('.5', field('double'))).toEqual({ ok: true, value: 0.5 });
    });

    it('should ignore surrounding whitespace', () => {
      expect(coercer.coerce(' 72.880838 ', field('double'))).toEqual({ ok: true, value: 72.880838 });
    });

    it('should accept NaN and signed Infinity', () => {
      const nan = coercer.coerce('NaN', field('double'));
      expect(nan.ok && Number.isNaN(nan.value)).toBe(true);
      expect(coercer.coerce('-Infinity', field('double'))).toEqual({ ok: true, value: Number.NEGATIVE_INFINITY });
    });

    it('should reject non-numeric and locale-formatted text', () => {
      expect(coercer.coerce(' India', field('double'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
      expect(coercer.coerce('3,14', field('double'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
      expect(coercer.coerce('0x1F', field('double'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });

    it('should treat a whitespace-only token as a mismatch, not as empty', () => {
      expect(coercer.coerce('   ', field('double'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });
  });

  describe('long', () => {
    it('should parse integral text as bigint', () => {
      expect(coercer.coerce('38001000', field('long'))).toEqual({ ok: true, value: 38001000n });
      expect(coercer.coerce('-7', field('long'))).toEqual({ ok: true, value: -7n });
    });

    it('should keep 64-bit values exact', () => {
      expect(coercer.coerce('9223372036854775807', field('long'))).toEqual({ ok: true, value: 9223372036854775807n });
    });

    it('should reject values outside the 64-bit range', () => {
      expect(coercer.coerce('9223372036854775808', field('long'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });

    it('should reject fractional values', () => {
      expect(coercer.coerce('72.880838', field('long'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });
  });

  describe('integer', () => {
    it('should parse 32-bit values as numbers', () => {
      expect(coercer.coerce('2147483647', field('integer'))).toEqual({ ok: true, value: 2147483647 });
    });

    it('should reject values outside the 32-bit range', () => {
      expect(coercer.coerce('2147483648', field('integer'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });
  });

  describe('boolean', () => {
    it('should accept true and false case-insensitively', () => {
      expect(coercer.coerce('TRUE', field('boolean'))).toEqual({ ok: true, value: true });
      expect(coercer.coerce('false', field('boolean'))).toEqual({ ok: true, value: false });
    });

    it('should reject other spellings', () => {
      expect(coercer.coerce('yes', field('boolean'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });
  });

  describe('date', () => {
    it('should parse ISO calendar dates as UTC midnight', () => {
      const outcome = coercer.coerce('2024-02-29', field('date'));
      expect(outcome).toEqual({ ok: true, value: new Date(Date.UTC(2024, 1, 29)) });
    });

    it('should reject impossible days', () => {
      expect(coercer.coerce('2023-02-29', field('date'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });

    it('should keep years below 100 as written', () => {
      const outcome = coercer.coerce('0050-06-15', field('date'));

      expect(outcome.ok).toBe(true);
      expect(outcome.ok && outcome.value instanceof Date && outcome.value.toISOString()).toBe('0050-06-15T00:00:00.000Z');
    });

    it('should reject other formats', () => {
      expect(coercer.coerce('29/02/2024', field('date'))).toEqual({ ok: false, reason: 'TYPE_MISMATCH' });
    });
  });

  it('should be idempotent', () => {
    const decl = field('double');
    expect(coercer.coerce('139.69171', decl)).toEqual(coercer.coerce('139.69171', decl));
    expect(coercer.coerce('abc', decl)).toEqual(coercer.coerce('abc', decl));
  });
});
