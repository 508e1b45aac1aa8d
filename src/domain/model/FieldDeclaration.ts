/** Supported field types for schema declarations. */
export type FieldType = 'string' | 'integer' | 'long' | 'double' | 'boolean' | 'date';

/** Every recognised field type, in declaration order. */
export const FIELD_TYPES: readonly FieldType[] = ['string', 'integer', 'long', 'double', 'boolean', 'date'];

/** Declares one column of the expected record layout. Position in the schema decides which token it reads. */
export interface FieldDeclaration {
  /** Column name used in output rows and error reasons. */
  readonly name: string;
  /** Type the raw token is coerced into. */
  readonly type: FieldType;
  /** When `true`, an empty or missing token becomes `null` instead of a failure. */
  readonly nullable: boolean;
}

/** Narrow an arbitrary value (e.g. from JSON config) to a known field type. */
export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && (FIELD_TYPES as readonly string[]).includes(value);
}
