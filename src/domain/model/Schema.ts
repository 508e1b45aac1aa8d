import type { FieldDeclaration } from './FieldDeclaration.js';
import { isFieldType } from './FieldDeclaration.js';
import { SchemaError } from '../errors/ReadErrors.js';

/** Name of the synthetic trailing column that holds the raw text of malformed records. */
export const CORRUPT_RECORD_FIELD = '_corrupt_record';

/** Declaration of the expected record layout for a read. */
export interface SchemaDefinition {
  /** Ordered field declarations. Order decides positional alignment with tokens. */
  readonly fields: readonly FieldDeclaration[];
  /** When `true`, every row gets a trailing `_corrupt_record` column. */
  readonly captureCorruptRecord?: boolean;
  /** When `true`, records with more tokens than declared fields are malformed instead of truncated. */
  readonly strict?: boolean;
}

/**
 * Read-only view over a schema definition, shared by the classifier and the
 * materializer for the lifetime of a read. Declarations are copied and frozen
 * at construction.
 */
export class Schema {
  private readonly fields: readonly FieldDeclaration[];
  private readonly captureCorrupt: boolean;
  private readonly strictShape: boolean;

  constructor(definition: SchemaDefinition) {
    this.fields = Object.freeze(definition.fields.map((f) => Object.freeze({ ...f })));
    this.captureCorrupt = definition.captureCorruptRecord ?? false;
    this.strictShape = definition.strict ?? false;
  }

  /** Build and validate in one step. */
  static from(definition: SchemaDefinition): Schema {
    const schema = new Schema(definition);
    schema.validate();
    return schema;
  }

  /** Throws `SchemaError` listing every problem: empty or duplicate names, unknown types, corrupt-record name clash. */
  validate(): void {
    const problems: string[] = [];
    const seen = new Set<string>();

    this.fields.forEach((field, index) => {
      if (field.name.trim() === '') {
        problems.push(`field at position ${String(index)} has an empty name`);
      } else if (seen.has(field.name)) {
        problems.push(`duplicate field name '${field.name}'`);
      }
      seen.add(field.name);

      if (!isFieldType(field.type)) {
        problems.push(`field '${field.name}' has unknown type '${String(field.type)}'`);
      }
    });

    if (this.captureCorrupt && seen.has(CORRUPT_RECORD_FIELD)) {
      problems.push(`field name '${CORRUPT_RECORD_FIELD}' is reserved when corrupt records are captured`);
    }

    if (problems.length > 0) {
      throw new SchemaError(problems);
    }
  }

  /** Number of declared fields (`N`). The corrupt-record column is not counted. */
  fieldCount(): number {
    return this.fields.length;
  }

  fieldAt(index: number): FieldDeclaration {
    const field = this.fields[index];
    if (!field) {
      throw new RangeError(`No field at position ${String(index)} (schema has ${String(this.fields.length)})`);
    }
    return field;
  }

  capturesCorruptRecord(): boolean {
    return this.captureCorrupt;
  }

  /** Whether excess tokens make a record malformed. */
  isStrict(): boolean {
    return this.strictShape;
  }

  fieldNames(): readonly string[] {
    return this.fields.map((f) => f.name);
  }

  /** Column names of materialized rows, including `_corrupt_record` when captured. */
  outputFieldNames(): readonly string[] {
    const names = this.fieldNames();
    return this.captureCorrupt ? [...names, CORRUPT_RECORD_FIELD] : names;
  }
}
