import { SchemaResolutionError } from '../errors.js';
import { isFieldType } from './types.js';
import type { FieldType, SchemaMetadata, SchemaResolver } from './types.js';

const SOURCE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Field name → declared type, in declaration order.
 * Object key order is preserved for string keys, which gives fields() its order.
 */
export type FieldTypes = Readonly<Record<string, FieldType>>;

class DeclaredSchema implements SchemaMetadata {
  private readonly _fields: readonly string[];
  private readonly _types: ReadonlyMap<string, FieldType>;

  constructor(
    readonly source: string,
    entries: ReadonlyArray<readonly [string, FieldType | undefined]>,
  ) {
    this._fields = Object.freeze(entries.map(([name]) => name));
    const types = new Map<string, FieldType>();
    for (const [name, type] of entries) {
      if (type !== undefined) types.set(name, type);
    }
    this._types = types;
  }

  fields(): readonly string[] {
    return this._fields;
  }

  typeOf(field: string): FieldType | undefined {
    return this._types.get(field);
  }
}

/**
 * Validates a field map and returns it as SchemaMetadata.
 * Throws if the source is not a (schema-qualified) identifier, if there are
 * no fields, or if a field has an unknown type.
 *
 * @example
 * const User = defineSchema('users', { id: 'integer', email: 'text', password: 'text' });
 */
export function defineSchema(source: string, fieldTypes: FieldTypes): SchemaMetadata {
  if (!source || source.trim() === '') {
    throw new Error('defineSchema: source must be a non-empty string');
  }
  if (!SOURCE_PATTERN.test(source)) {
    throw new Error(`defineSchema: source "${source}" must be a table name, optionally schema-qualified`);
  }
  const entries = Object.entries(fieldTypes);
  if (entries.length === 0) {
    throw new Error(`defineSchema: "${source}" must declare at least one field`);
  }
  for (const [name, type] of entries) {
    if (!isFieldType(type)) {
      throw new Error(`defineSchema: field "${name}" of "${source}" has unknown type "${String(type)}"`);
    }
  }
  return new DeclaredSchema(source, entries);
}

/**
 * Builds SchemaMetadata from an ordered column list in which some columns
 * may have no supported type. Used by the database reflector.
 */
export function schemaFromColumns(
  source: string,
  columns: ReadonlyArray<readonly [string, FieldType | undefined]>,
): SchemaMetadata {
  return new DeclaredSchema(source, columns);
}

/**
 * In-memory source → schema lookup, used to recover the schema of a query
 * that was built from a bare table name.
 */
export class SchemaRegistry implements SchemaResolver {
  private readonly schemas = new Map<string, SchemaMetadata>();

  constructor(schemas: Iterable<SchemaMetadata> = []) {
    for (const schema of schemas) this.register(schema);
  }

  register(schema: SchemaMetadata): this {
    this.schemas.set(schema.source, schema);
    return this;
  }

  has(source: string): boolean {
    return this.schemas.has(source);
  }

  get(source: string): SchemaMetadata | undefined {
    return this.schemas.get(source);
  }

  /** Like get(), but throws SchemaResolutionError for an unregistered source. */
  resolve(source: string): SchemaMetadata {
    const schema = this.schemas.get(source);
    if (schema === undefined) {
      throw new SchemaResolutionError(source, `No schema registered for source "${source}"`);
    }
    return schema;
  }
}
