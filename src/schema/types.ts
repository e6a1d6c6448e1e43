export const FIELD_TYPES = [
  'text',
  'integer',
  'float',
  'decimal',
  'boolean',
  'date',
  'timestamp',
  'uuid',
  'json',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** Value a search term takes once cast to a field's type. */
export type FieldValue = string | number | boolean | Date | null;

/**
 * Read-only description of one record type.
 * Implemented per table, either declared with defineSchema() or
 * reflected from the database with introspectSchema().
 */
export interface SchemaMetadata {
  /** Table the records live in, optionally schema-qualified (`public.users`). */
  readonly source: string;
  /** Field names in declaration order. */
  fields(): readonly string[];
  /** Declared type of a field, or undefined when the field is unknown or untyped. */
  typeOf(field: string): FieldType | undefined;
}

/** Looks up the schema behind a query's source name. */
export interface SchemaResolver {
  get(source: string): SchemaMetadata | undefined;
}

export function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((t) => t === value);
}
