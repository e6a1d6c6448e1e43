import type { FieldType } from '../schema/types.js';

export type ColumnRow = {
  column_name: string;
  data_type: string;   // information_schema spelling, e.g. 'character varying'
  udt_name: string;    // underlying type, e.g. 'citext' when data_type is 'USER-DEFINED'
};

const DATA_TYPES: Readonly<Record<string, FieldType>> = {
  'text': 'text',
  'character varying': 'text',
  'character': 'text',
  'smallint': 'integer',
  'integer': 'integer',
  'bigint': 'integer',
  'real': 'float',
  'double precision': 'float',
  'numeric': 'decimal',
  'boolean': 'boolean',
  'date': 'date',
  'timestamp without time zone': 'timestamp',
  'timestamp with time zone': 'timestamp',
  'uuid': 'uuid',
  'json': 'json',
  'jsonb': 'json',
};

const USER_DEFINED_TYPES: Readonly<Record<string, FieldType>> = {
  citext: 'text',
};

/** Maps a column to its field type; undefined for column types with no mapping. */
export function mapColumnRow(row: ColumnRow): readonly [string, FieldType | undefined] {
  const type = row.data_type === 'USER-DEFINED'
    ? USER_DEFINED_TYPES[row.udt_name]
    : DATA_TYPES[row.data_type];
  return [row.column_name, type];
}
