import type pg from 'pg';
import { SchemaResolutionError, SearchExecutionError } from '../errors.js';
import { schemaFromColumns } from '../schema/define.js';
import type { SchemaMetadata } from '../schema/types.js';
import { mapColumnRow } from './row-mapper.js';
import type { ColumnRow } from './row-mapper.js';

export const SQL_SELECT_COLUMNS = `
SELECT column_name, data_type, udt_name
FROM information_schema.columns
WHERE table_schema = $1 AND table_name = $2
ORDER BY ordinal_position ASC
`.trim();

export interface IntrospectOptions {
  /** Database schema the table lives in. Defaults to 'public'. */
  schema?: string;
}

/**
 * Reads a table's columns from information_schema and returns them as
 * SchemaMetadata with source `schema.table`.
 * Columns of unsupported types are listed with no type, so searches skip them.
 */
export async function introspectSchema(
  pool: pg.Pool,
  table: string,
  options: IntrospectOptions = {},
): Promise<SchemaMetadata> {
  const schemaName = options.schema ?? 'public';
  const source = `${schemaName}.${table}`;

  let result: pg.QueryResult<ColumnRow>;
  try {
    result = await pool.query<ColumnRow>(SQL_SELECT_COLUMNS, [schemaName, table]);
  } catch (err) {
    throw new SearchExecutionError(`Failed to introspect ${source}: ${String(err)}`, err);
  }

  if (result.rows.length === 0) {
    throw new SchemaResolutionError(source, `Table "${source}" has no columns or does not exist`);
  }
  return schemaFromColumns(source, result.rows.map(mapColumnRow));
}
