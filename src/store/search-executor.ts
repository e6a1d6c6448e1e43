import type pg from 'pg';
import { SearchExecutionError } from '../errors.js';
import type { SearchQuery } from '../query/builder.js';
import { compileCountQuery, compileSelectQuery } from '../query/compiler.js';
import type { CompiledQuery, SelectOptions } from '../query/compiler.js';

export interface SearchExecutorConfig {
  pool: pg.Pool;
  /** Called with every statement before it is sent. */
  onQuery?: (compiled: CompiledQuery) => void;
  /** Called when the driver fails, before the error is thrown. Defaults to console.error. */
  onError?: (error: SearchExecutionError) => void;
}

/**
 * Runs composed searches against PostgreSQL.
 */
export class PostgresSearchExecutor {
  private readonly pool: pg.Pool;
  private readonly onQuery: ((compiled: CompiledQuery) => void) | undefined;
  private readonly onError: (error: SearchExecutionError) => void;

  constructor(config: SearchExecutorConfig) {
    this.pool = config.pool;
    this.onQuery = config.onQuery;
    this.onError = config.onError ?? ((err) => {
      console.error('[fuzzy-compose] query failed:', err);
    });
  }

  async all<R extends pg.QueryResultRow = pg.QueryResultRow>(
    query: SearchQuery,
    options: SelectOptions = {},
  ): Promise<R[]> {
    const result = await this.run<R>(compileSelectQuery(query, options), 'search');
    return result.rows;
  }

  async count(query: SearchQuery): Promise<number> {
    const result = await this.run<{ count: string }>(compileCountQuery(query), 'count');
    const row = result.rows[0];
    // pg returns COUNT(*) (bigint) as string by default
    return row === undefined ? 0 : Number(row.count);
  }

  private async run<R extends pg.QueryResultRow>(
    compiled: CompiledQuery,
    operation: string,
  ): Promise<pg.QueryResult<R>> {
    this.onQuery?.(compiled);
    try {
      return await this.pool.query<R>(compiled.sql, compiled.params);
    } catch (err) {
      const error = new SearchExecutionError(`Failed to ${operation} records: ${String(err)}`, err);
      this.onError(error);
      throw error;
    }
  }
}
