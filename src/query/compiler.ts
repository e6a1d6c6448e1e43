import type { FieldValue } from '../schema/types.js';
import type { SearchQuery } from './builder.js';
import type { FilterNode } from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export interface SelectOptions {
  /** Columns to return; all columns when omitted or empty. */
  columns?: readonly string[];
  limit?: number;
  offset?: number;
}

/** Double-quotes an identifier, escaping embedded quotes. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function quoteSource(source: string): string {
  return source.split('.').map(quoteIdentifier).join('.');
}

/**
 * Compiles a FilterNode into a SQL fragment and appends parameters.
 * Uses a shared counter object so recursive calls share the same sequence.
 */
function compileFilterNode(
  node: FilterNode,
  params: unknown[],
  counter: { n: number },
): string {
  if (node.kind === 'ilike') {
    params.push(node.pattern);
    counter.n += 1;
    return `${quoteIdentifier(node.field)} ILIKE $${counter.n}`;
  }

  if (node.kind === 'eq') {
    if (node.value === null) {
      return `${quoteIdentifier(node.field)} IS NULL`;
    }
    params.push(node.value);
    counter.n += 1;
    return `${quoteIdentifier(node.field)} = $${counter.n}`;
  }

  const separator = node.kind === 'and' ? ' AND ' : ' OR ';
  const parts = node.filters.map((f) => compileFilterNode(f, params, counter));
  return `(${parts.join(separator)})`;
}

function compileWhereClause(
  query: SearchQuery,
  params: unknown[],
  counter: { n: number },
): string | null {
  if (query.filter === null) return null;
  return `WHERE ${compileFilterNode(query.filter, params, counter)}`;
}

/**
 * Compiles a SearchQuery into a SELECT over its source.
 * LIMIT and OFFSET are parameterized after the filter values.
 */
export function compileSelectQuery(query: SearchQuery, options: SelectOptions = {}): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const columns = options.columns !== undefined && options.columns.length > 0
    ? options.columns.map(quoteIdentifier).join(', ')
    : '*';
  const lines = [`SELECT ${columns}`, `FROM ${quoteSource(query.source)}`];

  const whereClause = compileWhereClause(query, params, counter);
  if (whereClause !== null) lines.push(whereClause);

  if (options.limit !== undefined) {
    params.push(options.limit);
    counter.n += 1;
    lines.push(`LIMIT $${counter.n}`);
  }
  if (options.offset !== undefined) {
    params.push(options.offset);
    counter.n += 1;
    lines.push(`OFFSET $${counter.n}`);
  }

  return { sql: lines.join('\n'), params };
}

/**
 * Compiles a SearchQuery into a SELECT COUNT(*) query. No LIMIT.
 */
export function compileCountQuery(query: SearchQuery): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const lines = ['SELECT COUNT(*) AS count', `FROM ${quoteSource(query.source)}`];

  const whereClause = compileWhereClause(query, params, counter);
  if (whereClause !== null) lines.push(whereClause);

  return { sql: lines.join('\n'), params };
}

/**
 * Produces a stable canonical string representation of a SearchQuery.
 * Two queries with the same source and structurally equal filters map to
 * the same key, so callers can cache results by it.
 */
export function compileCanonicalKey(query: SearchQuery): string {
  function canonicalValue(value: FieldValue): unknown {
    return value instanceof Date ? { date: value.toISOString() } : value;
  }

  function canonicalFilter(node: FilterNode | null): unknown {
    if (node === null) return null;
    if (node.kind === 'ilike') {
      return { kind: 'ilike', field: node.field, pattern: node.pattern };
    }
    if (node.kind === 'eq') {
      return { kind: 'eq', field: node.field, value: canonicalValue(node.value) };
    }
    return { kind: node.kind, filters: node.filters.map(canonicalFilter) };
  }

  return JSON.stringify({ source: query.source, filter: canonicalFilter(query.filter) });
}
