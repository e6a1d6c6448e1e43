import type { FieldValue, SchemaMetadata } from '../schema/types.js';
import { SearchQuery, disjunction } from './builder.js';
import type { FilterNode } from './types.js';

/**
 * Entry point for the query DSL: all records of a schema or table.
 *
 * @example
 * from(User)
 *   .where.field('email').contains('gmail')
 *   .or.field('email').contains('yahoo')
 */
export function from(source: SchemaMetadata | string): SearchQuery {
  if (typeof source === 'string') {
    return new SearchQuery(source, null, null);
  }
  return new SearchQuery(source.source, source, null);
}

/** Elementary predicate constructors. */
export const predicate = {
  ilike(field: string, pattern: string): FilterNode {
    return { kind: 'ilike', field, pattern };
  },
  contains(field: string, text: string): FilterNode {
    return predicate.ilike(field, `%${text}%`);
  },
  equals(field: string, value: FieldValue): FilterNode {
    return { kind: 'eq', field, value };
  },
  anyOf(nodes: readonly FilterNode[]): FilterNode {
    return disjunction(nodes);
  },
};
