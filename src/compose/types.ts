import type { SearchQuery } from '../query/builder.js';
import type { FieldType, FieldValue, SchemaMetadata, SchemaResolver } from '../schema/types.js';

export type Term = string | number | bigint | boolean;

/** One term, a list of terms, or nothing. */
export type TermInput = Term | readonly Term[] | null | undefined;

/**
 * How one compose() call combines its predicates with the base filter.
 *
 * - `freshGroup`: all predicates form one OR group, AND-ed onto the base
 *   filter. Successive calls narrow: `(prior) AND (p1 OR p2 ...)`.
 * - `append`: each predicate is OR-ed onto the base filter:
 *   `prior OR p1 OR p2 ...`.
 *
 * On an unfiltered base both produce `p1 OR p2 ...`.
 */
export type GroupingMode = 'freshGroup' | 'append';

/** A term accepted by a field's type. */
export interface FieldCast {
  field: string;
  value: FieldValue;
  type: FieldType;
}

/** A (term, field) pair that contributed no predicate. */
export interface CastRejection {
  term: string;
  field: string;
  reason: string;
}

export type RejectHandler = (rejection: CastRejection) => void;

export interface ComposeOptions {
  /** Fields to search, in this order. Defaults to every schema field. */
  fields?: readonly string[];
  /** Expression to merge into. Defaults to all records of the schema. */
  baseQuery?: SearchQuery;
  mode?: GroupingMode;
  /** Used when composing onto a query that does not carry its schema. */
  resolver?: SchemaResolver;
  /** Called for every term a field's type rejects, and for untyped fields. */
  onReject?: RejectHandler;
}

/**
 * A composed search: its inputs and the output of every stage.
 * Produced by build(); pass it back to compose() to re-run it.
 */
export interface FuzzySearch {
  readonly kind: 'fuzzy-search';
  readonly schema: SchemaMetadata;
  readonly terms: readonly string[];
  /** Requested field allowlist, or null for all fields. */
  readonly fields: readonly string[] | null;
  /** Supplied base expression, or null to start from all records. */
  readonly baseQuery: SearchQuery | null;
  readonly mode: GroupingMode;
  readonly onReject?: RejectHandler;
  /** Fields that took part after the password guard. */
  readonly candidates: readonly string[];
  readonly casts: readonly FieldCast[];
  readonly query: SearchQuery;
}
