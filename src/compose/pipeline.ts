import { disjunction } from '../query/builder.js';
import type { SearchQuery } from '../query/builder.js';
import { predicate } from '../query/query-object.js';
import type { FilterNode } from '../query/types.js';
import { castTerm } from '../schema/cast.js';
import type { SchemaMetadata } from '../schema/types.js';
import type { FieldCast, GroupingMode, RejectHandler } from './types.js';

const PROTECTED_FIELD_MARKER = 'password';

function termToText(term: unknown): string | null {
  switch (typeof term) {
    case 'string':
      return term;
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(term);
    default:
      return null;
  }
}

/**
 * Normalizes caller input to a list of text terms.
 * A single term becomes a one-element list; null, undefined and values
 * that are not terms become an empty list. Non-term list elements are dropped.
 */
export function normalizeTerms(input: unknown): string[] {
  if (Array.isArray(input)) {
    const terms: string[] = [];
    for (const item of input) {
      const text = termToText(item);
      if (text !== null) terms.push(text);
    }
    return terms;
  }
  const text = termToText(input);
  return text === null ? [] : [text];
}

/**
 * Fields a search runs over: the allowlist as given, or every schema field
 * in declaration order. Fields whose name contains "password" never take part.
 */
export function resolveCandidates(
  schema: SchemaMetadata,
  fields: readonly string[] | null,
): string[] {
  const requested = fields ?? schema.fields();
  return requested.filter((field) => !field.includes(PROTECTED_FIELD_MARKER));
}

/**
 * Casts every term to every candidate field's type.
 * Returns the accepted casts grouped by term, each group in field order.
 * Unknown fields and rejected terms are reported to onReject and skipped.
 */
export function castTerms(
  schema: SchemaMetadata,
  candidates: readonly string[],
  terms: readonly string[],
  onReject?: RejectHandler,
): FieldCast[] {
  const casts: FieldCast[] = [];
  for (const term of terms) {
    for (const field of candidates) {
      const type = schema.typeOf(field);
      if (type === undefined) {
        onReject?.({ term, field, reason: `unknown field "${field}"` });
        continue;
      }
      const result = castTerm(type, term);
      if (!result.ok) {
        onReject?.({ term, field, reason: result.error.reason });
        continue;
      }
      casts.push({ field, value: result.value, type });
    }
  }
  return casts;
}

/** Text fields match by case-insensitive substring, every other type by equality. */
export function castToPredicate(cast: FieldCast): FilterNode {
  if (cast.type === 'text' && typeof cast.value === 'string') {
    return predicate.contains(cast.field, cast.value);
  }
  return predicate.equals(cast.field, cast.value);
}

/**
 * Folds casts into the base query. Returns the base itself when there are
 * no casts; otherwise a new SearchQuery.
 */
export function buildSearchQuery(
  base: SearchQuery,
  casts: readonly FieldCast[],
  mode: GroupingMode,
): SearchQuery {
  if (casts.length === 0) return base;
  const predicates = casts.map(castToPredicate);

  if (mode === 'append') {
    return predicates.reduce((query, node) => query.or.node(node), base);
  }
  return base.and.node(disjunction(predicates));
}
