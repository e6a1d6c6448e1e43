import { SchemaResolutionError } from '../errors.js';
import { SearchQuery } from '../query/builder.js';
import { from } from '../query/query-object.js';
import type { SchemaMetadata } from '../schema/types.js';
import { buildSearchQuery, castTerms, normalizeTerms, resolveCandidates } from './pipeline.js';
import type { ComposeOptions, FuzzySearch, GroupingMode, RejectHandler, TermInput } from './types.js';

interface SearchInputs {
  schema: SchemaMetadata;
  terms: readonly string[];
  fields: readonly string[] | null;
  baseQuery: SearchQuery | null;
  mode: GroupingMode;
  onReject?: RejectHandler;
}

function isFuzzySearch(value: unknown): value is FuzzySearch {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'fuzzy-search';
}

function run(inputs: SearchInputs): FuzzySearch {
  const base = inputs.baseQuery ?? from(inputs.schema);
  const candidates = resolveCandidates(inputs.schema, inputs.fields);
  const casts = castTerms(inputs.schema, candidates, inputs.terms, inputs.onReject);
  const query = buildSearchQuery(base, casts, inputs.mode);
  return {
    kind: 'fuzzy-search',
    schema: inputs.schema,
    terms: inputs.terms,
    fields: inputs.fields,
    baseQuery: inputs.baseQuery,
    mode: inputs.mode,
    ...(inputs.onReject !== undefined ? { onReject: inputs.onReject } : {}),
    candidates,
    casts,
    query,
  };
}

/**
 * Runs the search pipeline once and returns every stage's output.
 *
 * @example
 * const search = build(User, ['gmail', 'yahoo'], { fields: ['email'] });
 * search.casts; // [{ field: 'email', value: 'gmail', type: 'text' }, ...]
 */
export function build(schema: SchemaMetadata, terms: TermInput, options: ComposeOptions = {}): FuzzySearch {
  return run({
    schema,
    terms: normalizeTerms(terms),
    fields: options.fields ?? null,
    baseQuery: options.baseQuery ?? null,
    mode: options.mode ?? 'freshGroup',
    ...(options.onReject !== undefined ? { onReject: options.onReject } : {}),
  });
}

/**
 * Returns a SearchQuery matching records where any searchable field
 * matches any term. Text fields match by case-insensitive substring,
 * other fields by equality with the term cast to their type.
 *
 * Pass a SearchQuery instead of a schema to narrow an earlier search:
 *
 * ```typescript
 * const q = compose(compose(User, ['gmail', 'yahoo'], { fields: ['email'] }), 'm');
 * // (email ILIKE '%gmail%' OR email ILIKE '%yahoo%') AND (email ILIKE '%m%')
 * ```
 *
 * Throws SchemaResolutionError when a SearchQuery carries no schema and
 * options.resolver does not know its source.
 */
export function compose(source: SchemaMetadata | SearchQuery, terms: TermInput, options?: ComposeOptions): SearchQuery;
/** Re-runs a search built with build(). */
export function compose(search: FuzzySearch): SearchQuery;
export function compose(
  source: SchemaMetadata | SearchQuery | FuzzySearch,
  terms?: TermInput,
  options: ComposeOptions = {},
): SearchQuery {
  if (isFuzzySearch(source)) {
    return run(source).query;
  }
  if (source instanceof SearchQuery) {
    const schema = source.schema ?? options.resolver?.get(source.source);
    if (schema === undefined) {
      throw new SchemaResolutionError(source.source);
    }
    return build(schema, terms, { ...options, baseQuery: source }).query;
  }
  return build(source, terms, options).query;
}
