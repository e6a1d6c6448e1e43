import type { FieldValue, SchemaMetadata } from '../schema/types.js';
import type { Combinator, FilterNode } from './types.js';

/**
 * Combines a new FilterNode with an existing filter using the given
 * combinator. Returns a new node; neither input is modified.
 */
function _combine(
  existing: FilterNode | null,
  combinator: Combinator,
  newNode: FilterNode,
): FilterNode {
  // No existing filter: treat as first filter (same as where)
  if (combinator === 'where' || existing === null) {
    return newNode;
  }
  if ((existing.kind === 'and' || existing.kind === 'or') && existing.kind === combinator) {
    // Flat accumulation: append to existing node of the same kind
    return group(combinator, [...existing.filters, newNode]);
  }
  // Wrap both into a new node
  return group(combinator, [existing, newNode]);
}

// Group arrays are frozen: queries built from one base share its nodes
function group(kind: 'and' | 'or', filters: FilterNode[]): FilterNode {
  const frozen = Object.freeze(filters);
  const node: FilterNode = kind === 'and' ? { kind: 'and', filters: frozen } : { kind: 'or', filters: frozen };
  return Object.freeze(node);
}

/**
 * OR-combines nodes into one disjunction group.
 * A single node is returned as is.
 */
export function disjunction(nodes: readonly FilterNode[]): FilterNode {
  const [first, ...rest] = nodes;
  if (first === undefined) {
    throw new Error('disjunction called with no nodes');
  }
  return rest.reduce<FilterNode>((acc, node) => _combine(acc, 'or', node), first);
}

/**
 * Immutable search expression over one source. Every operation returns a
 * new SearchQuery; existing instances are never mutated.
 */
export class SearchQuery {
  constructor(
    readonly source: string,
    readonly schema: SchemaMetadata | null,
    readonly filter: FilterNode | null,
  ) {}

  /** True once at least one filter condition has been added. */
  get hasFilter(): boolean {
    return this.filter !== null;
  }

  /** Replace the filter. */
  get where(): FieldSelector {
    return new FieldSelector(this, 'where');
  }

  /** Combine with the existing filter using AND. */
  get and(): FieldSelector {
    return new FieldSelector(this, 'and');
  }

  /** Combine with the existing filter using OR. */
  get or(): FieldSelector {
    return new FieldSelector(this, 'or');
  }

  /** @internal */
  _apply(combinator: Combinator, node: FilterNode): SearchQuery {
    return new SearchQuery(this.source, this.schema, _combine(this.filter, combinator, node));
  }
}

/**
 * Intermediate builder step. Holds the combinator and awaits a field
 * name or a ready-made node.
 */
export class FieldSelector {
  constructor(
    private readonly _query: SearchQuery,
    private readonly _combinator: Combinator,
  ) {}

  /** Select the field to match against. */
  field(name: string): PredicateSetter {
    return new PredicateSetter(this._query, this._combinator, name);
  }

  /** Combine a prebuilt node. */
  node(node: FilterNode): SearchQuery {
    return this._query._apply(this._combinator, node);
  }

  /** Combine the OR of the given nodes as a single group. */
  anyOf(nodes: readonly FilterNode[]): SearchQuery {
    return this._query._apply(this._combinator, disjunction(nodes));
  }
}

/**
 * Intermediate builder step. Holds the field and awaits the comparison.
 */
export class PredicateSetter {
  constructor(
    private readonly _query: SearchQuery,
    private readonly _combinator: Combinator,
    private readonly _field: string,
  ) {}

  equals(value: FieldValue): SearchQuery {
    return this._query._apply(this._combinator, { kind: 'eq', field: this._field, value });
  }

  /** Case-insensitive LIKE; `%` and `_` in the pattern are wildcards. */
  ilike(pattern: string): SearchQuery {
    return this._query._apply(this._combinator, { kind: 'ilike', field: this._field, pattern });
  }

  /** Case-insensitive substring match (`%text%`). */
  contains(text: string): SearchQuery {
    return this.ilike(`%${text}%`);
  }
}
