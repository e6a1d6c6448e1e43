import type { FieldValue } from '../schema/types.js';

export type FilterNode =
  | { readonly kind: 'ilike'; readonly field: string; readonly pattern: string }
  | { readonly kind: 'eq';    readonly field: string; readonly value: FieldValue }
  | { readonly kind: 'and';   readonly filters: readonly FilterNode[] }
  | { readonly kind: 'or';    readonly filters: readonly FilterNode[] };

export type Combinator = 'where' | 'and' | 'or';
