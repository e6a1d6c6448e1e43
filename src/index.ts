export { compose, build } from './compose/compose.js';
export type {
  Term,
  TermInput,
  GroupingMode,
  FieldCast,
  CastRejection,
  RejectHandler,
  ComposeOptions,
  FuzzySearch,
} from './compose/types.js';
export { from, predicate } from './query/query-object.js';
export type { SearchQuery, FieldSelector, PredicateSetter } from './query/builder.js';
export type { FilterNode } from './query/types.js';
export { compileSelectQuery, compileCountQuery, compileCanonicalKey } from './query/compiler.js';
export type { CompiledQuery, SelectOptions } from './query/compiler.js';
export { defineSchema, SchemaRegistry } from './schema/define.js';
export type { FieldTypes } from './schema/define.js';
export { castTerm } from './schema/cast.js';
export type { CastResult, CastError } from './schema/cast.js';
export type { FieldType, FieldValue, SchemaMetadata, SchemaResolver } from './schema/types.js';
export { introspectSchema } from './store/introspect.js';
export type { IntrospectOptions } from './store/introspect.js';
export { PostgresSearchExecutor } from './store/search-executor.js';
export type { SearchExecutorConfig } from './store/search-executor.js';
export { SchemaResolutionError, SearchExecutionError } from './errors.js';
