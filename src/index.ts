export { defineEntity, findField, findRelation, EntityRegistry } from './model/registry.js';
export type {
  EntityDefinition,
  EntityDescriptor,
  FieldDescriptor,
  FieldType,
  RelationDescriptor,
  RelationKind,
} from './model/types.js';

export { Query } from './query/builder.js';
export type { AggregateOptions, JoinAliases, ProjectionSelectors } from './query/builder.js';
export {
  add,
  and,
  client,
  contains,
  div,
  eq,
  field,
  formatExpr,
  gt,
  gte,
  lit,
  lt,
  lte,
  mul,
  ne,
  not,
  or,
  outer,
  startsWith,
  sub,
} from './query/expr.js';
export type { Operand, Selector } from './query/expr.js';
export {
  aggregate,
  filter,
  groupBy,
  join,
  joinRelation,
  let_,
  orderBy,
  project,
  skip,
  source,
  take,
} from './query/query-object.js';
export type {
  AggregateFn,
  Expr,
  LiteralValue,
  ProjectedField,
  QueryNode,
  RowShape,
  ShapeEntry,
  SortDirection,
} from './query/types.js';

export { lower } from './plan/lower.js';
export { explain } from './plan/explain.js';
export type { LogicalPlan, PlanOp, PlanStep } from './plan/types.js';

export { QueryEngine } from './engine/engine.js';
export type { FallbackInfo, QueryEngineConfig } from './engine/engine.js';
export { QueryCursor } from './engine/cursor.js';
export { PlanExecutor } from './engine/executor.js';

export type { TargetAdapter } from './adapters/types.js';
export { MemoryAdapter } from './adapters/memory-adapter.js';
export { PostgresAdapter, quoteIdent } from './adapters/postgres-adapter.js';

export { MemorySource } from './store/memory-source.js';
export type { Collections } from './store/memory-source.js';
export { PostgresSource } from './store/postgres-source.js';
export type { PostgresSourceConfig } from './store/postgres-source.js';
export { logQueries } from './store/log-queries.js';
export type { QueryLogEvent, QueryLogger } from './store/log-queries.js';

export type {
  ColumnInfo,
  CompiledQuery,
  Connection,
  CursorState,
  DataSource,
  ExecuteOptions,
  ResultRow,
} from './types.js';

export {
  QueryError,
  UnknownEntityError,
  UnknownFieldError,
  TypeMismatchError,
  DuplicateEntityError,
  AmbiguousJoinError,
  PlanValidationError,
  EmptyAggregateError,
  SourceError,
  TimeoutError,
  UnsupportedOperationError,
  CancelledError,
} from './errors.js';
export type { QueryErrorCode, QueryErrorPhase } from './errors.js';
